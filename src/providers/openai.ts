/**
 * OpenAI backend session.
 * Wraps the openai SDK to implement the CompletionTransport interface and
 * normalizes its chunk shapes into backend-neutral RawFragments.
 * Also usable for OpenAI-compatible APIs (Ollama, proxies) via baseUrl.
 */
import { Agent as HttpAgent } from 'node:http';
import { Agent as HttpsAgent } from 'node:https';

import OpenAI from 'openai';

import { classifyFailure, ProviderError } from '@/core/errors.js';
import type { Message, TokenUsage } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolSchema } from '@/tools/types.js';
import type {
  CompletedResponse,
  CompletionRequest,
  CompletionTransport,
  RawFragment,
} from './types.js';

const logger = createLogger({ name: 'openai-provider' });

/** Configuration for the OpenAI session. */
export interface OpenAISessionOptions {
  /** API key. Resolved from env by the factory. */
  apiKey: string;
  /** Model identifier (e.g. 'gpt-4o'). */
  model: string;
  /** Custom base URL (for Ollama, proxies, etc.). */
  baseUrl?: string;
  /** Provider label for logging/display. Defaults to 'openai'. */
  providerLabel?: string;
  /** Per-request timeout enforced by the SDK. */
  timeoutMs?: number;
  /** Ask for a usage chunk at the end of streams. Defaults to true. */
  includeUsage?: boolean;
}

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatChunk = OpenAI.Chat.Completions.ChatCompletionChunk;

interface WireUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  prompt_tokens_details?: { cached_tokens?: number } | null;
}

// ─── Request Mapping ────────────────────────────────────────────

/**
 * Convert our internal Message log to OpenAI's chat completion format.
 */
export function toOpenAIMessages(messages: readonly Message[]): ChatMessageParam[] {
  return messages.map((msg): ChatMessageParam => {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content };
      case 'user':
        return { role: 'user', content: msg.content };
      case 'tool':
        return { role: 'tool', tool_call_id: msg.toolCallId ?? '', content: msg.content };
      case 'assistant': {
        const toolCalls = msg.toolCalls ?? [];
        if (toolCalls.length === 0) {
          return { role: 'assistant', content: msg.content };
        }
        return {
          role: 'assistant',
          content: msg.content === '' ? null : msg.content,
          tool_calls: toolCalls.map((call) => ({
            id: call.callId,
            type: 'function' as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
    }
  });
}

/**
 * Format tool schemas for the OpenAI function calling API.
 */
export function toOpenAITools(
  tools: readonly ToolSchema[],
): OpenAI.Chat.Completions.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    },
  }));
}

// ─── Response Normalization ─────────────────────────────────────

function toTokenUsage(usage: WireUsage): TokenUsage {
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
    cachedTokens: usage.prompt_tokens_details?.cached_tokens ?? 0,
  };
}

/** Map one streamed chunk onto the decoder's input shape. */
export function toRawFragment(chunk: ChatChunk): RawFragment {
  const fragment: RawFragment = {};

  if (chunk.usage) {
    fragment.usage = toTokenUsage(chunk.usage);
  }

  // Usage-only chunks arrive with an empty choices array
  const choice = chunk.choices[0];
  if (!choice) return fragment;

  if (choice.delta.content) {
    fragment.text = choice.delta.content;
  }
  if (choice.delta.tool_calls?.length) {
    fragment.toolCalls = choice.delta.tool_calls.map((tc) => ({
      index: tc.index,
      id: tc.id,
      name: tc.function?.name,
      argumentsDelta: tc.function?.arguments,
    }));
  }
  if (choice.finish_reason) {
    fragment.finishReason = choice.finish_reason;
  }

  return fragment;
}

/** Map SDK errors onto the tagged failure kinds the retry policy reads. */
export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error;

  if (error instanceof OpenAI.APIUserAbortError) {
    return new ProviderError({ provider, failureKind: 'aborted', message: error.message, cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ProviderError({
      provider,
      failureKind: 'rate_limit',
      message: error.message,
      cause: error,
      status: error.status,
    });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderError({ provider, failureKind: 'connection', message: error.message, cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderError({
      provider,
      failureKind: 'protocol',
      message: error.status !== undefined ? `${error.status}: ${error.message}` : error.message,
      cause: error,
      status: error.status,
    });
  }
  return classifyFailure(error, provider);
}

// ─── Session ────────────────────────────────────────────────────

/**
 * Create an OpenAI session. The SDK client and its keep-alive agent are
 * built on first use and released by `close()`.
 */
export function createOpenAISession(options: OpenAISessionOptions): CompletionTransport {
  const label = options.providerLabel ?? 'openai';
  const id = `${label}:${options.model}`;
  const includeUsage = options.includeUsage ?? true;
  const inFlight = new Set<AbortController>();

  let client: OpenAI | undefined;
  let httpAgent: HttpAgent | undefined;

  function getClient(): OpenAI {
    if (!client) {
      httpAgent = options.baseUrl?.startsWith('http:')
        ? new HttpAgent({ keepAlive: true })
        : new HttpsAgent({ keepAlive: true });
      client = new OpenAI({
        apiKey: options.apiKey,
        ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
        // Retries are owned by the resilience wrapper
        maxRetries: 0,
        httpAgent,
      });
      logger.debug('Created OpenAI client', { component: label, model: options.model });
    }
    return client;
  }

  /** Link the caller's signal to a controller that close() can also abort. */
  function track(signal?: AbortSignal): { controller: AbortController; release: () => void } {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    inFlight.add(controller);

    return {
      controller,
      release: () => {
        signal?.removeEventListener('abort', onAbort);
        inFlight.delete(controller);
      },
    };
  }

  function toolParams(
    request: CompletionRequest,
  ): Pick<OpenAI.Chat.Completions.ChatCompletionCreateParams, 'tools' | 'tool_choice'> {
    if (!request.tools?.length) return {};
    return { tools: toOpenAITools(request.tools), tool_choice: 'auto' };
  }

  return {
    id,

    async *streamFragments(request: CompletionRequest, signal?: AbortSignal) {
      const messages = toOpenAIMessages(request.messages);
      const { controller, release } = track(signal);

      logger.debug('Starting OpenAI chat stream', {
        component: label,
        model: options.model,
        messageCount: messages.length,
        hasTools: !!request.tools?.length,
      });

      try {
        const stream = await getClient().chat.completions.create(
          {
            model: options.model,
            messages,
            stream: true,
            ...(includeUsage ? { stream_options: { include_usage: true } } : {}),
            ...toolParams(request),
          },
          { signal: controller.signal },
        );

        for await (const chunk of stream) {
          yield toRawFragment(chunk);
        }
      } catch (error) {
        throw toProviderError(error, id);
      } finally {
        release();
      }
    },

    async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletedResponse> {
      const { controller, release } = track(signal);

      try {
        const completion = await getClient().chat.completions.create(
          {
            model: options.model,
            messages: toOpenAIMessages(request.messages),
            stream: false,
            ...toolParams(request),
          },
          { signal: controller.signal },
        );

        const choice = completion.choices[0];
        if (!choice) {
          throw new ProviderError({
            provider: id,
            failureKind: 'protocol',
            message: 'Completion contained no choices',
          });
        }

        return {
          text: choice.message.content,
          toolCalls: (choice.message.tool_calls ?? []).map((tc) => ({
            id: tc.id,
            name: tc.function.name,
            argumentsText: tc.function.arguments,
          })),
          finishReason: choice.finish_reason,
          usage: completion.usage ? toTokenUsage(completion.usage) : null,
        };
      } catch (error) {
        throw toProviderError(error, id);
      } finally {
        release();
      }
    },

    close(): Promise<void> {
      for (const controller of inFlight) controller.abort();
      inFlight.clear();
      httpAgent?.destroy();
      httpAgent = undefined;
      if (client) {
        logger.debug('Closed OpenAI client', { component: label, model: options.model });
      }
      client = undefined;
      return Promise.resolve();
    },
  };
}
