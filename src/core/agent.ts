/**
 * Agent — the turn loop.
 *
 * One `run()` drives a single turn: append the user message, stream one
 * completion through the retry policy, execute the requested tools in
 * order, fold the results into the conversation and report everything
 * as LifecycleEvents. Results are not sent back to the model within the
 * same turn.
 */
import { nanoid } from 'nanoid';

import {
  createConversationContext,
  type ConversationContext,
} from '@/context/conversation-context.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import { createResilientCompletion, type RetryPolicy } from '@/providers/resilience.js';
import type { CompletionRequest, CompletionTransport } from '@/providers/types.js';
import { toModelOutput, toolFailure } from '@/tools/types.js';
import type { ToolExecutor, ToolResult } from '@/tools/types.js';
import { AgentBusyError } from './errors.js';
import type { LifecycleEvent } from './lifecycle-events.js';
import type { TokenUsage, ToolCallRequest, TurnState } from './types.js';

const logger = createLogger({ name: 'agent' });

// ─── Options ────────────────────────────────────────────────────

export interface AgentOptions {
  /** Backend session. Closed by `agent.close()`. */
  transport: CompletionTransport;
  /** Omit to run without tools; the request then carries no tool list. */
  tools?: ToolExecutor;
  /** Used only when no `context` is passed in. */
  systemPrompt?: string;
  context?: ConversationContext;
  /** Request streamed completions. Defaults to true. */
  stream?: boolean;
  retry?: Partial<RetryPolicy>;
  /** Directory tools resolve relative paths against. Defaults to cwd. */
  workingDirectory?: string;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface Agent {
  /**
   * Run one turn. Events are produced lazily: stopping iteration cancels
   * the in-flight request and leaves only the user message appended.
   * Throws AgentBusyError if another turn is still running.
   */
  run(input: string, options?: RunOptions): AsyncGenerator<LifecycleEvent>;

  readonly state: TurnState;
  readonly context: ConversationContext;

  /** Cancel any running turn and release the transport. */
  close(): Promise<void>;
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Create an Agent bound to one transport and one conversation.
 */
export function createAgent(options: AgentOptions): Agent {
  const {
    transport,
    tools,
    stream = true,
    workingDirectory = process.cwd(),
  } = options;
  const log = options.logger ?? logger;
  const context = options.context ?? createConversationContext({ systemPrompt: options.systemPrompt });
  const completion = createResilientCompletion(transport, { ...options.retry, logger: log });

  let state: TurnState = 'idle';
  let active: AbortController | undefined;

  async function invokeTool(call: ToolCallRequest): Promise<ToolResult> {
    if (!tools) return toolFailure(`Unknown tool: ${call.name}`);
    try {
      return await tools.invoke(call.name, call.arguments, workingDirectory);
    } catch (error) {
      return toolFailure(error instanceof Error ? error.message : String(error));
    }
  }

  return {
    get state(): TurnState {
      return state;
    },

    context,

    async *run(input: string, runOptions: RunOptions = {}): AsyncGenerator<LifecycleEvent> {
      if (active) throw new AgentBusyError();

      const controller = new AbortController();
      const onAbort = (): void => controller.abort();
      if (runOptions.signal?.aborted) controller.abort();
      runOptions.signal?.addEventListener('abort', onAbort, { once: true });
      active = controller;

      const turnId = nanoid(10);
      const startTime = Date.now();

      try {
        context.append({ role: 'user', content: input });
        state = 'streaming';

        log.info('Starting turn', { component: 'agent', turnId, provider: transport.id, stream });
        yield { type: 'turn_started', input };

        const schemas = tools?.getSchemas() ?? [];
        const request: CompletionRequest = {
          messages: context.snapshot(),
          stream,
          ...(schemas.length > 0 ? { tools: schemas } : {}),
        };

        let text = '';
        let usage: TokenUsage | null = null;
        const pending: ToolCallRequest[] = [];

        for await (const event of completion.stream(request, { signal: controller.signal })) {
          switch (event.type) {
            case 'text_fragment':
              text += event.text;
              yield { type: 'text_delta', text: event.text };
              break;
            case 'tool_call_finished':
              pending.push(event.request);
              break;
            case 'message_finished':
              usage = event.usage;
              if (event.text) {
                text += event.text;
                yield { type: 'text_delta', text: event.text };
              }
              break;
            case 'transport_error':
              state = 'done';
              log.warn('Turn failed', {
                component: 'agent',
                turnId,
                code: event.code,
                error: event.message,
                durationMs: Date.now() - startTime,
              });
              yield { type: 'turn_error', code: event.code, message: event.message };
              return;
            case 'tool_call_started':
            case 'tool_call_arguments_delta':
              break;
          }
        }

        const finalText = text.length > 0 ? text : null;
        if (finalText !== null) {
          yield { type: 'text_finished', text: finalText };
        }

        if (pending.length > 0) {
          state = 'awaiting_tool_execution';
          const results: ToolResult[] = [];

          for (const call of pending) {
            yield {
              type: 'tool_invocation_started',
              callId: call.callId,
              name: call.name,
              arguments: call.arguments,
            };

            const toolStart = Date.now();
            const result = await invokeTool(call);
            results.push(result);

            log.debug('Tool invocation finished', {
              component: 'agent',
              turnId,
              toolName: call.name,
              success: result.success,
              durationMs: Date.now() - toolStart,
            });
            yield { type: 'tool_invocation_finished', callId: call.callId, name: call.name, result };
          }

          // The assistant message and its tool messages land together or not at all
          context.append({ role: 'assistant', content: text, toolCalls: pending });
          pending.forEach((call, i) => {
            const result = results[i];
            if (result) {
              context.append({ role: 'tool', content: toModelOutput(result), toolCallId: call.callId });
            }
          });
        }

        state = 'finishing';
        if (pending.length === 0) {
          context.append({ role: 'assistant', content: text });
        }

        state = 'done';
        log.info('Turn finished', {
          component: 'agent',
          turnId,
          toolCalls: pending.length,
          totalTokens: usage?.totalTokens,
          durationMs: Date.now() - startTime,
        });
        yield { type: 'turn_finished', finalText, usage };
      } finally {
        runOptions.signal?.removeEventListener('abort', onAbort);
        // No-op once the request has completed; cancels it when abandoned
        controller.abort();
        active = undefined;
        state = 'idle';
      }
    },

    async close(): Promise<void> {
      active?.abort();
      await transport.close();
    },
  };
}

/**
 * Run `fn` with a fresh agent and close it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withAgent<T>(
  options: AgentOptions,
  fn: (agent: Agent) => Promise<T>,
): Promise<T> {
  const agent = createAgent(options);
  try {
    return await fn(agent);
  } finally {
    await agent.close();
  }
}
