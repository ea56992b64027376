import type { Message, TokenUsage, ToolCallRequest } from '@/core/types.js';
import type { ToolSchema } from '@/tools/types.js';

// ─── Completion Request ─────────────────────────────────────────

export interface CompletionRequest {
  /** Full conversation snapshot, system message first when configured. */
  messages: readonly Message[];
  /** Omitted (not empty) when no tools are registered. */
  tools?: readonly ToolSchema[];
  /** When false, the backend returns one complete response. */
  stream: boolean;
}

// ─── Backend-Neutral Decoder Input ──────────────────────────────

/** One piece of one tool call, keyed by the backend-assigned index. */
export interface RawToolCallPiece {
  index: number;
  id?: string;
  name?: string;
  argumentsDelta?: string;
}

/** One streamed chunk, normalized away from any provider's shape. */
export interface RawFragment {
  text?: string;
  toolCalls?: RawToolCallPiece[];
  finishReason?: string;
  usage?: TokenUsage;
}

/** A complete (non-streamed) response, normalized. */
export interface CompletedResponse {
  text: string | null;
  toolCalls: { id: string; name: string; argumentsText: string }[];
  finishReason: string | null;
  usage: TokenUsage | null;
}

// ─── Stream Events ──────────────────────────────────────────────

export type StreamEvent =
  | { readonly type: 'text_fragment'; readonly text: string }
  | { readonly type: 'tool_call_started'; readonly callId: string; readonly name: string }
  | {
      readonly type: 'tool_call_arguments_delta';
      readonly callId: string;
      readonly name: string;
      readonly delta: string;
    }
  | { readonly type: 'tool_call_finished'; readonly request: ToolCallRequest }
  | {
      readonly type: 'message_finished';
      readonly finishReason: string | null;
      readonly usage: TokenUsage | null;
      /** Only set on the non-streaming path, where no fragments precede it. */
      readonly text?: string;
    }
  | { readonly type: 'transport_error'; readonly code: string; readonly message: string };

// ─── Transport Interface ────────────────────────────────────────

/**
 * One backend session. Owns its connection; `close()` releases it.
 * Implementations throw ProviderError with a classified failureKind.
 */
export interface CompletionTransport {
  readonly id: string;

  /** Raw fragments of one streamed completion. */
  streamFragments(request: CompletionRequest, signal?: AbortSignal): AsyncIterable<RawFragment>;

  /** One complete, non-streamed completion. */
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletedResponse>;

  close(): Promise<void>;
}
