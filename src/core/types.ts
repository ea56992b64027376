// ─── Messages ───────────────────────────────────────────────────

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/** A tool call the model requested, fully assembled. Frozen once produced. */
export interface ToolCallRequest {
  readonly callId: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

/**
 * One entry of the conversation log.
 * Assistant messages that requested tools carry `toolCalls`;
 * tool messages reference the request through `toolCallId`.
 */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly toolCallId?: string;
  readonly toolCalls?: readonly ToolCallRequest[];
}

// ─── Token Usage ────────────────────────────────────────────────

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
  readonly cachedTokens: number;
}

/** Component-wise sum of two usage records. Either side may be absent. */
export function addUsage(a: TokenUsage | null, b: TokenUsage | null): TokenUsage | null {
  if (!a) return b;
  if (!b) return a;
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    cachedTokens: a.cachedTokens + b.cachedTokens,
  };
}

// ─── Turn State ─────────────────────────────────────────────────

export type TurnState =
  | 'idle'
  | 'streaming'
  | 'awaiting_tool_execution'
  | 'finishing'
  | 'done';
