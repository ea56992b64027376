/**
 * LifecycleEvent — events emitted by the agent loop to observers.
 *
 * Consumed by the terminal chat, loggers and tests. These are the only
 * contract the loop exposes, distinct from the lower-level StreamEvent
 * types produced by the chunk decoder.
 */
import type { TokenUsage } from './types.js';
import type { ToolResult } from '@/tools/types.js';

/** Events emitted during one turn, in order. */
export type LifecycleEvent =
  | TurnStartedEvent
  | TextDeltaEvent
  | TextFinishedEvent
  | ToolInvocationStartedEvent
  | ToolInvocationFinishedEvent
  | TurnErrorEvent
  | TurnFinishedEvent;

/** A turn has been initiated with the given user input. */
export interface TurnStartedEvent {
  readonly type: 'turn_started';
  readonly input: string;
}

/** Streaming text chunk from the model. */
export interface TextDeltaEvent {
  readonly type: 'text_delta';
  readonly text: string;
}

/** All streamed text of the response, once the stream has ended. */
export interface TextFinishedEvent {
  readonly type: 'text_finished';
  readonly text: string;
}

/** A tool call is about to be executed. */
export interface ToolInvocationStartedEvent {
  readonly type: 'tool_invocation_started';
  readonly callId: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

/** A tool call has completed (success or failure). */
export interface ToolInvocationFinishedEvent {
  readonly type: 'tool_invocation_finished';
  readonly callId: string;
  readonly name: string;
  readonly result: ToolResult;
}

/** The model call failed; the turn ends without `turn_finished`. */
export interface TurnErrorEvent {
  readonly type: 'turn_error';
  readonly code: string;
  readonly message: string;
}

/** The turn has completed. */
export interface TurnFinishedEvent {
  readonly type: 'turn_finished';
  readonly finalText: string | null;
  readonly usage: TokenUsage | null;
}
