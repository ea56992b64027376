// Core module — turn loop, shared types, errors
export type { Message, MessageRole, TokenUsage, ToolCallRequest, TurnState } from './types.js';
export { addUsage } from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  AgentError,
  AgentBusyError,
  ProviderError,
  ToolExecutionError,
  ValidationError,
  classifyFailure,
} from './errors.js';
export type { FailureKind } from './errors.js';

export type {
  LifecycleEvent,
  TextDeltaEvent,
  TextFinishedEvent,
  ToolInvocationFinishedEvent,
  ToolInvocationStartedEvent,
  TurnErrorEvent,
  TurnFinishedEvent,
  TurnStartedEvent,
} from './lifecycle-events.js';

export { createAgent, withAgent } from './agent.js';
export type { Agent, AgentOptions, RunOptions } from './agent.js';
