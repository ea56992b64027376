// LLM backend adapters, chunk decoding and retry policy
export type {
  CompletedResponse,
  CompletionRequest,
  CompletionTransport,
  RawFragment,
  RawToolCallPiece,
  StreamEvent,
} from './types.js';

export { decodeFragments, decodeResponse } from './decoder.js';
export { createToolCallAssembler, parseToolArguments } from './tool-call-assembler.js';
export type { ToolCallAssembler } from './tool-call-assembler.js';
export {
  createResilientCompletion,
  backoffDelay,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_RETRIES,
} from './resilience.js';
export type { ResilientCompletion, RetryPolicy } from './resilience.js';
export { createTransport } from './factory.js';
export { createOpenAISession } from './openai.js';
export type { OpenAISessionOptions } from './openai.js';
