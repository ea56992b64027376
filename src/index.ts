// Public API
export * from './core/index.js';
export * from './config/index.js';
export * from './context/index.js';
export * from './observability/index.js';
export * from './providers/index.js';
export * from './tools/index.js';
export { buildSystemPrompt, DEFAULT_IDENTITY } from './prompts/system-prompt.js';
export type { SystemPromptParams } from './prompts/system-prompt.js';
