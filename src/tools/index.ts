// Tool system — registry + definitions
export type {
  ToolDefinition,
  ToolExecutor,
  ToolInvocation,
  ToolKind,
  ToolResult,
  ToolSchema,
} from './types.js';
export { toModelOutput, toolFailure, toolSuccess } from './types.js';

export { createToolRegistry, toObjectSchema } from './registry/index.js';
export type { ToolRegistry } from './registry/index.js';

export { createBuiltinTools, createReadFileTool } from './definitions/index.js';
