import type { ToolDefinition } from '../types.js';
import { createReadFileTool } from './read-file.js';

export { countTokens, createReadFileTool, estimateTokens, truncateText } from './read-file.js';

/** Tools every agent session starts with. */
export function createBuiltinTools(): ToolDefinition[] {
  return [createReadFileTool()];
}
