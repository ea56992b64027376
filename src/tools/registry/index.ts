export { createToolRegistry, toObjectSchema } from './tool-registry.js';
export type { ToolRegistry } from './tool-registry.js';
