/**
 * ToolRegistry — central registry for all tool definitions.
 * Implements the ToolExecutor contract the agent loop calls: it resolves
 * tools by name, validates arguments with the tool's Zod schema and turns
 * every failure into a failed ToolResult instead of throwing.
 */
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { z } from 'zod';

import { ToolExecutionError, ValidationError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolDefinition, ToolExecutor, ToolResult, ToolSchema } from '../types.js';
import { toolFailure } from '../types.js';

const logger = createLogger({ name: 'tool-registry' });

export interface ToolRegistry extends ToolExecutor {
  /** Register a tool. Replaces existing registration for the same name. */
  register(tool: ToolDefinition): void;

  /** Unregister a tool by name. Returns true if it was registered. */
  unregister(name: string): boolean;

  /** Get a tool by name. Returns undefined if not found. */
  get(name: string): ToolDefinition | undefined;

  /** Check if a tool exists in the registry. */
  has(name: string): boolean;

  /** List all registered tool names, in registration order. */
  listAll(): string[];
}

/**
 * Create a new ToolRegistry instance.
 */
export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, { tool: ToolDefinition; schema: ToolSchema }>();

  return {
    register(tool: ToolDefinition): void {
      const schema: ToolSchema = {
        name: tool.name,
        description: tool.description,
        parameters: toObjectSchema(tool.name, tool.inputSchema),
      };

      if (tools.has(tool.name)) {
        logger.warn('Replacing registered tool', { component: 'tool-registry', toolName: tool.name });
      } else {
        logger.debug('Registering tool', { component: 'tool-registry', toolName: tool.name, kind: tool.kind });
      }
      tools.set(tool.name, { tool, schema });
    },

    unregister(name: string): boolean {
      const existed = tools.delete(name);
      if (existed) {
        logger.debug('Unregistered tool', { component: 'tool-registry', toolName: name });
      }
      return existed;
    },

    get(name: string): ToolDefinition | undefined {
      return tools.get(name)?.tool;
    },

    has(name: string): boolean {
      return tools.has(name);
    },

    listAll(): string[] {
      return [...tools.keys()];
    },

    getSchemas(): ToolSchema[] {
      return [...tools.values()].map((entry) => entry.schema);
    },

    async invoke(
      name: string,
      args: Readonly<Record<string, unknown>>,
      workingDirectory: string,
    ): Promise<ToolResult> {
      const entry = tools.get(name);
      if (!entry) {
        logger.warn('Model requested an unknown tool', {
          component: 'tool-registry',
          toolName: name,
          availableTools: [...tools.keys()],
        });
        return toolFailure(`Unknown tool: ${name}`, { metadata: { toolName: name } });
      }

      const parsed = entry.tool.inputSchema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ');
        logger.warn('Tool input validation failed', {
          component: 'tool-registry',
          toolName: name,
          issues,
        });
        return toolFailure(`Invalid parameters for tool ${name}: ${issues}`, {
          metadata: { toolName: name },
        });
      }

      logger.debug('Executing tool', { component: 'tool-registry', toolName: name });

      try {
        return await entry.tool.execute({ params: parsed.data, workingDirectory });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Tool threw during execution', {
          component: 'tool-registry',
          toolName: name,
          err: new ToolExecutionError(name, message, error instanceof Error ? error : undefined),
        });
        return toolFailure(`Error invoking tool ${name}: ${message}`, { metadata: { toolName: name } });
      }
    },
  };
}

/**
 * Convert a Zod schema to an OpenAI-compatible JSON Schema.
 * Function parameters must be an object schema without `$schema`.
 *
 * Uses the `jsonSchema7` target because OpenAI follows JSON Schema draft 7+
 * where `exclusiveMinimum` is a number.
 */
export function toObjectSchema(toolName: string, zodSchema: z.ZodType): Record<string, unknown> {
  const raw = zodToJsonSchema(zodSchema, { target: 'jsonSchema7' });
  const schema: Record<string, unknown> = Object.fromEntries(
    Object.entries(raw).filter(([key]) => key !== '$schema'),
  );

  if (schema['type'] !== 'object') {
    throw new ValidationError(`Tool ${toolName} must take an object of parameters`, {
      toolName,
      schemaType: schema['type'],
    });
  }
  return schema;
}
