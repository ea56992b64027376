/**
 * System prompt builder — assembles the default system prompt from a
 * fixed identity, the runtime environment and the registered tools.
 *
 * Custom identity text may use {{placeholder}} tokens that are filled
 * from `variables`. Unknown placeholders are left as-is.
 */
import { createLogger } from '@/observability/logger.js';
import type { ToolSchema } from '@/tools/types.js';

const logger = createLogger({ name: 'system-prompt' });

export const DEFAULT_IDENTITY =
  'You are a coding assistant running in a terminal. ' +
  'Answer accurately and concisely, and use the available tools to inspect files ' +
  'instead of guessing their contents.';

export interface SystemPromptParams {
  /** Replaces the default identity section. */
  identity?: string;
  workingDirectory: string;
  tools: readonly ToolSchema[];
  variables?: Record<string, string>;
}

/**
 * Format tool descriptions into a readable block for the system prompt.
 */
function formatToolSection(tools: readonly ToolSchema[]): string {
  if (tools.length === 0) return 'No tools available.';
  return tools.map((t) => `- **${t.name}**: ${t.description}`).join('\n');
}

/**
 * Replace {{placeholder}} tokens with provided values.
 */
function interpolate(template: string, variables: Record<string, string>): string {
  return template.replace(
    /\{\{(\w+)\}\}/g,
    (_match, key: string) => variables[key] ?? `{{${key}}}`,
  );
}

/** Build the complete system prompt. */
export function buildSystemPrompt(params: SystemPromptParams): string {
  const identity = interpolate(params.identity ?? DEFAULT_IDENTITY, params.variables ?? {});

  const sections = [
    `## Identity\n${identity}`,
    `## Environment\nWorking directory: ${params.workingDirectory}`,
    `## Available Tools\n${formatToolSection(params.tools)}`,
  ];

  const result = sections.join('\n\n');

  logger.debug('Built system prompt', {
    component: 'system-prompt',
    resultLength: result.length,
    toolCount: params.tools.length,
  });

  return result;
}
