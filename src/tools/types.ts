import type { z } from 'zod';

// ─── Tool Kinds ─────────────────────────────────────────────────

/** What kind of side effects a tool may have. */
export type ToolKind = 'read' | 'write' | 'shell' | 'network';

// ─── Tool Result ────────────────────────────────────────────────

/**
 * Outcome of one tool invocation. Frozen once produced and folded into
 * exactly one tool-role message.
 */
export interface ToolResult {
  readonly success: boolean;
  readonly output: string;
  readonly error?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly truncated: boolean;
}

interface ToolResultExtras {
  metadata?: Record<string, unknown>;
  truncated?: boolean;
}

/** Build a successful ToolResult. */
export function toolSuccess(output: string, extras: ToolResultExtras = {}): ToolResult {
  return Object.freeze({
    success: true,
    output,
    metadata: Object.freeze({ ...extras.metadata }),
    truncated: extras.truncated ?? false,
  });
}

/** Build a failed ToolResult. */
export function toolFailure(
  error: string,
  extras: ToolResultExtras & { output?: string } = {},
): ToolResult {
  return Object.freeze({
    success: false,
    output: extras.output ?? '',
    error,
    metadata: Object.freeze({ ...extras.metadata }),
    truncated: extras.truncated ?? false,
  });
}

/** Render a result the way the model sees it in a tool message. */
export function toModelOutput(result: ToolResult): string {
  if (result.success) return result.output;
  return `Error: ${result.error ?? 'Unknown error'}\nOutput: ${result.output}`;
}

// ─── Tool Definition ────────────────────────────────────────────

/** Everything a tool receives besides its validated arguments. */
export interface ToolInvocation<TParams> {
  readonly params: TParams;
  /** Directory relative paths are resolved against. */
  readonly workingDirectory: string;
}

export interface ToolDefinition<TSchema extends z.ZodType = z.ZodType> {
  readonly name: string;
  readonly description: string;
  readonly kind: ToolKind;
  readonly inputSchema: TSchema;

  /** Run the tool. May throw; the registry turns throws into failed results. */
  execute(invocation: ToolInvocation<z.infer<TSchema>>): Promise<ToolResult>;
}

// ─── Collaborator Contract ──────────────────────────────────────

/** Tool description handed to the model, unmodified by the loop. */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
}

/**
 * What the agent loop needs from the tool layer.
 * `invoke` never rejects for ordinary failures: unknown names, bad
 * arguments and tool faults all come back as failed results.
 */
export interface ToolExecutor {
  getSchemas(): ToolSchema[];
  invoke(
    name: string,
    args: Readonly<Record<string, unknown>>,
    workingDirectory: string,
  ): Promise<ToolResult>;
}
