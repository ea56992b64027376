/**
 * In-memory tool executor for loop tests.
 */
import type { ToolExecutor, ToolResult, ToolSchema } from '@/tools/types.js';

export type FakeToolHandler = (args: Readonly<Record<string, unknown>>) => ToolResult | Promise<ToolResult>;

export interface FakeToolCall {
  name: string;
  args: Readonly<Record<string, unknown>>;
  workingDirectory: string;
}

export interface FakeToolExecutor extends ToolExecutor {
  readonly calls: FakeToolCall[];
}

/**
 * Create an executor whose tools are plain handler functions.
 * Handlers may throw; the error propagates out of `invoke` so the loop's
 * own catch path is exercised.
 */
export function createFakeToolExecutor(handlers: Record<string, FakeToolHandler>): FakeToolExecutor {
  const calls: FakeToolCall[] = [];

  return {
    calls,

    getSchemas(): ToolSchema[] {
      return Object.keys(handlers).map((name) => ({
        name,
        description: `Test tool ${name}`,
        parameters: { type: 'object', properties: {} },
      }));
    },

    async invoke(name, args, workingDirectory): Promise<ToolResult> {
      calls.push({ name, args, workingDirectory });
      const handler = handlers[name];
      if (!handler) throw new Error(`No fake handler for ${name}`);
      return handler(args);
    },
  };
}
