/**
 * Terminal chat client.
 *
 * Loads the configuration, opens one backend session and drives the agent
 * either for a single prompt or interactively over readline. Rendering and
 * argument parsing are pure so they can be tested without a terminal.
 *
 * Usage: npm run chat -- [--config <file>] [--model <id>] [--no-stream] [prompt]
 */
import { resolve } from 'node:path';
import { createInterface } from 'node:readline/promises';

import { configFromEnv, loadAgentConfig } from '@/config/loader.js';
import type { AgentConfig } from '@/config/types.js';
import { withAgent, type Agent } from '@/core/agent.js';
import { AgentError } from '@/core/errors.js';
import type { LifecycleEvent } from '@/core/lifecycle-events.js';
import type { TokenUsage } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import { buildSystemPrompt } from '@/prompts/system-prompt.js';
import { createTransport } from '@/providers/factory.js';
import type { CompletionTransport } from '@/providers/types.js';
import { createBuiltinTools } from '@/tools/definitions/index.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import type { ToolResult, ToolSchema } from '@/tools/types.js';

const logger = createLogger({ name: 'cli' });

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const MAGENTA = '\x1b[35m';

// ─── CLI Arg Parsing ────────────────────────────────────────────

export interface CliArgs {
  configPath?: string;
  model?: string;
  /** False when --no-stream was given. */
  stream: boolean;
  help: boolean;
  /** Positional words joined; present means single-prompt mode. */
  prompt?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { stream: true, help: false };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--config' || arg === '-c') && next) {
      args.configPath = next;
      i++;
    } else if ((arg === '--model' || arg === '-m') && next) {
      args.model = next;
      i++;
    } else if (arg === '--no-stream') {
      args.stream = false;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg !== undefined && !arg.startsWith('-')) {
      words.push(arg);
    }
  }

  if (words.length > 0) {
    args.prompt = words.join(' ');
  }
  return args;
}

/** Apply command-line overrides on top of the loaded configuration. */
export function applyCliOverrides(config: AgentConfig, args: CliArgs): AgentConfig {
  return {
    ...config,
    provider: args.model ? { ...config.provider, model: args.model } : config.provider,
    stream: args.stream ? config.stream : false,
  };
}

// ─── Command Parsing ────────────────────────────────────────────

export interface Command {
  type: 'quit' | 'clear' | 'help' | 'message';
  text?: string;
}

export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (!trimmed) return { type: 'message', text: '' };

  if (trimmed === '/quit' || trimmed === '/exit' || trimmed === '/q') {
    return { type: 'quit' };
  }
  if (trimmed === '/clear') {
    return { type: 'clear' };
  }
  if (trimmed === '/help' || trimmed === '/h') {
    return { type: 'help' };
  }
  return { type: 'message', text: trimmed };
}

// ─── System Prompt ──────────────────────────────────────────────

/** The default prompt sections, with the configured identity and its placeholders filled. */
export function systemPromptFor(
  config: AgentConfig,
  workingDirectory: string,
  tools: readonly ToolSchema[],
): string {
  return buildSystemPrompt({
    identity: config.systemPrompt,
    workingDirectory,
    tools,
    variables: config.promptVariables,
  });
}

// ─── Event Formatting ───────────────────────────────────────────

export function formatToolUse(name: string, args: Readonly<Record<string, unknown>>): string {
  const inputStr = JSON.stringify(args);
  const truncated = inputStr.length > 120 ? inputStr.slice(0, 117) + '...' : inputStr;
  return `${DIM}  [tool] ${name} ${truncated}${RESET}`;
}

export function formatToolResult(result: ToolResult): string {
  if (!result.success) {
    return `${RED}  [error] ${result.error ?? 'Tool failed'}${RESET}`;
  }
  const firstLine = result.output.split('\n')[0] ?? '';
  const truncated = firstLine.length > 200 ? firstLine.slice(0, 197) + '...' : firstLine;
  return `${DIM}  [result] ${truncated}${RESET}`;
}

export function formatUsage(usage: TokenUsage): string {
  return `${DIM}  (${usage.totalTokens} tokens)${RESET}`;
}

/**
 * Create a renderer that turns lifecycle events into terminal text.
 * It tracks whether streamed text left the cursor mid-line.
 */
export function createEventRenderer(): (event: LifecycleEvent) => string {
  let midLine = false;

  function breakLine(): string {
    const out = midLine ? '\n' : '';
    midLine = false;
    return out;
  }

  return (event) => {
    switch (event.type) {
      case 'turn_started':
        midLine = false;
        return '';
      case 'text_delta': {
        const prefix = midLine ? '' : `${MAGENTA}Assistant:${RESET} `;
        midLine = true;
        return prefix + event.text;
      }
      case 'text_finished':
        return breakLine();
      case 'tool_invocation_started':
        return breakLine() + formatToolUse(event.name, event.arguments) + '\n';
      case 'tool_invocation_finished':
        return formatToolResult(event.result) + '\n';
      case 'turn_error':
        return breakLine() + `${RED}Error [${event.code}]: ${event.message}${RESET}\n`;
      case 'turn_finished':
        return breakLine() + (event.usage ? formatUsage(event.usage) + '\n' : '');
    }
  };
}

// ─── Help ───────────────────────────────────────────────────────

function printUsage(): void {
  console.log(`
${BOLD}Usage:${RESET} turnloop [--config <file>] [--model <id>] [--no-stream] [prompt]

  ${CYAN}-c, --config${RESET}   JSON configuration file (defaults to TURNLOOP_* environment variables)
  ${CYAN}-m, --model${RESET}    Override the configured model
  ${CYAN}--no-stream${RESET}    Request complete responses instead of streams
  ${CYAN}-h, --help${RESET}     Show this help
`);
}

function printHelp(): void {
  console.log(`
${BOLD}Commands:${RESET}
  ${CYAN}/help${RESET}    Show this help
  ${CYAN}/clear${RESET}   Forget the conversation so far
  ${CYAN}/quit${RESET}    Exit the chat
  ${CYAN}Ctrl+C${RESET}   Exit the chat
`);
}

// ─── Turns ──────────────────────────────────────────────────────

/** Run one turn, writing its events to stdout. Resolves false if the turn failed. */
async function runTurn(agent: Agent, input: string): Promise<boolean> {
  const render = createEventRenderer();
  let failed = false;

  for await (const event of agent.run(input)) {
    if (event.type === 'turn_error') failed = true;
    process.stdout.write(render(event));
  }
  return !failed;
}

async function chatLoop(agent: Agent): Promise<number> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const closing = new AbortController();
  let closed = false;
  rl.on('close', () => {
    closed = true;
    closing.abort();
  });

  console.log(`\n${BOLD}${CYAN}  turnloop — interactive chat${RESET}`);
  console.log(`${DIM}  Type /help for commands, /quit to exit${RESET}\n`);

  try {
    while (!closed) {
      let input: string;
      try {
        input = await rl.question(`${GREEN}You:${RESET} `, { signal: closing.signal });
      } catch (error) {
        // Ctrl+C or end of input while waiting for a line
        if (closed) return 0;
        throw error;
      }
      const cmd = parseCommand(input);

      switch (cmd.type) {
        case 'quit':
          return 0;
        case 'help':
          printHelp();
          break;
        case 'clear':
          agent.context.clear();
          console.log(`${YELLOW}Conversation cleared. Starting fresh.${RESET}\n`);
          break;
        case 'message':
          if (cmd.text) {
            await runTurn(agent, cmd.text);
            console.log('');
          }
          break;
      }
    }
    return 0;
  } finally {
    rl.close();
    console.log(`\n${DIM}Goodbye!${RESET}\n`);
  }
}

// ─── Main ───────────────────────────────────────────────────────

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    printUsage();
    return 0;
  }

  const loaded = args.configPath ? await loadAgentConfig(args.configPath) : configFromEnv();
  if (!loaded.ok) {
    console.error(`${RED}${loaded.error.message}${RESET}`);
    logger.error('Could not load configuration', {
      component: 'cli',
      code: loaded.error.code,
      context: loaded.error.context,
    });
    return 1;
  }
  const config = applyCliOverrides(loaded.value, args);
  const workingDirectory = resolve(config.workingDirectory ?? process.cwd());

  const registry = createToolRegistry();
  for (const tool of createBuiltinTools()) {
    registry.register(tool);
  }

  let transport: CompletionTransport;
  try {
    transport = createTransport(config.provider);
  } catch (error) {
    if (error instanceof AgentError) {
      console.error(`${RED}${error.message}${RESET}`);
      return 1;
    }
    throw error;
  }

  const systemPrompt = systemPromptFor(config, workingDirectory, registry.getSchemas());

  return withAgent(
    {
      transport,
      tools: registry,
      systemPrompt,
      stream: config.stream,
      retry: config.retry,
      workingDirectory,
    },
    async (agent) => {
      if (args.prompt !== undefined) {
        return (await runTurn(agent, args.prompt)) ? 0 : 1;
      }
      return chatLoop(agent);
    },
  );
}
