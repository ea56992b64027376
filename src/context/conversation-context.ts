/**
 * ConversationContext — the ordered, append-only message log a turn reads
 * from and appends to. The configured system prompt is not stored; it is
 * synthesized at the head of every snapshot.
 */
import type { Message } from '@/core/types.js';

export interface ConversationContext {
  /** Append a message. It is frozen and never mutated afterwards. */
  append(message: Message): void;

  /** Everything the backend should see, system message first when configured. */
  snapshot(): readonly Message[];

  /** Appended messages only, without the synthesized system message. */
  messages(): readonly Message[];

  readonly size: number;

  /** Drop the whole log (e.g. the user starts a new conversation). */
  clear(): void;
}

export interface ConversationContextOptions {
  systemPrompt?: string;
}

/** Create an empty in-memory conversation log. */
export function createConversationContext(
  options: ConversationContextOptions = {},
): ConversationContext {
  const log: Message[] = [];
  const systemMessage: Message | undefined = options.systemPrompt
    ? Object.freeze({ role: 'system', content: options.systemPrompt })
    : undefined;

  return {
    append(message: Message): void {
      log.push(
        Object.freeze({
          ...message,
          ...(message.toolCalls ? { toolCalls: Object.freeze([...message.toolCalls]) } : {}),
        }),
      );
    },

    snapshot(): readonly Message[] {
      return systemMessage ? [systemMessage, ...log] : [...log];
    },

    messages(): readonly Message[] {
      return [...log];
    },

    get size(): number {
      return log.length;
    },

    clear(): void {
      log.length = 0;
    },
  };
}
