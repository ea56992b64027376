/**
 * Chunk decoder — turns a backend's raw fragments into normalized
 * StreamEvents. Text is relayed as it arrives; tool calls are relayed
 * as start/delta events and finalized, in index order, once the
 * fragment source is exhausted.
 */
import { addUsage, type TokenUsage } from '@/core/types.js';
import { classifyFailure } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createToolCallAssembler, createToolCallRequest } from './tool-call-assembler.js';
import type { CompletedResponse, RawFragment, StreamEvent } from './types.js';

const logger = createLogger({ name: 'decoder' });

/**
 * Decode one streamed completion.
 *
 * Always ends with exactly one terminal event: `message_finished`, or
 * `transport_error` if the source fails part-way (in which case open tool
 * calls are discarded).
 */
export async function* decodeFragments(
  fragments: AsyncIterable<RawFragment> | Iterable<RawFragment>,
  provider = 'unknown',
): AsyncGenerator<StreamEvent> {
  const assembler = createToolCallAssembler();
  let usage: TokenUsage | null = null;
  let finishReason: string | null = null;
  let fragmentCount = 0;

  try {
    for await (const fragment of fragments) {
      fragmentCount++;

      if (fragment.usage) {
        usage = addUsage(usage, fragment.usage);
      }
      if (fragment.finishReason) {
        finishReason = fragment.finishReason;
      }
      if (fragment.text) {
        yield { type: 'text_fragment', text: fragment.text };
      }
      for (const piece of fragment.toolCalls ?? []) {
        yield* assembler.accept(piece);
      }
    }
  } catch (error) {
    const failure = classifyFailure(error, provider);
    logger.warn('Stream failed mid-response', {
      component: 'decoder',
      provider,
      fragmentCount,
      failureKind: failure.failureKind,
      error: failure.message,
    });
    yield { type: 'transport_error', code: failure.code, message: `Stream interrupted: ${failure.message}` };
    return;
  }

  yield* assembler.finish();

  logger.debug('Stream decoded', { component: 'decoder', provider, fragmentCount, finishReason });
  yield { type: 'message_finished', finishReason, usage };
}

/**
 * Decode a complete (non-streamed) response into the same end state:
 * finished tool calls, then one `message_finished` carrying the text.
 */
export function decodeResponse(response: CompletedResponse): StreamEvent[] {
  const events: StreamEvent[] = response.toolCalls.map((call) => ({
    type: 'tool_call_finished',
    request: createToolCallRequest(call.id, call.name, call.argumentsText),
  }));

  events.push({
    type: 'message_finished',
    finishReason: response.finishReason,
    usage: response.usage,
    ...(response.text ? { text: response.text } : {}),
  });

  return events;
}
