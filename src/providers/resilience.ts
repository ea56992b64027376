/**
 * Transport resilience — runs one completion request under a bounded
 * retry policy with exponential backoff.
 *
 * An attempt may be retried only while it is still acquiring (before its
 * first fragment, or its full response, has arrived). Once an attempt is
 * live its events go straight to the consumer and a failure ends the pass.
 */
import { classifyFailure, type ProviderError } from '@/core/errors.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import { decodeFragments, decodeResponse } from './decoder.js';
import type { CompletionRequest, CompletionTransport, RawFragment, StreamEvent } from './types.js';

const logger = createLogger({ name: 'resilience' });

/** Retries after the first attempt (4 attempts in total). */
export const DEFAULT_MAX_RETRIES = 3;

/** Delay unit: attempt k waits `baseDelayMs * 2^k` before attempt k+1. */
export const DEFAULT_BASE_DELAY_MS = 1000;

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  /** Injectable for tests. Must reject if the signal aborts. */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ResilientCompletion {
  stream(request: CompletionRequest, options?: { signal?: AbortSignal }): AsyncGenerator<StreamEvent>;
}

/** Backoff delay before the attempt that follows attempt `attempt` (0-indexed). */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Backoff aborted', 'AbortError'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DOMException('Backoff aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Re-attach an already-pulled first fragment in front of the rest. */
async function* resume(
  first: RawFragment,
  iterator: AsyncIterator<RawFragment>,
): AsyncGenerator<RawFragment> {
  let done = false;
  try {
    yield first;
    for (;;) {
      const next = await iterator.next();
      if (next.done) {
        done = true;
        return;
      }
      yield next.value;
    }
  } finally {
    // Abandoned by the consumer: release the underlying connection.
    if (!done) await iterator.return?.();
  }
}

function exhaustedMessage(failure: ProviderError, attempts: number): string {
  const reason = failure.failureKind === 'rate_limit' ? 'Rate limit exceeded' : 'Connection failed';
  return `${reason} after ${attempts} attempts: ${failure.message}`;
}

/**
 * Wrap a transport with the retry policy.
 * Events from failed attempts are never emitted.
 */
export function createResilientCompletion(
  transport: CompletionTransport,
  policy: Partial<RetryPolicy> & { logger?: Logger } = {},
): ResilientCompletion {
  const maxRetries = policy.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const wait = policy.sleep ?? sleep;
  const log = policy.logger ?? logger;

  /** Acquire one attempt: either a live fragment stream or a full event list. */
  async function acquire(
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<AsyncIterable<StreamEvent> | StreamEvent[]> {
    if (!request.stream) {
      return decodeResponse(await transport.complete(request, signal));
    }

    const iterator = transport.streamFragments(request, signal)[Symbol.asyncIterator]();
    const first = await iterator.next();
    if (first.done) {
      return decodeFragments([], transport.id);
    }
    return decodeFragments(resume(first.value, iterator), transport.id);
  }

  return {
    async *stream(request, options = {}) {
      const { signal } = options;
      const totalAttempts = maxRetries + 1;

      for (let attempt = 0; attempt < totalAttempts; attempt++) {
        let events: AsyncIterable<StreamEvent> | StreamEvent[];
        try {
          events = await acquire(request, signal);
        } catch (error) {
          const failure = classifyFailure(error, transport.id);

          if (!failure.retryable) {
            log.error('Completion request failed', {
              component: 'resilience',
              provider: transport.id,
              attempt,
              failureKind: failure.failureKind,
              error: failure.message,
            });
            yield { type: 'transport_error', code: failure.code, message: `Provider error: ${failure.message}` };
            return;
          }

          if (attempt === maxRetries) {
            log.error('Retry budget exhausted', {
              component: 'resilience',
              provider: transport.id,
              attempts: totalAttempts,
              failureKind: failure.failureKind,
              error: failure.message,
            });
            yield { type: 'transport_error', code: failure.code, message: exhaustedMessage(failure, totalAttempts) };
            return;
          }

          const delayMs = backoffDelay(attempt, baseDelayMs);
          log.warn('Transient provider failure, backing off', {
            component: 'resilience',
            provider: transport.id,
            attempt,
            delayMs,
            failureKind: failure.failureKind,
            error: failure.message,
          });

          try {
            await wait(delayMs, signal);
          } catch (sleepError) {
            const aborted = classifyFailure(sleepError, transport.id);
            yield { type: 'transport_error', code: aborted.code, message: `Provider error: ${aborted.message}` };
            return;
          }
          continue;
        }

        yield* events;
        return;
      }
    },
  };
}
