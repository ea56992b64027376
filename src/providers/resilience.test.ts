import { describe, it, expect } from 'vitest';

import { backoffDelay, createResilientCompletion } from './resilience.js';
import type { CompletionRequest, StreamEvent } from './types.js';
import {
  collect,
  connectionError,
  createScriptedTransport,
  protocolError,
  rateLimitError,
  testUsage,
  textFragments,
} from '@/testing/index.js';

const streamRequest: CompletionRequest = { messages: [{ role: 'user', content: 'hi' }], stream: true };

function recordingSleep(waits: number[]) {
  return (ms: number): Promise<void> => {
    waits.push(ms);
    return Promise.resolve();
  };
}

describe('backoffDelay', () => {
  it('doubles the base delay per attempt', () => {
    expect([0, 1, 2, 3].map((attempt) => backoffDelay(attempt, 1000))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('createResilientCompletion', () => {
  it('passes a healthy stream straight through', async () => {
    const transport = createScriptedTransport([
      { kind: 'fragments', fragments: [...textFragments('abcdef', 3), { finishReason: 'stop' }] },
    ]);
    const completion = createResilientCompletion(transport, { sleep: recordingSleep([]) });

    const events = await collect(completion.stream(streamRequest));

    expect(events).toEqual<StreamEvent[]>([
      { type: 'text_fragment', text: 'abc' },
      { type: 'text_fragment', text: 'def' },
      { type: 'message_finished', finishReason: 'stop', usage: null },
    ]);
  });

  it('retries transient failures with exponential backoff', async () => {
    const waits: number[] = [];
    const transport = createScriptedTransport([
      { kind: 'fail', error: connectionError() },
      { kind: 'fail', error: rateLimitError() },
      { kind: 'fragments', fragments: textFragments('ok') },
    ]);
    const completion = createResilientCompletion(transport, { baseDelayMs: 10, sleep: recordingSleep(waits) });

    const events = await collect(completion.stream(streamRequest));

    expect(waits).toEqual([10, 20]);
    expect(transport.requests).toHaveLength(3);
    expect(events).toEqual<StreamEvent[]>([
      { type: 'text_fragment', text: 'ok' },
      { type: 'message_finished', finishReason: null, usage: null },
    ]);
  });

  it('makes exactly maxRetries + 1 attempts before giving up', async () => {
    const waits: number[] = [];
    const transport = createScriptedTransport([
      { kind: 'fail', error: connectionError() },
      { kind: 'fail', error: connectionError() },
      { kind: 'fail', error: connectionError() },
      { kind: 'fragments', fragments: textFragments('too late') },
    ]);
    const completion = createResilientCompletion(transport, {
      maxRetries: 2,
      baseDelayMs: 5,
      sleep: recordingSleep(waits),
    });

    const events = await collect(completion.stream(streamRequest));

    expect(events).toEqual<StreamEvent[]>([
      {
        type: 'transport_error',
        code: 'CONNECTION_FAILED',
        message: 'Connection failed after 3 attempts: Connection reset',
      },
    ]);
    expect(transport.requests).toHaveLength(3);
    expect(waits).toEqual([5, 10]);
  });

  it('makes a single attempt when retries are disabled', async () => {
    const transport = createScriptedTransport([{ kind: 'fail', error: rateLimitError('slow down') }]);
    const completion = createResilientCompletion(transport, { maxRetries: 0, sleep: recordingSleep([]) });

    const events = await collect(completion.stream(streamRequest));

    expect(events).toEqual([
      { type: 'transport_error', code: 'RATE_LIMITED', message: 'Rate limit exceeded after 1 attempts: slow down' },
    ]);
  });

  it('does not retry a protocol error', async () => {
    const waits: number[] = [];
    const transport = createScriptedTransport([{ kind: 'fail', error: protocolError('400: bad model') }]);
    const completion = createResilientCompletion(transport, { sleep: recordingSleep(waits) });

    const events = await collect(completion.stream(streamRequest));

    expect(events).toEqual([
      { type: 'transport_error', code: 'PROVIDER_ERROR', message: 'Provider error: 400: bad model' },
    ]);
    expect(waits).toEqual([]);
  });

  it('treats an unclassified throw as fatal', async () => {
    const transport = createScriptedTransport([{ kind: 'fail', error: new Error('unexpected') }]);
    const completion = createResilientCompletion(transport, { sleep: recordingSleep([]) });

    const events = await collect(completion.stream(streamRequest));

    expect(events).toEqual([
      { type: 'transport_error', code: 'PROVIDER_ERROR', message: 'Provider error: unexpected' },
    ]);
    expect(transport.requests).toHaveLength(1);
  });

  it('stops when the backoff wait is aborted', async () => {
    const transport = createScriptedTransport([
      { kind: 'fail', error: rateLimitError() },
      { kind: 'fragments', fragments: textFragments('unused') },
    ]);
    const completion = createResilientCompletion(transport, {
      sleep: () => {
        const aborted = new Error('The operation was aborted');
        aborted.name = 'AbortError';
        return Promise.reject(aborted);
      },
    });

    const events = await collect(completion.stream(streamRequest));

    expect(events).toEqual([
      { type: 'transport_error', code: 'ABORTED', message: 'Provider error: Request was aborted' },
    ]);
    expect(transport.requests).toHaveLength(1);
  });

  it('decodes a non-streamed response after retrying', async () => {
    const waits: number[] = [];
    const transport = createScriptedTransport([
      { kind: 'fail', error: rateLimitError() },
      {
        kind: 'response',
        response: {
          text: 'done',
          toolCalls: [{ id: 'call_1', name: 'read_file', argumentsText: '{"path":"x"}' }],
          finishReason: 'tool_calls',
          usage: testUsage(7, 3),
        },
      },
    ]);
    const completion = createResilientCompletion(transport, { baseDelayMs: 2, sleep: recordingSleep(waits) });

    const events = await collect(completion.stream({ ...streamRequest, stream: false }));

    expect(waits).toEqual([2]);
    expect(events).toEqual<StreamEvent[]>([
      { type: 'tool_call_finished', request: { callId: 'call_1', name: 'read_file', arguments: { path: 'x' } } },
      { type: 'message_finished', finishReason: 'tool_calls', usage: testUsage(7, 3), text: 'done' },
    ]);
  });

  it('releases the stream when the consumer stops reading', async () => {
    const transport = createScriptedTransport([
      { kind: 'fragments', fragments: textFragments('abcdefgh', 2) },
    ]);
    const completion = createResilientCompletion(transport, { sleep: recordingSleep([]) });

    for await (const event of completion.stream(streamRequest)) {
      if (event.type === 'text_fragment') break;
    }

    expect(transport.abandoned).toBe(1);
  });
});
