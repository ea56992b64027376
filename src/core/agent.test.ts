import { describe, it, expect } from 'vitest';

import { createAgent, withAgent } from './agent.js';
import { AgentBusyError } from './errors.js';
import type { LifecycleEvent } from './lifecycle-events.js';
import {
  collect,
  connectionError,
  createFakeToolExecutor,
  createScriptedTransport,
  protocolError,
  rateLimitError,
  testUsage,
  textFragments,
  usageFragment,
} from '@/testing/index.js';
import { toolSuccess } from '@/tools/types.js';

// ─── Fixtures ───────────────────────────────────────────────────

function noWait(waits: number[] = []) {
  return {
    maxRetries: 3,
    baseDelayMs: 1,
    sleep: (ms: number): Promise<void> => {
      waits.push(ms);
      return Promise.resolve();
    },
  };
}

/** x reads a path, y takes a number; argument text arrives in three chunks each, interleaved. */
const twoCallFragments = [
  { toolCalls: [{ index: 0, id: 'call_x', name: 'x' }] },
  { toolCalls: [{ index: 1, id: 'call_y', name: 'y' }] },
  { toolCalls: [{ index: 0, argumentsDelta: '{"path":' }] },
  { toolCalls: [{ index: 1, argumentsDelta: '{"n":' }] },
  { toolCalls: [{ index: 0, argumentsDelta: '"a.txt"' }] },
  { toolCalls: [{ index: 1, argumentsDelta: '2' }] },
  { toolCalls: [{ index: 0, argumentsDelta: '}' }] },
  { toolCalls: [{ index: 1, argumentsDelta: '}' }] },
  { finishReason: 'tool_calls' },
];

// ─── Tests ──────────────────────────────────────────────────────

describe('createAgent', () => {
  describe('text-only turn', () => {
    it('relays deltas, finishes the text and reports usage', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: [...textFragments('Hello world'), usageFragment(12, 3)] },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      const events = await collect(agent.run('hi'));

      expect(events).toEqual<LifecycleEvent[]>([
        { type: 'turn_started', input: 'hi' },
        { type: 'text_delta', text: 'Hell' },
        { type: 'text_delta', text: 'o wo' },
        { type: 'text_delta', text: 'rld' },
        { type: 'text_finished', text: 'Hello world' },
        { type: 'turn_finished', finalText: 'Hello world', usage: testUsage(12, 3) },
      ]);
    });

    it('grows the context by exactly the user and assistant messages', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: textFragments('Hello world') },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      const events = await collect(agent.run('hi'));

      const deltas = events.flatMap((e) => (e.type === 'text_delta' ? [e.text] : []));
      const finished = events.at(-1);
      expect(finished?.type === 'turn_finished' ? finished.finalText : undefined).toBe(deltas.join(''));
      expect(agent.context.size).toBe(2);
      expect(agent.context.messages()).toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Hello world' },
      ]);
    });

    it('omits the tool list when no executor is configured', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: textFragments('ok') },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      await collect(agent.run('hi'));

      const request = transport.requests[0];
      expect(request?.stream).toBe(true);
      expect(request !== undefined && 'tools' in request).toBe(false);
      expect(request?.messages).toEqual([{ role: 'user', content: 'hi' }]);
    });

    it('puts the system prompt first in the request but not in the log', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: textFragments('ok') },
      ]);
      const agent = createAgent({ transport, systemPrompt: 'Be brief.', retry: noWait() });

      await collect(agent.run('hi'));

      expect(transport.requests[0]?.messages).toEqual([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hi' },
      ]);
      expect(agent.context.messages()).toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'ok' },
      ]);
    });

    it('sends the previous turn as history', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: textFragments('first') },
        { kind: 'fragments', fragments: textFragments('second') },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      await collect(agent.run('one'));
      await collect(agent.run('two'));

      expect(transport.requests[1]?.messages).toEqual([
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'first' },
        { role: 'user', content: 'two' },
      ]);
      expect(agent.context.size).toBe(4);
    });

    it('delivers non-streamed text as a single delta', async () => {
      const transport = createScriptedTransport([
        {
          kind: 'response',
          response: { text: 'Hi there', toolCalls: [], finishReason: 'stop', usage: testUsage(5, 2) },
        },
      ]);
      const agent = createAgent({ transport, stream: false, retry: noWait() });

      const events = await collect(agent.run('hello'));

      expect(transport.requests[0]?.stream).toBe(false);
      expect(events).toEqual<LifecycleEvent[]>([
        { type: 'turn_started', input: 'hello' },
        { type: 'text_delta', text: 'Hi there' },
        { type: 'text_finished', text: 'Hi there' },
        { type: 'turn_finished', finalText: 'Hi there', usage: testUsage(5, 2) },
      ]);
    });
  });

  describe('tool calls', () => {
    it('executes calls in index order and appends assistant and tool messages', async () => {
      const transport = createScriptedTransport([{ kind: 'fragments', fragments: twoCallFragments }]);
      const tools = createFakeToolExecutor({
        x: () => toolSuccess('contents of a.txt'),
        y: () => toolSuccess('two'),
      });
      const agent = createAgent({ transport, tools, workingDirectory: '/work', retry: noWait() });

      const events = await collect(agent.run('read it'));

      expect(events).toEqual<LifecycleEvent[]>([
        { type: 'turn_started', input: 'read it' },
        { type: 'tool_invocation_started', callId: 'call_x', name: 'x', arguments: { path: 'a.txt' } },
        {
          type: 'tool_invocation_finished',
          callId: 'call_x',
          name: 'x',
          result: toolSuccess('contents of a.txt'),
        },
        { type: 'tool_invocation_started', callId: 'call_y', name: 'y', arguments: { n: 2 } },
        { type: 'tool_invocation_finished', callId: 'call_y', name: 'y', result: toolSuccess('two') },
        { type: 'turn_finished', finalText: null, usage: null },
      ]);

      expect(agent.context.messages()).toEqual([
        { role: 'user', content: 'read it' },
        {
          role: 'assistant',
          content: '',
          toolCalls: [
            { callId: 'call_x', name: 'x', arguments: { path: 'a.txt' } },
            { callId: 'call_y', name: 'y', arguments: { n: 2 } },
          ],
        },
        { role: 'tool', content: 'contents of a.txt', toolCallId: 'call_x' },
        { role: 'tool', content: 'two', toolCallId: 'call_y' },
      ]);
    });

    it('passes the schemas and the working directory to the executor', async () => {
      const transport = createScriptedTransport([{ kind: 'fragments', fragments: twoCallFragments }]);
      const tools = createFakeToolExecutor({
        x: () => toolSuccess('a'),
        y: () => toolSuccess('b'),
      });
      const agent = createAgent({ transport, tools, workingDirectory: '/work', retry: noWait() });

      await collect(agent.run('go'));

      expect(transport.requests[0]?.tools?.map((t) => t.name)).toEqual(['x', 'y']);
      expect(tools.calls).toEqual([
        { name: 'x', args: { path: 'a.txt' }, workingDirectory: '/work' },
        { name: 'y', args: { n: 2 }, workingDirectory: '/work' },
      ]);
    });

    it('turns a throwing tool into a failed result', async () => {
      const transport = createScriptedTransport([
        {
          kind: 'fragments',
          fragments: [{ toolCalls: [{ index: 0, id: 'call_1', name: 'explode', argumentsDelta: '{}' }] }],
        },
      ]);
      const tools = createFakeToolExecutor({
        explode: () => {
          throw new Error('disk on fire');
        },
      });
      const agent = createAgent({ transport, tools, retry: noWait() });

      const events = await collect(agent.run('try it'));

      expect(events[2]).toEqual({
        type: 'tool_invocation_finished',
        callId: 'call_1',
        name: 'explode',
        result: { success: false, output: '', error: 'disk on fire', metadata: {}, truncated: false },
      });
      expect(agent.context.messages().at(-1)).toEqual({
        role: 'tool',
        content: 'Error: disk on fire\nOutput: ',
        toolCallId: 'call_1',
      });
    });

    it('keeps streamed text alongside the tool calls', async () => {
      const transport = createScriptedTransport([
        {
          kind: 'fragments',
          fragments: [
            { text: 'Let me look.' },
            { toolCalls: [{ index: 0, id: 'call_1', name: 'x', argumentsDelta: '{"path":"b"}' }] },
          ],
        },
      ]);
      const tools = createFakeToolExecutor({ x: () => toolSuccess('b!') });
      const agent = createAgent({ transport, tools, retry: noWait() });

      const events = await collect(agent.run('look'));

      expect(events.map((e) => e.type)).toEqual([
        'turn_started',
        'text_delta',
        'text_finished',
        'tool_invocation_started',
        'tool_invocation_finished',
        'turn_finished',
      ]);
      expect(agent.context.messages()[1]).toEqual({
        role: 'assistant',
        content: 'Let me look.',
        toolCalls: [{ callId: 'call_1', name: 'x', arguments: { path: 'b' } }],
      });
    });

    it('reports an unknown tool when no executor is configured', async () => {
      const transport = createScriptedTransport([
        {
          kind: 'fragments',
          fragments: [{ toolCalls: [{ index: 0, id: 'call_1', name: 'ghost' }] }],
        },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      await collect(agent.run('boo'));

      expect(agent.context.messages().at(-1)).toEqual({
        role: 'tool',
        content: 'Error: Unknown tool: ghost\nOutput: ',
        toolCallId: 'call_1',
      });
    });
  });

  describe('failures', () => {
    it('gives up after four rate limits with backoff 1, 2, 4', async () => {
      const waits: number[] = [];
      const transport = createScriptedTransport([
        { kind: 'fail', error: rateLimitError() },
        { kind: 'fail', error: rateLimitError() },
        { kind: 'fail', error: rateLimitError() },
        { kind: 'fail', error: rateLimitError() },
      ]);
      const agent = createAgent({ transport, retry: noWait(waits) });

      const events = await collect(agent.run('hi'));

      expect(events).toEqual<LifecycleEvent[]>([
        { type: 'turn_started', input: 'hi' },
        {
          type: 'turn_error',
          code: 'RATE_LIMITED',
          message: 'Rate limit exceeded after 4 attempts: Too many requests',
        },
      ]);
      expect(waits).toEqual([1, 2, 4]);
      expect(transport.requests).toHaveLength(4);
      expect(agent.context.messages()).toEqual([{ role: 'user', content: 'hi' }]);
    });

    it('produces the same events after a rate limit as without one', async () => {
      const clean = createAgent({
        transport: createScriptedTransport([{ kind: 'fragments', fragments: textFragments('fine') }]),
        retry: noWait(),
      });
      const retried = createAgent({
        transport: createScriptedTransport([
          { kind: 'fail', error: rateLimitError() },
          { kind: 'fragments', fragments: textFragments('fine') },
        ]),
        retry: noWait(),
      });

      expect(await collect(retried.run('hi'))).toEqual(await collect(clean.run('hi')));
    });

    it('does not retry a stream that fails part-way', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: [{ text: 'Par' }], failAfter: connectionError('socket hang up') },
        { kind: 'fragments', fragments: textFragments('never') },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      const events = await collect(agent.run('hi'));

      expect(events).toEqual<LifecycleEvent[]>([
        { type: 'turn_started', input: 'hi' },
        { type: 'text_delta', text: 'Par' },
        { type: 'turn_error', code: 'CONNECTION_FAILED', message: 'Stream interrupted: socket hang up' },
      ]);
      expect(transport.requests).toHaveLength(1);
      expect(agent.context.size).toBe(1);
    });

    it('ends the turn on a fatal error without retrying', async () => {
      const transport = createScriptedTransport([{ kind: 'fail', error: protocolError('Bad request') }]);
      const agent = createAgent({ transport, retry: noWait() });

      const events = await collect(agent.run('hi'));

      expect(events.at(-1)).toEqual({
        type: 'turn_error',
        code: 'PROVIDER_ERROR',
        message: 'Provider error: Bad request',
      });
      expect(transport.requests).toHaveLength(1);
      expect(agent.state).toBe('idle');
    });
  });

  describe('cancellation and concurrency', () => {
    it('aborts the request and appends nothing when the consumer stops early', async () => {
      const transport = createScriptedTransport([
        { kind: 'fragments', fragments: textFragments('Hello world') },
      ]);
      const agent = createAgent({ transport, retry: noWait() });

      for await (const event of agent.run('hi')) {
        if (event.type === 'text_delta') break;
      }

      expect(transport.abandoned).toBe(1);
      expect(transport.signals[0]?.aborted).toBe(true);
      expect(agent.context.messages()).toEqual([{ role: 'user', content: 'hi' }]);
      expect(agent.state).toBe('idle');
    });

    it('rejects a second turn while one is running', async () => {
      const transport = createScriptedTransport([]);
      const agent = createAgent({ transport, retry: noWait() });

      const first = agent.run('one');
      await first.next();
      expect(agent.state).toBe('streaming');

      await expect(agent.run('two').next()).rejects.toBeInstanceOf(AgentBusyError);

      await first.return(undefined);
      expect(agent.state).toBe('idle');
      expect(agent.context.messages()).toEqual([{ role: 'user', content: 'one' }]);
    });
  });
});

describe('withAgent', () => {
  it('closes the transport when the callback throws', async () => {
    const transport = createScriptedTransport([]);

    await expect(
      withAgent({ transport }, () => Promise.reject(new Error('callback failed'))),
    ).rejects.toThrow('callback failed');
    expect(transport.closed).toBe(true);
  });

  it('returns the callback result', async () => {
    const transport = createScriptedTransport([
      { kind: 'fragments', fragments: textFragments('done') },
    ]);

    const finalText = await withAgent({ transport, retry: noWait() }, async (agent) => {
      const events = await collect(agent.run('go'));
      const last = events.at(-1);
      return last?.type === 'turn_finished' ? last.finalText : null;
    });

    expect(finalText).toBe('done');
    expect(transport.closed).toBe(true);
  });
});
