/**
 * @module encodeExecutionStream.test
 *
 * SSE framing of execution events, terminal frames and the persistence hand-off.
 */

import { describe, it, expect, vi } from 'vitest';
import type { ExecutionEvent } from '@taskpilot/shared';
import { encodeExecutionStream, SseEncoder, translateStreamEvents } from '@/domains/agent/streaming';
import { rawTrace } from '../../../../fixtures/streamEvents';
import { createTestLogger } from '../../../../helpers/mockPinoFactory';

const METADATA = 'event: metadata\ndata: {"thread_id":"7:abc"}\n\n';
const DONE = 'event: done\ndata: [DONE]\n\n';

async function collect(frames: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const frame of frames) {
    out.push(frame);
  }
  return out;
}

async function* events(...items: ExecutionEvent[]): AsyncGenerator<ExecutionEvent> {
  yield* items;
}

describe('encodeExecutionStream', () => {
  it('frames the token / tool / token trace', async () => {
    async function* raw() {
      yield* rawTrace();
    }

    const frames = await collect(
      encodeExecutionStream({ threadId: '7:abc', events: translateStreamEvents(raw()) })
    );

    expect(frames).toEqual([
      METADATA,
      'data: {"token":"Hello"}\n\n',
      'event: tool_start\ndata: {"type":"tool_start","name":"task_create","input":{"title":"Test"}}\n\n',
      'event: tool_end\ndata: {"type":"tool_end","name":"task_create","output":"Done"}\n\n',
      'data: {"token":" World"}\n\n',
      DONE,
    ]);
  });

  it('hands the full response to persistence after the done frame', async () => {
    const seen: string[] = [];
    const onComplete = vi.fn(async () => {
      seen.push('persisted');
    });

    for await (const frame of encodeExecutionStream({
      threadId: '7:abc',
      events: events({ type: 'token', content: 'Task 4 ' }, { type: 'token', content: 'created.' }),
      onComplete,
    })) {
      seen.push(frame);
    }

    expect(seen.slice(-2)).toEqual([DONE, 'persisted']);
    expect(onComplete).toHaveBeenCalledWith({ threadId: '7:abc', response: 'Task 4 created.' });
  });

  it('logs a persistence failure without changing the frames', async () => {
    const { testLogger, hasLogWithMessage } = createTestLogger();

    const frames = await collect(
      encodeExecutionStream({
        threadId: '7:abc',
        events: events({ type: 'token', content: 'Hi' }),
        onComplete: async () => {
          throw new Error('database offline');
        },
        logger: testLogger,
      })
    );

    expect(frames).toEqual([METADATA, 'data: {"token":"Hi"}\n\n', DONE]);
    expect(hasLogWithMessage('Failed to persist completed exchange')).toBe(true);
  });

  it('ends with a single error frame when the run fails', async () => {
    async function* failing(): AsyncGenerator<ExecutionEvent> {
      yield { type: 'token', content: 'Partial' };
      throw new Error('model exploded');
    }
    const onComplete = vi.fn(async () => undefined);

    const frames = await collect(
      encodeExecutionStream({ threadId: '7:abc', events: failing(), onComplete, logger: createTestLogger().testLogger })
    );

    expect(frames).toEqual([METADATA, 'data: {"token":"Partial"}\n\n', 'event: error\ndata: {"error":"model exploded"}\n\n']);
    expect(onComplete).not.toHaveBeenCalled();
  });

  it('stops at an error event', async () => {
    const frames = await collect(
      encodeExecutionStream({
        threadId: '7:abc',
        events: events({ type: 'error', message: 'rate limited' }, { type: 'token', content: 'late' }),
      })
    );

    expect(frames).toEqual([METADATA, 'event: error\ndata: {"error":"rate limited"}\n\n']);
  });

  it('propagates cancellation without a terminal frame', async () => {
    async function* cancelled(): AsyncGenerator<ExecutionEvent> {
      yield { type: 'token', content: 'Hel' };
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      throw error;
    }
    const frames: string[] = [];

    await expect(async () => {
      for await (const frame of encodeExecutionStream({ threadId: '7:abc', events: cancelled() })) {
        frames.push(frame);
      }
    }).rejects.toThrow('The operation was aborted');
    expect(frames).toEqual([METADATA, 'data: {"token":"Hel"}\n\n']);
  });
});

describe('SseEncoder', () => {
  it('moves from started to streaming to done', () => {
    const encoder = new SseEncoder();
    expect(encoder.state).toBe('started');

    encoder.metadata('7:abc');
    expect(encoder.state).toBe('streaming');

    expect(encoder.done()).toBe(DONE);
    expect(encoder.state).toBe('done');
  });

  it('rejects tokens before the metadata frame', () => {
    expect(() => new SseEncoder().event({ type: 'token', content: 'x' })).toThrow(
      'Cannot write a token in state started'
    );
  });

  it('writes exactly one terminal frame', () => {
    const encoder = new SseEncoder();
    encoder.metadata('7:abc');
    encoder.done();

    expect(() => encoder.done()).toThrow('Cannot finish in state done');
    expect(() => encoder.error('late')).toThrow('Cannot write an error in state done');
  });

  it('escapes token text as JSON', () => {
    const encoder = new SseEncoder();
    encoder.metadata('7:abc');

    expect(encoder.event({ type: 'token', content: 'line "one"\nline two' })).toBe(
      'data: {"token":"line \\"one\\"\\nline two"}\n\n'
    );
  });
});
