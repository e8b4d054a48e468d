/**
 * @module domains/agent/streaming/SseEncoder
 *
 * Encodes one run as `text/event-stream` frames.
 *
 * State machine: `started → streaming → done | errored`. The metadata frame
 * opens the stream, exactly one terminal frame (`done` or `error`) closes it,
 * and nothing can be written after that.
 *
 * ```
 * event: metadata
 * data: {"thread_id":"7:9f0c..."}
 *
 * data: {"token":"Hello"}
 *
 * event: tool_start
 * data: {"type":"tool_start","name":"task_create","input":{"title":"Test"}}
 *
 * event: done
 * data: [DONE]
 * ```
 */

import {
  STREAM_DONE_SENTINEL,
  type ExecutionEvent,
  type StreamErrorPayload,
  type StreamFrameKind,
  type StreamMetadataPayload,
  type StreamTokenPayload,
} from '@taskpilot/shared';
import { ContentAccumulator } from './ContentAccumulator';
import type { StreamState } from './types';

export class StreamStateError extends Error {
  constructor(operation: string, state: StreamState) {
    super(`Cannot ${operation} in state ${state}`);
    this.name = 'StreamStateError';
  }
}

function frame(data: string, kind?: StreamFrameKind): string {
  return kind ? `event: ${kind}\ndata: ${data}\n\n` : `data: ${data}\n\n`;
}

export class SseEncoder {
  private currentState: StreamState = 'started';
  private readonly accumulator = new ContentAccumulator();

  get state(): StreamState {
    return this.currentState;
  }

  get isFinished(): boolean {
    return this.currentState === 'done' || this.currentState === 'errored';
  }

  /** Token text written so far. */
  get responseText(): string {
    return this.accumulator.getContent();
  }

  metadata(threadId: string): string {
    this.expect('started', 'write metadata');
    this.currentState = 'streaming';
    const payload: StreamMetadataPayload = { thread_id: threadId };
    return frame(JSON.stringify(payload), 'metadata');
  }

  /**
   * Encode one execution event. An `error` event is terminal.
   */
  event(event: ExecutionEvent): string {
    switch (event.type) {
      case 'token': {
        this.expect('streaming', 'write a token');
        this.accumulator.append(event.content);
        const payload: StreamTokenPayload = { token: event.content };
        return frame(JSON.stringify(payload));
      }
      case 'tool_start':
      case 'tool_end':
        this.expect('streaming', `write ${event.type}`);
        return frame(JSON.stringify(event), event.type);
      case 'error':
        return this.error(event.message);
    }
  }

  done(): string {
    this.expect('streaming', 'finish');
    this.currentState = 'done';
    return frame(STREAM_DONE_SENTINEL, 'done');
  }

  /** Allowed before the metadata frame too, for runs that fail to start. */
  error(message: string): string {
    if (this.isFinished) {
      throw new StreamStateError('write an error', this.currentState);
    }
    this.currentState = 'errored';
    const payload: StreamErrorPayload = { error: message };
    return frame(JSON.stringify(payload), 'error');
  }

  private expect(state: StreamState, operation: string): void {
    if (this.currentState !== state) {
      throw new StreamStateError(operation, this.currentState);
    }
  }
}
