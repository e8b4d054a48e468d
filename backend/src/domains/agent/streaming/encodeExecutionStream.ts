/**
 * @module domains/agent/streaming/encodeExecutionStream
 *
 * Turns the runtime's ExecutionEvents into SSE frames. After the `done` frame
 * the completed exchange goes to the persistence callback; a failing callback
 * is logged only, the client already has its answer.
 */

import type { ExecutionEvent } from '@taskpilot/shared';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { isAbortError } from '@/shared/utils/retry';
import { SseEncoder } from './SseEncoder';
import type { ExchangeCompletionHandler } from './types';

export interface EncodeExecutionStreamOptions {
  threadId: string;
  events: AsyncIterable<ExecutionEvent>;
  onComplete?: ExchangeCompletionHandler;
  logger?: Logger;
}

export async function* encodeExecutionStream(options: EncodeExecutionStreamOptions): AsyncGenerator<string> {
  const { threadId, events, onComplete } = options;
  const log = options.logger ?? createChildLogger({ service: 'EventStreamTranslator' });
  const encoder = new SseEncoder();

  yield encoder.metadata(threadId);

  try {
    for await (const event of events) {
      yield encoder.event(event);
      if (encoder.isFinished) {
        return;
      }
    }
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    log.error({ err: error, threadId }, 'Execution stream failed');
    yield encoder.error(error instanceof Error ? error.message : String(error));
    return;
  }

  yield encoder.done();

  if (!onComplete) {
    return;
  }
  try {
    await onComplete({ threadId, response: encoder.responseText });
  } catch (error) {
    log.error({ err: error, threadId }, 'Failed to persist completed exchange');
  }
}
