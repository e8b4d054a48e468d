/**
 * @module domains/agent/streaming/types
 */

/**
 * Encoder states. `done` and `errored` are terminal.
 */
export type StreamState = 'started' | 'streaming' | 'done' | 'errored';

/**
 * A run that reached its `done` frame, handed to persistence.
 */
export interface CompletedExchange {
  threadId: string;
  /** Concatenated token text of the run. */
  response: string;
}

export type ExchangeCompletionHandler = (exchange: CompletedExchange) => Promise<void>;
