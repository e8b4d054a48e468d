/**
 * @module domains/agent/streaming
 *
 * Raw LangGraph events → ExecutionEvents → `text/event-stream` frames.
 */

export type { StreamState, CompletedExchange, ExchangeCompletionHandler } from './types';
export { normalizeStreamEvent, translateStreamEvents, extractText } from './normalizeStreamEvent';
export { SseEncoder, StreamStateError } from './SseEncoder';
export { encodeExecutionStream } from './encodeExecutionStream';
export type { EncodeExecutionStreamOptions } from './encodeExecutionStream';
