/**
 * Execution Event Types
 *
 * The normalized events the assistant runtime produces while it works, and
 * the frame kinds used to carry them over `text/event-stream`.
 *
 * Order guarantees: a `tool_end` never precedes the `tool_start` of the same
 * invocation, and `token` events arrive in generation order.
 *
 * Wire format (one frame per event, blank line terminated):
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
 *
 * @module @taskpilot/shared/types/execution-events
 */

/** Tool arguments as reported by the runtime; plain text when they are not JSON. */
export type ToolInput = Record<string, unknown> | string;

export interface TokenEvent {
  type: 'token';
  content: string;
}

export interface ToolStartEvent {
  type: 'tool_start';
  name: string;
  input: ToolInput;
}

export interface ToolEndEvent {
  type: 'tool_end';
  name: string;
  output: string;
}

export interface ExecutionErrorEvent {
  type: 'error';
  message: string;
}

export type ExecutionEvent = TokenEvent | ToolStartEvent | ToolEndEvent | ExecutionErrorEvent;

export type ExecutionEventType = ExecutionEvent['type'];

/** `event:` kinds that appear on the wire. Token frames carry no kind. */
export type StreamFrameKind = 'metadata' | 'tool_start' | 'tool_end' | 'done' | 'error';

/** Payload of the first frame of every stream. */
export interface StreamMetadataPayload {
  thread_id: string;
}

/** Payload of a plain token frame. The key differs from `TokenEvent.content` on purpose. */
export interface StreamTokenPayload {
  token: string;
}

export interface StreamErrorPayload {
  error: string;
}

/** Literal payload of the terminal success frame. */
export const STREAM_DONE_SENTINEL = '[DONE]';
