/**
 * @module domains/agent/streaming/normalizeStreamEvent
 *
 * Maps raw LangGraph `streamEvents` (v2) to ExecutionEvents:
 *
 * - `on_chat_model_stream` with text → `token`
 * - `on_tool_start` → `tool_start` (input decoded from JSON text)
 * - `on_tool_end` → `tool_end` (tool message content, else string form)
 *
 * Everything else is dropped.
 */

import type { StreamEvent } from '@langchain/core/tracers/log_stream';
import { isBaseMessage, type MessageContent } from '@langchain/core/messages';
import type { ExecutionEvent } from '@taskpilot/shared';
import { normalizeToolInput } from '@/domains/agent/tools/normalizeToolArgs';

/**
 * Text of a message content. Anthropic streams content blocks; only text
 * blocks are user-visible (tool-call and input_json_delta blocks are not).
 */
export function extractText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }

  return content
    .map((part) => {
      if ((part.type === 'text' || part.type === 'text_delta') && 'text' in part && typeof part.text === 'string') {
        return part.text;
      }
      return '';
    })
    .join('');
}

function stringifyToolOutput(output: unknown): string {
  if (isBaseMessage(output)) {
    return typeof output.content === 'string' ? output.content : JSON.stringify(output.content);
  }
  if (output === undefined || output === null) {
    return '';
  }
  return typeof output === 'string' ? output : String(output);
}

export function normalizeStreamEvent(event: StreamEvent): ExecutionEvent | null {
  switch (event.event) {
    case 'on_chat_model_stream': {
      const chunk: unknown = event.data.chunk;
      if (!isBaseMessage(chunk)) {
        return null;
      }
      const content = extractText(chunk.content);
      return content ? { type: 'token', content } : null;
    }

    case 'on_tool_start': {
      const input: unknown = event.data.input;
      return { type: 'tool_start', name: event.name, input: normalizeToolInput(input, event.name) };
    }

    case 'on_tool_end': {
      const output: unknown = event.data.output;
      return { type: 'tool_end', name: event.name, output: stringifyToolOutput(output) };
    }

    default:
      return null;
  }
}

/**
 * Normalize a raw event stream, skipping events with no counterpart.
 */
export async function* translateStreamEvents(events: AsyncIterable<StreamEvent>): AsyncGenerator<ExecutionEvent> {
  for await (const event of events) {
    const normalized = normalizeStreamEvent(event);
    if (normalized) {
      yield normalized;
    }
  }
}
