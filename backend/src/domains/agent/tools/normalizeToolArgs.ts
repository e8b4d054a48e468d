/**
 * @module domains/agent/tools/normalizeToolArgs
 *
 * Tool input as reported by the event stream can arrive as an object or as
 * the JSON text of one, depending on the provider. Normalize to an object
 * where possible, otherwise keep the text.
 */

import type { ToolInput } from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'normalizeToolArgs' });

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * @param input - Raw `data.input` of an `on_tool_start` event
 * @param toolName - For logging context
 */
export function normalizeToolInput(input: unknown, toolName?: string): ToolInput {
  if (isPlainObject(input)) {
    return input;
  }

  if (typeof input === 'string') {
    try {
      const parsed: unknown = JSON.parse(input);
      if (isPlainObject(parsed)) {
        return parsed;
      }
    } catch {
      logger.debug({ toolName, inputPreview: input.substring(0, 100) }, 'Tool input is not JSON, keeping text');
    }
    return input;
  }

  if (input === undefined || input === null) {
    return {};
  }

  logger.warn({ toolName, inputType: typeof input }, 'Tool input had unexpected type, keeping its string form');
  return String(input);
}
