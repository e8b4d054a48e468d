/**
 * Request Validation Schemas
 *
 * Zod schemas for validating HTTP request bodies, params and query strings
 * of the assistant API.
 *
 * @module @taskpilot/shared/schemas
 */

import { z } from 'zod';
import { FOLLOW_UP_STATUSES, PROMPT_MAX_LENGTH } from '../constants/domain.constants';

/**
 * Body of POST /api/agent/run and /api/agent/run/stream.
 * Omitting `threadId` starts a new chat.
 */
export const runAgentRequestSchema = z.object({
  prompt: z
    .string()
    .trim()
    .min(1, 'Prompt cannot be empty')
    .max(PROMPT_MAX_LENGTH, `Prompt too long (max ${PROMPT_MAX_LENGTH} chars)`),
  threadId: z.string().min(1, 'Thread ID cannot be empty').max(255).optional(),
});

export type RunAgentRequest = z.infer<typeof runAgentRequestSchema>;

export const threadIdParamSchema = z.object({
  threadId: z.string().min(1).max(255),
});

export const followUpListQuerySchema = z.object({
  status: z.enum(FOLLOW_UP_STATUSES).optional(),
});

export type FollowUpListQuery = z.infer<typeof followUpListQuerySchema>;

export const followUpIdParamSchema = z.object({
  id: z.coerce.number().int().positive('Follow-up ID must be a positive integer'),
});

/**
 * Result of a non-throwing validation.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Validate without throwing.
 *
 * @example
 * const result = validateSafe(runAgentRequestSchema, req.body);
 * if (!result.success) {
 *   return sendValidationError(res, result.error);
 * }
 */
export function validateSafe<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): ValidationResult<z.infer<T>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
