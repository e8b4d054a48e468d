/**
 * Error Response Utilities
 *
 * Helpers for sending standardized error responses. Routes use these
 * instead of calling `res.status().json()` directly.
 *
 * @module shared/utils/error-response
 */

import type { Response } from 'express';
import type { ZodError } from 'zod';
import {
  ErrorCode,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  HTTP_STATUS_NAMES,
  type ApiErrorResponse,
  type ErrorResponseWithStatus,
} from '@taskpilot/shared';
import type { Logger } from 'pino';
import { isDomainError } from '@/domains/projects/errors';
import { CheckpointerNotReadyError } from '@/infrastructure/checkpointer/CheckpointerSupervisor';
import { createChildLogger } from './logger';

const logger = createChildLogger({ service: 'ErrorResponse' });

export type ErrorDetails = Record<string, string | number | boolean>;

/**
 * Build an error response without sending it.
 *
 * @example
 * const { statusCode, body } = createErrorResponse(ErrorCode.CHAT_NOT_FOUND);
 * // statusCode: 404
 * // body: { error: "Not Found", message: "Chat not found or ...", code: "CHAT_NOT_FOUND" }
 */
export function createErrorResponse(
  code: ErrorCode,
  customMessage?: string,
  details?: ErrorDetails
): ErrorResponseWithStatus {
  const statusCode = ERROR_STATUS_CODES[code];
  const body: ApiErrorResponse = {
    error: HTTP_STATUS_NAMES[statusCode] ?? 'Error',
    message: customMessage ?? ERROR_MESSAGES[code],
    code,
  };

  if (details !== undefined) {
    body.details = details;
  }

  return { statusCode, body };
}

/**
 * Send a standardized error response.
 *
 * @example
 * sendError(res, ErrorCode.FOLLOW_UP_NOT_FOUND);
 * // 404 { error: "Not Found", message: "Follow-up not found", code: "FOLLOW_UP_NOT_FOUND" }
 */
export function sendError(res: Response, code: ErrorCode, customMessage?: string, details?: ErrorDetails): void {
  const { statusCode, body } = createErrorResponse(code, customMessage, details);
  res.status(statusCode).json(body);
}

/**
 * 400 VALIDATION_ERROR with one detail per failing field, keyed by its path.
 */
export function sendValidationError(res: Response, error: ZodError): void {
  const details: ErrorDetails = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_';
    if (!(field in details)) {
      details[field] = issue.message;
    }
  }
  sendError(res, ErrorCode.VALIDATION_ERROR, undefined, details);
}

/**
 * Answer an error raised by a service call.
 *
 * Domain errors keep their message (they are written for the caller);
 * checkpoint unavailability is a 503; anything else is logged and hidden
 * behind a generic 500.
 */
export function sendServiceError(res: Response, error: unknown, log: Logger = logger): void {
  if (isDomainError(error)) {
    switch (error.kind) {
      case 'not_found':
        sendError(res, ErrorCode.NOT_FOUND, error.message);
        return;
      case 'conflict':
        sendError(res, ErrorCode.CONFLICT, error.message);
        return;
      case 'service':
        sendError(res, ErrorCode.BAD_REQUEST, error.message);
        return;
    }
  }

  if (error instanceof CheckpointerNotReadyError) {
    log.warn({ err: error }, 'Checkpointer not ready');
    sendError(res, ErrorCode.CHECKPOINTER_NOT_READY);
    return;
  }

  log.error({ err: error }, 'Unexpected error while handling request');
  sendError(res, ErrorCode.INTERNAL_ERROR);
}
