/**
 * Error Response Type Definitions
 *
 * Types for standardized API error responses.
 * All error responses across the application follow these interfaces.
 *
 * @module @taskpilot/shared/types/error
 */

import { ErrorCode } from '../constants/errors';

/**
 * Standard API Error Response
 *
 * @example
 * // Response body for a 404 error
 * {
 *   "error": "Not Found",
 *   "message": "Chat not found or you do not have permission to access it.",
 *   "code": "CHAT_NOT_FOUND"
 * }
 */
export interface ApiErrorResponse {
  /** Human-readable status name (e.g., "Bad Request", "Not Found"). */
  error: string;

  /** Safe for display to end users. */
  message: string;

  /** Use this for programmatic error handling. */
  code: ErrorCode;

  details?: Record<string, string | number | boolean>;
}

/**
 * Used internally to build error responses without sending them.
 */
export interface ErrorResponseWithStatus {
  statusCode: number;
  body: ApiErrorResponse;
}

/**
 * One failed field of a request body.
 */
export interface ValidationErrorDetail {
  field: string;
  message: string;
}

function isErrorCode(value: unknown): value is ErrorCode {
  return Object.values<unknown>(ErrorCode).includes(value);
}

/**
 * Type guard to check if an object is an ApiErrorResponse
 */
export function isApiErrorResponse(obj: unknown): obj is ApiErrorResponse {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  return (
    'error' in obj &&
    typeof obj.error === 'string' &&
    'message' in obj &&
    typeof obj.message === 'string' &&
    'code' in obj &&
    isErrorCode(obj.code)
  );
}

/**
 * Type guard to check if error code exists
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return isErrorCode(code);
}
