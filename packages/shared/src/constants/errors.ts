/**
 * Error Constants
 *
 * Centralized error codes, messages, and HTTP status mappings.
 * Every API error response carries one of these codes so clients can
 * branch on `code` instead of parsing messages.
 *
 * @module @taskpilot/shared/constants/errors
 */

/**
 * Machine-readable error codes returned in API error bodies.
 */
export enum ErrorCode {
  // 400
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_PARAMETER = 'INVALID_PARAMETER',

  // 401
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_TOKEN = 'INVALID_TOKEN',

  // 404
  NOT_FOUND = 'NOT_FOUND',
  CHAT_NOT_FOUND = 'CHAT_NOT_FOUND',
  FOLLOW_UP_NOT_FOUND = 'FOLLOW_UP_NOT_FOUND',

  // 409
  CONFLICT = 'CONFLICT',
  ALREADY_ACKNOWLEDGED = 'ALREADY_ACKNOWLEDGED',

  // 500
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  AGENT_ERROR = 'AGENT_ERROR',

  // 503
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  CHECKPOINTER_NOT_READY = 'CHECKPOINTER_NOT_READY',
}

/**
 * Human-readable names for the HTTP statuses used by the API.
 */
export const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

/**
 * Default message for each error code. Safe to show to end users.
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.BAD_REQUEST]: 'The request could not be processed',
  [ErrorCode.VALIDATION_ERROR]: 'Request validation failed',
  [ErrorCode.INVALID_PARAMETER]: 'A request parameter is invalid',

  [ErrorCode.UNAUTHORIZED]: 'Authentication required',
  [ErrorCode.INVALID_TOKEN]: 'Invalid or expired token',

  [ErrorCode.NOT_FOUND]: 'Resource not found',
  [ErrorCode.CHAT_NOT_FOUND]: 'Chat not found or you do not have permission to access it.',
  [ErrorCode.FOLLOW_UP_NOT_FOUND]: 'Follow-up not found',

  [ErrorCode.CONFLICT]: 'The request conflicts with the current state of the resource',
  [ErrorCode.ALREADY_ACKNOWLEDGED]: 'Follow-up has already been acknowledged',

  [ErrorCode.INTERNAL_ERROR]: 'An unexpected error occurred',
  [ErrorCode.AGENT_ERROR]: 'The assistant failed to produce a response',

  [ErrorCode.SERVICE_UNAVAILABLE]: 'Service temporarily unavailable',
  [ErrorCode.CHECKPOINTER_NOT_READY]: 'Conversation storage is not ready yet, please retry shortly',
};

/**
 * HTTP status code for each error code.
 */
export const ERROR_STATUS_CODES: Record<ErrorCode, number> = {
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_PARAMETER]: 400,

  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,

  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.CHAT_NOT_FOUND]: 404,
  [ErrorCode.FOLLOW_UP_NOT_FOUND]: 404,

  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.ALREADY_ACKNOWLEDGED]: 409,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.AGENT_ERROR]: 500,

  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.CHECKPOINTER_NOT_READY]: 503,
};

export function getHttpStatusName(statusCode: number): string {
  return HTTP_STATUS_NAMES[statusCode] ?? 'Error';
}

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

export function getErrorStatusCode(code: ErrorCode): number {
  return ERROR_STATUS_CODES[code];
}

/**
 * Check that every error code has a message and a status with a known name.
 * Returns the problems found; an empty list means the tables are consistent.
 */
export function validateErrorConstants(): string[] {
  const problems: string[] = [];

  for (const code of Object.values(ErrorCode)) {
    if (!ERROR_MESSAGES[code]) {
      problems.push(`Missing message for ${code}`);
    }
    const status = ERROR_STATUS_CODES[code];
    if (status === undefined) {
      problems.push(`Missing status code for ${code}`);
    } else if (!HTTP_STATUS_NAMES[status]) {
      problems.push(`Missing status name for ${status} (${code})`);
    }
  }

  return problems;
}
