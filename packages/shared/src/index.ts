/**
 * @taskpilot/shared
 *
 * Definitions shared by the Taskpilot backend and its clients: the execution
 * event protocol, API error contract, domain enumerations and request schemas.
 *
 * @module @taskpilot/shared
 *
 * @example
 * ```typescript
 * import type { ExecutionEvent, ApiErrorResponse } from '@taskpilot/shared';
 * import { ErrorCode, runAgentRequestSchema } from '@taskpilot/shared';
 * ```
 */

// ============================================
// Types
// ============================================
export type {
  ApiErrorResponse,
  ErrorResponseWithStatus,
  ValidationErrorDetail,
  ToolInput,
  TokenEvent,
  ToolStartEvent,
  ToolEndEvent,
  ExecutionErrorEvent,
  ExecutionEvent,
  ExecutionEventType,
  StreamFrameKind,
  StreamMetadataPayload,
  StreamTokenPayload,
  StreamErrorPayload,
  RunAgentResponse,
  ChatSummary,
  ChatMessageRole,
  ChatMessageDto,
  ChatHistoryResponse,
  ConversationTurn,
  FollowUpDto,
  FollowUpStats,
} from './types';

export { isApiErrorResponse, isValidErrorCode, STREAM_DONE_SENTINEL } from './types';

// ============================================
// Constants
// ============================================
export {
  ErrorCode,
  HTTP_STATUS_NAMES,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  getErrorMessage,
  getErrorStatusCode,
  validateErrorConstants,
  TASK_STATUSES,
  TASK_PRIORITIES,
  USER_ROLES,
  PROJECT_ROLES,
  FOLLOW_UP_STATUSES,
  CHAT_TITLE_MAX_LENGTH,
  PROMPT_MAX_LENGTH,
} from './constants';
export type { TaskStatus, TaskPriority, UserRole, ProjectRole, FollowUpStatus } from './constants';

// ============================================
// Schemas
// ============================================
export {
  runAgentRequestSchema,
  threadIdParamSchema,
  followUpListQuerySchema,
  followUpIdParamSchema,
  validateSafe,
} from './schemas';
export type { RunAgentRequest, FollowUpListQuery, ValidationResult } from './schemas';
