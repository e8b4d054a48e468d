/**
 * Types Index
 *
 * @module @taskpilot/shared/types
 */

export type {
  ApiErrorResponse,
  ErrorResponseWithStatus,
  ValidationErrorDetail,
} from './error.types';
export { isApiErrorResponse, isValidErrorCode } from './error.types';

export type {
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
} from './execution-events.types';
export { STREAM_DONE_SENTINEL } from './execution-events.types';

export type {
  RunAgentResponse,
  ChatSummary,
  ChatMessageRole,
  ChatMessageDto,
  ChatHistoryResponse,
  ConversationTurn,
  FollowUpDto,
  FollowUpStats,
} from './api.types';
