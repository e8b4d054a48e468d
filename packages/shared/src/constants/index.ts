/**
 * Constants Index
 *
 * Barrel export for all shared constants.
 *
 * @module @taskpilot/shared/constants
 */

export {
  ErrorCode,
  HTTP_STATUS_NAMES,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  getErrorMessage,
  getErrorStatusCode,
  validateErrorConstants,
} from './errors';

export {
  TASK_STATUSES,
  TASK_PRIORITIES,
  USER_ROLES,
  PROJECT_ROLES,
  FOLLOW_UP_STATUSES,
  CHAT_TITLE_MAX_LENGTH,
  PROMPT_MAX_LENGTH,
} from './domain.constants';
export type {
  TaskStatus,
  TaskPriority,
  UserRole,
  ProjectRole,
  FollowUpStatus,
} from './domain.constants';
