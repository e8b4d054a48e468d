/**
 * Domain enumerations shared by the API, the assistant tools and clients.
 *
 * @module @taskpilot/shared/constants/domain
 */

export const TASK_STATUSES = ['draft', 'todo', 'in_progress', 'in_review', 'done', 'blocked'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'critical', 'blocker'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const USER_ROLES = ['admin', 'member'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const PROJECT_ROLES = ['project_admin', 'member', 'viewer'] as const;
export type ProjectRole = (typeof PROJECT_ROLES)[number];

export const FOLLOW_UP_STATUSES = ['pending', 'sent', 'acknowledged'] as const;
export type FollowUpStatus = (typeof FOLLOW_UP_STATUSES)[number];

/** Chat titles are cut to this many characters of the first prompt. */
export const CHAT_TITLE_MAX_LENGTH = 50;

export const PROMPT_MAX_LENGTH = 10000;
