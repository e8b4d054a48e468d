/**
 * Project-management entities as the assistant tools consume them.
 *
 * Calendar dates (due dates, sprint and epic bounds) are `YYYY-MM-DD` strings.
 *
 * @module domains/projects/types
 */

import type { TaskStatus, TaskPriority, UserRole, ProjectRole } from '@taskpilot/shared';

export interface User {
  id: number;
  email: string;
  fullName: string | null;
  username: string;
  role: UserRole;
}

export interface Project {
  id: number;
  key: string | null;
  name: string;
  description: string | null;
  creatorId: number;
}

export interface ProjectMember {
  projectId: number;
  userId: number;
  role: ProjectRole;
}

export interface Epic {
  id: number;
  projectId: number;
  title: string;
  description: string | null;
  color: string | null;
  startDate: string | null;
  endDate: string | null;
}

export interface Sprint {
  id: number;
  projectId: number;
  name: string;
  startDate: string | null;
  endDate: string | null;
  isActive: boolean;
}

export interface Task {
  id: number;
  projectId: number;
  epicId: number | null;
  sprintId: number | null;
  parentId: number | null;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  estimate: number | null;
  remaining: number | null;
  dueDate: string | null;
  reporterId: number | null;
  orderIndex: number;
  assigneeIds: number[];
}

export interface CreateProjectInput {
  name: string;
  key?: string;
  description?: string;
  creatorId: number;
}

export interface CreateTaskInput {
  projectId: number;
  title: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string;
  epicId?: number;
  sprintId?: number;
  reporterId: number;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string;
}

/** Task counts keyed by status; statuses with no tasks are absent. */
export type TaskStatusCounts = Partial<Record<TaskStatus, number>>;

/** A task past its due date, with the people to remind. */
export interface OverdueTask {
  task: Task;
  assignees: User[];
}
