/**
 * Domain Store contract
 *
 * `DomainStore.transaction` opens a unit of work and hands the callback a
 * `ProjectStore` bound to it: commit when the callback resolves, rollback when
 * it throws. Missing entities raise `NotFoundError`, uniqueness violations
 * `ConflictError`.
 *
 * @module domains/projects/ProjectStore
 */

import type { TaskStatus } from '@taskpilot/shared';
import type {
  User,
  Project,
  ProjectMember,
  Epic,
  Sprint,
  Task,
  CreateProjectInput,
  CreateTaskInput,
  UpdateTaskInput,
  TaskStatusCounts,
  OverdueTask,
} from './types';

/** Page size for project listings. */
export const PROJECT_LIST_LIMIT = 20;

export interface ProjectStore {
  getUser(userId: number): Promise<User | null>;

  /** Admins see every project; members see the projects they belong to. */
  listProjects(userId: number): Promise<Project[]>;
  /** Creates the project and makes the creator its project admin. */
  createProject(input: CreateProjectInput): Promise<Project>;
  getProject(projectId: number): Promise<Project>;
  listProjectMembers(projectId: number): Promise<ProjectMember[]>;

  listEpics(projectId: number): Promise<Epic[]>;
  getEpic(epicId: number): Promise<Epic>;
  listSprints(projectId: number): Promise<Sprint[]>;
  getActiveSprint(projectId: number): Promise<Sprint | null>;

  createTask(input: CreateTaskInput): Promise<Task>;
  getTask(taskId: number): Promise<Task>;
  updateTask(taskId: number, changes: UpdateTaskInput): Promise<Task>;
  deleteTask(taskId: number): Promise<void>;
  /** Idempotent: assigning an assignee again changes nothing. */
  assignTask(taskId: number, userId: number): Promise<void>;
  /** Idempotent: unassigning a non-assignee changes nothing. */
  unassignTask(taskId: number, userId: number): Promise<void>;
  listTasksForAssignee(userId: number, status?: TaskStatus): Promise<Task[]>;
  /** Case-insensitive substring match on title or description. */
  searchTasks(projectId: number, query: string): Promise<Task[]>;
  countTasksByStatus(projectId: number): Promise<TaskStatusCounts>;
  /** Tasks due strictly before `today` (`YYYY-MM-DD`) that are not done. */
  listOverdueTasks(today: string): Promise<OverdueTask[]>;
}

export interface DomainStore {
  transaction<T>(fn: (store: ProjectStore) => Promise<T>): Promise<T>;
  close?(): Promise<void>;
}
