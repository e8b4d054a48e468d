/**
 * SQL Server Domain Store
 *
 * Each `transaction` runs on its own mssql Transaction from the shared pool.
 * Assignee ids are aggregated per task with STRING_AGG (SQL Server 2017+).
 *
 * @module domains/projects/MSSQLDomainStore
 */

import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import type { Logger } from 'pino';
import type { TaskStatus, TaskPriority, UserRole, ProjectRole } from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';
import {
  executeQuery,
  sqlParam,
  withTransaction,
  type SqlExecutor,
  type SqlParams,
} from '@/infrastructure/database/database';
import { ConflictError, NotFoundError, ServiceError } from './errors';
import { PROJECT_LIST_LIMIT, type DomainStore, type ProjectStore } from './ProjectStore';
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

// ============================================================================
// Row types
// ============================================================================

interface UserRow {
  id: number;
  email: string;
  full_name: string | null;
  username: string;
  role: UserRole;
}

interface ProjectRow {
  id: number;
  key: string | null;
  name: string;
  description: string | null;
  creator_id: number;
}

interface MemberRow {
  project_id: number;
  user_id: number;
  role: ProjectRole;
}

interface EpicRow {
  id: number;
  project_id: number;
  title: string;
  description: string | null;
  color: string | null;
  start_date: Date | null;
  end_date: Date | null;
}

interface SprintRow {
  id: number;
  project_id: number;
  name: string;
  start_date: Date | null;
  end_date: Date | null;
  is_active: boolean;
}

interface TaskRow {
  id: number;
  project_id: number;
  epic_id: number | null;
  sprint_id: number | null;
  parent_id: number | null;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  estimate: number | null;
  remaining: number | null;
  due_date: Date | null;
  reporter_id: number | null;
  order_index: number;
  assignee_ids: string | null;
}

const TASK_COLUMNS = `
  t.id, t.project_id, t.epic_id, t.sprint_id, t.parent_id, t.title, t.description,
  t.status, t.priority, t.estimate, t.remaining, t.due_date, t.reporter_id, t.order_index,
  (SELECT STRING_AGG(CAST(ta.user_id AS NVARCHAR(20)), ',') WITHIN GROUP (ORDER BY ta.user_id)
     FROM task_assignees ta WHERE ta.task_id = t.id) AS assignee_ids`;

/** SQL Server unique constraint / unique index violations. */
const UNIQUE_VIOLATION_NUMBERS = new Set([2601, 2627]);

// ============================================================================
// Mapping
// ============================================================================

function toIsoDate(value: Date | null): string | null {
  return value ? value.toISOString().slice(0, 10) : null;
}

function fromIsoDate(value: string): Date {
  return new Date(`${value}T00:00:00.000Z`);
}

function mapUser(row: UserRow): User {
  return { id: row.id, email: row.email, fullName: row.full_name, username: row.username, role: row.role };
}

function mapProject(row: ProjectRow): Project {
  return {
    id: row.id,
    key: row.key,
    name: row.name,
    description: row.description,
    creatorId: row.creator_id,
  };
}

function mapEpic(row: EpicRow): Epic {
  return {
    id: row.id,
    projectId: row.project_id,
    title: row.title,
    description: row.description,
    color: row.color,
    startDate: toIsoDate(row.start_date),
    endDate: toIsoDate(row.end_date),
  };
}

function mapSprint(row: SprintRow): Sprint {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    startDate: toIsoDate(row.start_date),
    endDate: toIsoDate(row.end_date),
    isActive: row.is_active,
  };
}

function mapTask(row: TaskRow): Task {
  return {
    id: row.id,
    projectId: row.project_id,
    epicId: row.epic_id,
    sprintId: row.sprint_id,
    parentId: row.parent_id,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    estimate: row.estimate,
    remaining: row.remaining,
    dueDate: toIsoDate(row.due_date),
    reporterId: row.reporter_id,
    orderIndex: row.order_index,
    assigneeIds: row.assignee_ids ? row.assignee_ids.split(',').map(Number) : [],
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'number' in error &&
    typeof error.number === 'number' &&
    UNIQUE_VIOLATION_NUMBERS.has(error.number)
  );
}

// ============================================================================
// Store
// ============================================================================

class MSSQLProjectStore implements ProjectStore {
  constructor(private readonly executor: SqlExecutor) {}

  private async rows<T>(query: string, params?: SqlParams): Promise<T[]> {
    const result = await executeQuery<T>(this.executor, query, params);
    return result.recordset ?? [];
  }

  async getUser(userId: number): Promise<User | null> {
    const [row] = await this.rows<UserRow>(
      'SELECT id, email, full_name, username, role FROM users WHERE id = @id',
      { id: userId }
    );
    return row ? mapUser(row) : null;
  }

  async listProjects(userId: number): Promise<Project[]> {
    const user = await this.getUser(userId);
    if (!user) {
      throw NotFoundError.entity('User', userId);
    }

    const rows =
      user.role === 'admin'
        ? await this.rows<ProjectRow>(
            'SELECT TOP (@limit) id, [key], name, description, creator_id FROM projects ORDER BY id',
            { limit: PROJECT_LIST_LIMIT }
          )
        : await this.rows<ProjectRow>(
            `SELECT TOP (@limit) p.id, p.[key], p.name, p.description, p.creator_id
               FROM projects p
               JOIN project_members m ON m.project_id = p.id
              WHERE m.user_id = @user_id
              ORDER BY p.id`,
            { limit: PROJECT_LIST_LIMIT, user_id: userId }
          );
    return rows.map(mapProject);
  }

  async createProject(input: CreateProjectInput): Promise<Project> {
    if (!(await this.getUser(input.creatorId))) {
      throw NotFoundError.entity('User', input.creatorId);
    }

    if (input.key) {
      const existing = await this.rows<{ id: number }>('SELECT id FROM projects WHERE [key] = @key', {
        key: input.key,
      });
      if (existing.length > 0) {
        throw new ConflictError(`Project key '${input.key}' already exists.`);
      }
    }

    try {
      const [row] = await this.rows<ProjectRow>(
        `INSERT INTO projects ([key], name, description, creator_id)
         OUTPUT INSERTED.id, INSERTED.[key], INSERTED.name, INSERTED.description, INSERTED.creator_id
         VALUES (@key, @name, @description, @creator_id)`,
        {
          key: input.key ?? null,
          name: input.name,
          description: input.description ?? null,
          creator_id: input.creatorId,
        }
      );
      if (!row) {
        throw new ServiceError('Project could not be created.');
      }

      await this.rows(
        `INSERT INTO project_members (project_id, user_id, role) VALUES (@project_id, @user_id, 'project_admin')`,
        { project_id: row.id, user_id: input.creatorId }
      );

      return mapProject(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Project key '${input.key ?? ''}' already exists.`);
      }
      throw error;
    }
  }

  async getProject(projectId: number): Promise<Project> {
    const [row] = await this.rows<ProjectRow>(
      'SELECT id, [key], name, description, creator_id FROM projects WHERE id = @id',
      { id: projectId }
    );
    if (!row) {
      throw NotFoundError.entity('Project', projectId);
    }
    return mapProject(row);
  }

  async listProjectMembers(projectId: number): Promise<ProjectMember[]> {
    await this.getProject(projectId);
    const rows = await this.rows<MemberRow>(
      'SELECT project_id, user_id, role FROM project_members WHERE project_id = @project_id ORDER BY user_id',
      { project_id: projectId }
    );
    return rows.map((row) => ({ projectId: row.project_id, userId: row.user_id, role: row.role }));
  }

  async listEpics(projectId: number): Promise<Epic[]> {
    await this.getProject(projectId);
    const rows = await this.rows<EpicRow>(
      `SELECT id, project_id, title, description, color, start_date, end_date
         FROM epics WHERE project_id = @project_id ORDER BY id`,
      { project_id: projectId }
    );
    return rows.map(mapEpic);
  }

  async getEpic(epicId: number): Promise<Epic> {
    const [row] = await this.rows<EpicRow>(
      'SELECT id, project_id, title, description, color, start_date, end_date FROM epics WHERE id = @id',
      { id: epicId }
    );
    if (!row) {
      throw NotFoundError.entity('Epic', epicId);
    }
    return mapEpic(row);
  }

  async listSprints(projectId: number): Promise<Sprint[]> {
    await this.getProject(projectId);
    const rows = await this.rows<SprintRow>(
      `SELECT id, project_id, name, start_date, end_date, is_active
         FROM sprints WHERE project_id = @project_id ORDER BY id`,
      { project_id: projectId }
    );
    return rows.map(mapSprint);
  }

  async getActiveSprint(projectId: number): Promise<Sprint | null> {
    await this.getProject(projectId);
    const [row] = await this.rows<SprintRow>(
      `SELECT TOP (1) id, project_id, name, start_date, end_date, is_active
         FROM sprints WHERE project_id = @project_id AND is_active = 1 ORDER BY id`,
      { project_id: projectId }
    );
    return row ? mapSprint(row) : null;
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    await this.getProject(input.projectId);

    if (input.epicId !== undefined) {
      const epic = await this.getEpic(input.epicId);
      if (epic.projectId !== input.projectId) {
        throw new ServiceError(`Epic ${input.epicId} does not belong to project ${input.projectId}.`);
      }
    }

    if (input.sprintId !== undefined) {
      const [sprint] = await this.rows<{ project_id: number }>('SELECT project_id FROM sprints WHERE id = @id', {
        id: input.sprintId,
      });
      if (!sprint) {
        throw NotFoundError.entity('Sprint', input.sprintId);
      }
      if (sprint.project_id !== input.projectId) {
        throw new ServiceError(`Sprint ${input.sprintId} does not belong to project ${input.projectId}.`);
      }
    }

    const [inserted] = await this.rows<{ id: number }>(
      `INSERT INTO tasks (project_id, epic_id, sprint_id, title, description, status, priority, due_date, reporter_id, order_index)
       OUTPUT INSERTED.id
       VALUES (@project_id, @epic_id, @sprint_id, @title, @description, @status, @priority, @due_date, @reporter_id, 0)`,
      {
        project_id: input.projectId,
        epic_id: input.epicId ?? null,
        sprint_id: input.sprintId ?? null,
        title: input.title,
        description: input.description ?? null,
        status: input.status ?? 'todo',
        priority: input.priority ?? 'medium',
        due_date: sqlParam(sql.Date, input.dueDate ? fromIsoDate(input.dueDate) : null),
        reporter_id: input.reporterId,
      }
    );
    if (!inserted) {
      throw new ServiceError('Task could not be created.');
    }

    return this.getTask(inserted.id);
  }

  async getTask(taskId: number): Promise<Task> {
    const [row] = await this.rows<TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks t WHERE t.id = @id`, { id: taskId });
    if (!row) {
      throw NotFoundError.entity('Task', taskId);
    }
    return mapTask(row);
  }

  async updateTask(taskId: number, changes: UpdateTaskInput): Promise<Task> {
    await this.getTask(taskId);

    const assignments: string[] = [];
    const params: SqlParams = { id: taskId };

    if (changes.title !== undefined) {
      assignments.push('title = @title');
      params.title = changes.title;
    }
    if (changes.description !== undefined) {
      assignments.push('description = @description');
      params.description = changes.description;
    }
    if (changes.status !== undefined) {
      assignments.push('status = @status');
      params.status = changes.status;
    }
    if (changes.priority !== undefined) {
      assignments.push('priority = @priority');
      params.priority = changes.priority;
    }
    if (changes.dueDate !== undefined) {
      assignments.push('due_date = @due_date');
      params.due_date = sqlParam(sql.Date, fromIsoDate(changes.dueDate));
    }

    if (assignments.length > 0) {
      assignments.push('updated_at = SYSUTCDATETIME()');
      await this.rows(`UPDATE tasks SET ${assignments.join(', ')} WHERE id = @id`, params);
    }

    return this.getTask(taskId);
  }

  async deleteTask(taskId: number): Promise<void> {
    await this.getTask(taskId);
    await this.rows('DELETE FROM tasks WHERE id = @id', { id: taskId });
  }

  async assignTask(taskId: number, userId: number): Promise<void> {
    await this.getTask(taskId);
    if (!(await this.getUser(userId))) {
      throw NotFoundError.entity('User', userId);
    }
    await this.rows(
      `IF NOT EXISTS (SELECT 1 FROM task_assignees WHERE task_id = @task_id AND user_id = @user_id)
         INSERT INTO task_assignees (task_id, user_id) VALUES (@task_id, @user_id)`,
      { task_id: taskId, user_id: userId }
    );
  }

  async unassignTask(taskId: number, userId: number): Promise<void> {
    await this.getTask(taskId);
    await this.rows('DELETE FROM task_assignees WHERE task_id = @task_id AND user_id = @user_id', {
      task_id: taskId,
      user_id: userId,
    });
  }

  async listTasksForAssignee(userId: number, status?: TaskStatus): Promise<Task[]> {
    const rows = await this.rows<TaskRow>(
      `SELECT ${TASK_COLUMNS}
         FROM tasks t
        WHERE EXISTS (SELECT 1 FROM task_assignees ta WHERE ta.task_id = t.id AND ta.user_id = @user_id)
          AND (@status IS NULL OR t.status = @status)
        ORDER BY t.id`,
      { user_id: userId, status: status ?? null }
    );
    return rows.map(mapTask);
  }

  async searchTasks(projectId: number, query: string): Promise<Task[]> {
    await this.getProject(projectId);
    const rows = await this.rows<TaskRow>(
      `SELECT ${TASK_COLUMNS}
         FROM tasks t
        WHERE t.project_id = @project_id
          AND (LOWER(t.title) LIKE @pattern ESCAPE '\\' OR LOWER(t.description) LIKE @pattern ESCAPE '\\')
        ORDER BY t.id`,
      { project_id: projectId, pattern: `%${query.toLowerCase().replace(/[\\%_[]/g, (c) => `\\${c}`)}%` }
    );
    return rows.map(mapTask);
  }

  async countTasksByStatus(projectId: number): Promise<TaskStatusCounts> {
    await this.getProject(projectId);
    const rows = await this.rows<{ status: TaskStatus; total: number }>(
      'SELECT status, COUNT(*) AS total FROM tasks WHERE project_id = @project_id GROUP BY status',
      { project_id: projectId }
    );
    const counts: TaskStatusCounts = {};
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  async listOverdueTasks(today: string): Promise<OverdueTask[]> {
    const tasks = (
      await this.rows<TaskRow>(
        `SELECT ${TASK_COLUMNS}
           FROM tasks t
          WHERE t.due_date < @today AND t.status <> 'done'
          ORDER BY t.id`,
        { today: sqlParam(sql.Date, fromIsoDate(today)) }
      )
    ).map(mapTask);

    const result: OverdueTask[] = [];
    for (const task of tasks) {
      const assignees = await this.rows<UserRow>(
        `SELECT u.id, u.email, u.full_name, u.username, u.role
           FROM users u JOIN task_assignees ta ON ta.user_id = u.id
          WHERE ta.task_id = @task_id ORDER BY u.id`,
        { task_id: task.id }
      );
      result.push({ task, assignees: assignees.map(mapUser) });
    }
    return result;
  }
}

export class MSSQLDomainStore implements DomainStore {
  private readonly log: Logger;

  constructor(
    private readonly pool: ConnectionPool,
    deps?: { logger?: Logger }
  ) {
    this.log = deps?.logger ?? createChildLogger({ service: 'MSSQLDomainStore' });
  }

  async transaction<T>(fn: (store: ProjectStore) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.pool, (transaction) => fn(new MSSQLProjectStore(transaction)));
    } catch (error) {
      this.log.debug({ err: error }, 'Domain transaction rolled back');
      throw error;
    }
  }
}
