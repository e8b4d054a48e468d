/**
 * In-memory Domain Store
 *
 * Backs the `memory` storage driver and the test suites. Transactions are
 * serialized; a failed transaction restores the snapshot taken when it began.
 *
 * @module domains/projects/InMemoryDomainStore
 */

import type { TaskStatus } from '@taskpilot/shared';
import { KeyedMutex } from '@/shared/utils/KeyedMutex';
import { ConflictError, NotFoundError, ServiceError } from './errors';
import { PROJECT_LIST_LIMIT, type DomainStore, type ProjectStore } from './ProjectStore';
import { parseDomainSeed, type DomainSeedInput } from './seed';
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

interface DomainState {
  users: User[];
  projects: Project[];
  members: ProjectMember[];
  epics: Epic[];
  sprints: Sprint[];
  tasks: Task[];
}

const byId = (a: { id: number }, b: { id: number }) => a.id - b.id;

function nextId(rows: Array<{ id: number }>): number {
  return rows.reduce((max, row) => Math.max(max, row.id), 0) + 1;
}

/**
 * ProjectStore over one transaction's view of the state. Returns copies.
 */
class InMemoryProjectStore implements ProjectStore {
  constructor(private readonly state: DomainState) {}

  async getUser(userId: number): Promise<User | null> {
    const user = this.state.users.find((u) => u.id === userId);
    return user ? structuredClone(user) : null;
  }

  async listProjects(userId: number): Promise<Project[]> {
    const user = this.requireUser(userId);
    const visible =
      user.role === 'admin'
        ? this.state.projects
        : this.state.projects.filter((p) =>
            this.state.members.some((m) => m.projectId === p.id && m.userId === userId)
          );
    return structuredClone([...visible].sort(byId).slice(0, PROJECT_LIST_LIMIT));
  }

  async createProject(input: CreateProjectInput): Promise<Project> {
    this.requireUser(input.creatorId);

    if (input.key && this.state.projects.some((p) => p.key === input.key)) {
      throw new ConflictError(`Project key '${input.key}' already exists.`);
    }

    const project: Project = {
      id: nextId(this.state.projects),
      key: input.key ?? null,
      name: input.name,
      description: input.description ?? null,
      creatorId: input.creatorId,
    };
    this.state.projects.push(project);
    this.state.members.push({ projectId: project.id, userId: input.creatorId, role: 'project_admin' });

    return structuredClone(project);
  }

  async getProject(projectId: number): Promise<Project> {
    return structuredClone(this.requireProject(projectId));
  }

  async listProjectMembers(projectId: number): Promise<ProjectMember[]> {
    this.requireProject(projectId);
    return structuredClone(
      this.state.members.filter((m) => m.projectId === projectId).sort((a, b) => a.userId - b.userId)
    );
  }

  async listEpics(projectId: number): Promise<Epic[]> {
    this.requireProject(projectId);
    return structuredClone(this.state.epics.filter((e) => e.projectId === projectId).sort(byId));
  }

  async getEpic(epicId: number): Promise<Epic> {
    const epic = this.state.epics.find((e) => e.id === epicId);
    if (!epic) {
      throw NotFoundError.entity('Epic', epicId);
    }
    return structuredClone(epic);
  }

  async listSprints(projectId: number): Promise<Sprint[]> {
    this.requireProject(projectId);
    return structuredClone(this.state.sprints.filter((s) => s.projectId === projectId).sort(byId));
  }

  async getActiveSprint(projectId: number): Promise<Sprint | null> {
    this.requireProject(projectId);
    const sprint = this.state.sprints.find((s) => s.projectId === projectId && s.isActive);
    return sprint ? structuredClone(sprint) : null;
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    this.requireProject(input.projectId);

    if (input.epicId !== undefined) {
      const epic = this.state.epics.find((e) => e.id === input.epicId);
      if (!epic) {
        throw NotFoundError.entity('Epic', input.epicId);
      }
      if (epic.projectId !== input.projectId) {
        throw new ServiceError(`Epic ${input.epicId} does not belong to project ${input.projectId}.`);
      }
    }

    if (input.sprintId !== undefined) {
      const sprint = this.state.sprints.find((s) => s.id === input.sprintId);
      if (!sprint) {
        throw NotFoundError.entity('Sprint', input.sprintId);
      }
      if (sprint.projectId !== input.projectId) {
        throw new ServiceError(`Sprint ${input.sprintId} does not belong to project ${input.projectId}.`);
      }
    }

    const task: Task = {
      id: nextId(this.state.tasks),
      projectId: input.projectId,
      epicId: input.epicId ?? null,
      sprintId: input.sprintId ?? null,
      parentId: null,
      title: input.title,
      description: input.description ?? null,
      status: input.status ?? 'todo',
      priority: input.priority ?? 'medium',
      estimate: null,
      remaining: null,
      dueDate: input.dueDate ?? null,
      reporterId: input.reporterId,
      orderIndex: 0,
      assigneeIds: [],
    };
    this.state.tasks.push(task);

    return structuredClone(task);
  }

  async getTask(taskId: number): Promise<Task> {
    return structuredClone(this.requireTask(taskId));
  }

  async updateTask(taskId: number, changes: UpdateTaskInput): Promise<Task> {
    const task = this.requireTask(taskId);

    if (changes.title !== undefined) task.title = changes.title;
    if (changes.description !== undefined) task.description = changes.description;
    if (changes.status !== undefined) task.status = changes.status;
    if (changes.priority !== undefined) task.priority = changes.priority;
    if (changes.dueDate !== undefined) task.dueDate = changes.dueDate;

    return structuredClone(task);
  }

  async deleteTask(taskId: number): Promise<void> {
    this.requireTask(taskId);
    this.state.tasks = this.state.tasks.filter((t) => t.id !== taskId);
  }

  async assignTask(taskId: number, userId: number): Promise<void> {
    const task = this.requireTask(taskId);
    this.requireUser(userId);
    if (!task.assigneeIds.includes(userId)) {
      task.assigneeIds.push(userId);
    }
  }

  async unassignTask(taskId: number, userId: number): Promise<void> {
    const task = this.requireTask(taskId);
    task.assigneeIds = task.assigneeIds.filter((id) => id !== userId);
  }

  async listTasksForAssignee(userId: number, status?: TaskStatus): Promise<Task[]> {
    return structuredClone(
      this.state.tasks
        .filter((t) => t.assigneeIds.includes(userId) && (status === undefined || t.status === status))
        .sort(byId)
    );
  }

  async searchTasks(projectId: number, query: string): Promise<Task[]> {
    this.requireProject(projectId);
    const needle = query.toLowerCase();
    return structuredClone(
      this.state.tasks
        .filter(
          (t) =>
            t.projectId === projectId &&
            (t.title.toLowerCase().includes(needle) || (t.description ?? '').toLowerCase().includes(needle))
        )
        .sort(byId)
    );
  }

  async countTasksByStatus(projectId: number): Promise<TaskStatusCounts> {
    this.requireProject(projectId);
    const counts: TaskStatusCounts = {};
    for (const task of this.state.tasks) {
      if (task.projectId === projectId) {
        counts[task.status] = (counts[task.status] ?? 0) + 1;
      }
    }
    return counts;
  }

  async listOverdueTasks(today: string): Promise<OverdueTask[]> {
    return this.state.tasks
      .filter((t) => t.dueDate !== null && t.dueDate < today && t.status !== 'done')
      .sort(byId)
      .map((task) => ({
        task: structuredClone(task),
        assignees: structuredClone(this.state.users.filter((u) => task.assigneeIds.includes(u.id)).sort(byId)),
      }));
  }

  private requireUser(userId: number): User {
    const user = this.state.users.find((u) => u.id === userId);
    if (!user) {
      throw NotFoundError.entity('User', userId);
    }
    return user;
  }

  private requireProject(projectId: number): Project {
    const project = this.state.projects.find((p) => p.id === projectId);
    if (!project) {
      throw NotFoundError.entity('Project', projectId);
    }
    return project;
  }

  private requireTask(taskId: number): Task {
    const task = this.state.tasks.find((t) => t.id === taskId);
    if (!task) {
      throw NotFoundError.entity('Task', taskId);
    }
    return task;
  }
}

export class InMemoryDomainStore implements DomainStore {
  private state: DomainState;
  private readonly mutex = new KeyedMutex();

  constructor(seed: DomainSeedInput = {}) {
    this.state = parseDomainSeed(seed);
  }

  async transaction<T>(fn: (store: ProjectStore) => Promise<T>): Promise<T> {
    return this.mutex.withLock('domain', async () => {
      const snapshot = structuredClone(this.state);
      try {
        return await fn(new InMemoryProjectStore(this.state));
      } catch (error) {
        this.state = snapshot;
        throw error;
      }
    });
  }
}
