/**
 * @module domains/agent/tools/projectTools
 *
 * The project-management tool catalog offered to the assistant.
 * Every tool answers with a compact summary string.
 */

import { z } from 'zod';
import { TASK_STATUSES, TASK_PRIORITIES } from '@taskpilot/shared';
import type { Task } from '@/domains/projects';
import { defineProjectTool, type ProjectTool } from './ToolDispatcher';

const id = (what: string) => z.number().int().positive().describe(`ID of the ${what}`);
const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Use the YYYY-MM-DD format')
  .describe('Calendar date as YYYY-MM-DD');

function taskLine(task: Task): string {
  return `- [${task.id}] ${task.title} (${task.status})`;
}

function lines<T>(items: readonly T[], empty: string, format: (item: T) => string): string {
  return items.length === 0 ? empty : items.map(format).join('\n');
}

// ============================================================================
// Projects
// ============================================================================

export const projectCreate = defineProjectTool({
  name: 'project_create',
  description: 'Create a new project owned by the current user, who becomes its project admin.',
  schema: z.object({
    name: z.string().min(1).max(255).describe('Project name'),
    key: z.string().min(1).max(20).optional().describe('Short unique project key, e.g. WEB'),
    description: z.string().optional().describe('What the project is about'),
  }),
  injected: ['userId', 'store'],
  async run({ name, key, description }, { userId, store }) {
    const project = await store.createProject({ name, key, description, creatorId: userId });
    return `Project '${project.name}' (ID: ${project.id}) created.`;
  },
});

export const projectGet = defineProjectTool({
  name: 'project_get',
  description: 'Get a project summary by id.',
  schema: z.object({ projectId: id('project') }),
  injected: ['store'],
  async run({ projectId }, { store }) {
    const project = await store.getProject(projectId);
    return `Project ${project.id}: ${project.name} | key: ${project.key ?? '-'}`;
  },
});

export const projectList = defineProjectTool({
  name: 'project_list',
  description: 'List the projects visible to the current user.',
  schema: z.object({}),
  injected: ['userId', 'store'],
  async run(_args, { userId, store }) {
    const projects = await store.listProjects(userId);
    return lines(projects, 'No projects.', (p) => `- [${p.id}] ${p.name}`);
  },
});

export const projectMembersList = defineProjectTool({
  name: 'project_members_list',
  description: 'List the members of a project with their project roles.',
  schema: z.object({ projectId: id('project') }),
  injected: ['store'],
  async run({ projectId }, { store }) {
    const members = await store.listProjectMembers(projectId);
    return lines(members, 'No members.', (m) => `- ${m.userId} (${m.role})`);
  },
});

// ============================================================================
// Tasks
// ============================================================================

export const taskCreate = defineProjectTool({
  name: 'task_create',
  description:
    'Create a task in a project. The current user is recorded as reporter. Optionally place it in an epic or sprint of the same project.',
  schema: z.object({
    projectId: id('project'),
    title: z.string().min(1).max(255).describe('Task title'),
    description: z.string().optional().describe('Task details'),
    priority: z.enum(TASK_PRIORITIES).optional().describe('Defaults to medium'),
    status: z.enum(TASK_STATUSES).optional().describe('Defaults to todo'),
    dueDate: isoDate.optional(),
    epicId: id('epic').optional(),
    sprintId: id('sprint').optional(),
  }),
  injected: ['userId', 'store'],
  async run(args, { userId, store }) {
    const task = await store.createTask({ ...args, reporterId: userId });
    return `Task ${task.id} created: ${task.title}`;
  },
});

export const taskGet = defineProjectTool({
  name: 'task_get',
  description: 'Get a task summary by id.',
  schema: z.object({ taskId: id('task') }),
  injected: ['store'],
  async run({ taskId }, { store }) {
    const task = await store.getTask(taskId);
    return `Task ${task.id}: ${task.title} | ${task.status} | ${task.priority}`;
  },
});

export const taskUpdate = defineProjectTool({
  name: 'task_update',
  description: 'Update the title, description, status, priority or due date of a task.',
  schema: z.object({
    taskId: id('task'),
    title: z.string().min(1).max(255).optional(),
    description: z.string().optional(),
    status: z.enum(TASK_STATUSES).optional(),
    priority: z.enum(TASK_PRIORITIES).optional(),
    dueDate: isoDate.optional(),
  }),
  injected: ['store'],
  async run({ taskId, ...changes }, { store }) {
    const task = await store.updateTask(taskId, changes);
    return `Task ${task.id} updated → ${task.status}`;
  },
});

export const taskDelete = defineProjectTool({
  name: 'task_delete',
  description: 'Delete a task permanently.',
  schema: z.object({ taskId: id('task') }),
  injected: ['store'],
  async run({ taskId }, { store }) {
    await store.deleteTask(taskId);
    return `Task ${taskId} deleted.`;
  },
});

export const taskAssign = defineProjectTool({
  name: 'task_assign',
  description: 'Assign a user to a task. Assigning an existing assignee changes nothing.',
  schema: z.object({ taskId: id('task'), userId: id('user to assign') }),
  injected: ['store'],
  async run({ taskId, userId }, { store }) {
    await store.assignTask(taskId, userId);
    return `User ${userId} assigned to task ${taskId}.`;
  },
});

export const taskUnassign = defineProjectTool({
  name: 'task_unassign',
  description: 'Remove a user from the assignees of a task.',
  schema: z.object({ taskId: id('task'), userId: id('user to unassign') }),
  injected: ['store'],
  async run({ taskId, userId }, { store }) {
    await store.unassignTask(taskId, userId);
    return `User ${userId} unassigned from task ${taskId}.`;
  },
});

export const taskListMy = defineProjectTool({
  name: 'task_list_my',
  description: 'List the tasks assigned to the current user, optionally only those with a given status.',
  schema: z.object({ status: z.enum(TASK_STATUSES).optional() }),
  injected: ['userId', 'store'],
  async run({ status }, { userId, store }) {
    const tasks = await store.listTasksForAssignee(userId, status);
    return lines(tasks, 'No tasks.', taskLine);
  },
});

export const taskSearch = defineProjectTool({
  name: 'task_search',
  description: 'Search the tasks of a project by text in their title or description.',
  schema: z.object({
    projectId: id('project'),
    query: z.string().min(1).describe('Text to look for, case-insensitive'),
  }),
  injected: ['store'],
  async run({ projectId, query }, { store }) {
    const tasks = await store.searchTasks(projectId, query);
    return lines(tasks, `No tasks match '${query}'.`, taskLine);
  },
});

export const taskStatsByStatus = defineProjectTool({
  name: 'task_stats_by_status',
  description: 'Count the tasks of a project per status.',
  schema: z.object({ projectId: id('project') }),
  injected: ['store'],
  async run({ projectId }, { store }) {
    const counts = await store.countTasksByStatus(projectId);
    const present = TASK_STATUSES.flatMap((status) => {
      const count = counts[status];
      return count ? [`${status}: ${count}`] : [];
    });
    return present.length === 0 ? 'No tasks.' : present.join('\n');
  },
});

// ============================================================================
// Epics and sprints
// ============================================================================

export const epicList = defineProjectTool({
  name: 'epic_list',
  description: 'List the epics of a project.',
  schema: z.object({ projectId: id('project') }),
  injected: ['store'],
  async run({ projectId }, { store }) {
    const epics = await store.listEpics(projectId);
    return lines(epics, 'No epics.', (e) => `- [${e.id}] ${e.title}`);
  },
});

export const epicGet = defineProjectTool({
  name: 'epic_get',
  description: 'Get an epic summary by id.',
  schema: z.object({ epicId: id('epic') }),
  injected: ['store'],
  async run({ epicId }, { store }) {
    const epic = await store.getEpic(epicId);
    return `Epic ${epic.id}: ${epic.title} | project ${epic.projectId}`;
  },
});

export const sprintList = defineProjectTool({
  name: 'sprint_list',
  description: 'List the sprints of a project, marking the active one.',
  schema: z.object({ projectId: id('project') }),
  injected: ['store'],
  async run({ projectId }, { store }) {
    const sprints = await store.listSprints(projectId);
    return lines(sprints, 'No sprints.', (s) => `- [${s.id}] ${s.name}${s.isActive ? ' (active)' : ''}`);
  },
});

export const sprintGetActive = defineProjectTool({
  name: 'sprint_get_active',
  description: 'Get the active sprint of a project.',
  schema: z.object({ projectId: id('project') }),
  injected: ['store'],
  async run({ projectId }, { store }) {
    const sprint = await store.getActiveSprint(projectId);
    if (!sprint) {
      return 'No active sprint.';
    }
    return `Sprint ${sprint.id}: ${sprint.name} (${sprint.startDate ?? '?'} → ${sprint.endDate ?? '?'})`;
  },
});

/**
 * Full catalog, in the order it is presented to the model.
 */
export const PROJECT_TOOLS: readonly ProjectTool[] = [
  projectCreate,
  projectGet,
  projectList,
  projectMembersList,
  taskCreate,
  taskGet,
  taskUpdate,
  taskDelete,
  taskAssign,
  taskUnassign,
  taskListMy,
  taskSearch,
  taskStatsByStatus,
  epicList,
  epicGet,
  sprintList,
  sprintGetActive,
];
