/**
 * @module projectTools.test
 *
 * Output formats of the tool catalog against the in-memory store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ToolDispatcher, NO_USER_MESSAGE, PROJECT_TOOLS, type ProjectTool } from '@/domains/agent/tools';
import { createRequestContext } from '@/domains/agent/context';
import { InMemoryDomainStore } from '@/domains/projects';
import { createDomainSeed } from '../../../../fixtures/domainSeed';

function findTool(name: string): ProjectTool {
  const found = PROJECT_TOOLS.find((t) => t.name === name);
  if (!found) {
    throw new Error(`No tool named ${name}`);
  }
  return found;
}

describe('project tools', () => {
  let dispatcher: ToolDispatcher;

  /** Call a tool as user `userId` (default: member 2); null means an anonymous thread. */
  const call = (name: string, args: Record<string, unknown> = {}, userId: number | null = 2) =>
    dispatcher.dispatch(findTool(name), args, createRequestContext(userId === null ? 'anon:t' : `${userId}:t`));

  beforeEach(() => {
    dispatcher = new ToolDispatcher(new InMemoryDomainStore(createDomainSeed()));
  });

  it('registers seventeen uniquely named tools', () => {
    const names = PROJECT_TOOLS.map((t) => t.name);
    expect(names).toHaveLength(17);
    expect(new Set(names).size).toBe(17);
  });

  describe('projects', () => {
    it('creates a project', async () => {
      await expect(call('project_create', { name: 'Mobile', key: 'MOB' })).resolves.toBe(
        "Project 'Mobile' (ID: 3) created."
      );
    });

    it('reports a duplicate key as an error string', async () => {
      await expect(call('project_create', { name: 'Again', key: 'WEB' })).resolves.toBe(
        "Error: Project key 'WEB' already exists."
      );
    });

    it('summarizes a project', async () => {
      await expect(call('project_get', { projectId: 2 })).resolves.toBe('Project 2: Ops | key: OPS');
    });

    it('lists projects per visibility', async () => {
      await expect(call('project_list', {}, 1)).resolves.toBe('- [1] Website\n- [2] Ops');
      await expect(call('project_list', {}, 3)).resolves.toBe('No projects.');
    });

    it('lists members with roles', async () => {
      await expect(call('project_members_list', { projectId: 1 })).resolves.toBe('- 1 (project_admin)\n- 2 (member)');
    });
  });

  describe('tasks', () => {
    it('creates a task', async () => {
      await expect(call('task_create', { projectId: 1, title: 'Write tests' })).resolves.toBe(
        'Task 4 created: Write tests'
      );
    });

    it('summarizes a task', async () => {
      await expect(call('task_get', { taskId: 1 })).resolves.toBe('Task 1: Design hero section | in_progress | high');
    });

    it('updates a task', async () => {
      await expect(call('task_update', { taskId: 2, status: 'done' })).resolves.toBe('Task 2 updated → done');
    });

    it('deletes a task', async () => {
      await expect(call('task_delete', { taskId: 3 })).resolves.toBe('Task 3 deleted.');
      await expect(call('task_get', { taskId: 3 })).resolves.toBe('Error: Task 3 not found.');
    });

    it('assigns and unassigns with the model-supplied user', async () => {
      await expect(call('task_assign', { taskId: 1, userId: 3 })).resolves.toBe('User 3 assigned to task 1.');
      await expect(call('task_unassign', { taskId: 1, userId: 2 })).resolves.toBe('User 2 unassigned from task 1.');
      await expect(call('task_list_my', {}, 3)).resolves.toBe(
        '- [1] Design hero section (in_progress)\n- [2] Write pricing copy (todo)'
      );
    });

    it('lists my tasks, optionally by status', async () => {
      await expect(call('task_list_my')).resolves.toBe(
        '- [1] Design hero section (in_progress)\n- [2] Write pricing copy (todo)\n- [3] Ship analytics (done)'
      );
      await expect(call('task_list_my', { status: 'todo' })).resolves.toBe('- [2] Write pricing copy (todo)');
      await expect(call('task_list_my', {}, 1)).resolves.toBe('No tasks.');
    });

    it('searches tasks', async () => {
      await expect(call('task_search', { projectId: 1, query: 'pricing' })).resolves.toBe(
        '- [2] Write pricing copy (todo)'
      );
      await expect(call('task_search', { projectId: 1, query: 'zzz' })).resolves.toBe("No tasks match 'zzz'.");
    });

    it('counts tasks by status in workflow order', async () => {
      await expect(call('task_stats_by_status', { projectId: 1 })).resolves.toBe('todo: 1\nin_progress: 1\ndone: 1');
      await expect(call('task_stats_by_status', { projectId: 2 })).resolves.toBe('No tasks.');
    });
  });

  describe('epics and sprints', () => {
    it('lists and summarizes epics', async () => {
      await expect(call('epic_list', { projectId: 1 })).resolves.toBe('- [1] Landing pages');
      await expect(call('epic_list', { projectId: 2 })).resolves.toBe('No epics.');
      await expect(call('epic_get', { epicId: 1 })).resolves.toBe('Epic 1: Landing pages | project 1');
    });

    it('lists sprints and marks the active one', async () => {
      await expect(call('sprint_list', { projectId: 1 })).resolves.toBe('- [1] Sprint 1\n- [2] Sprint 2 (active)');
    });

    it('shows the active sprint', async () => {
      await expect(call('sprint_get_active', { projectId: 1 })).resolves.toBe(
        'Sprint 2: Sprint 2 (2026-10-19 → 2026-11-01)'
      );
      await expect(call('sprint_get_active', { projectId: 2 })).resolves.toBe('No active sprint.');
    });
  });

  describe('identity', () => {
    it.each(['project_create', 'project_list', 'task_create', 'task_list_my'])(
      '%s needs an authenticated user',
      async (name) => {
        await expect(call(name, { name: 'X', projectId: 1, title: 'X' }, null)).resolves.toBe(NO_USER_MESSAGE);
      }
    );

    it('declares userId only on identity-requiring tools', () => {
      const withUser = PROJECT_TOOLS.filter((t) => t.injected.includes('userId')).map((t) => t.name);
      expect(withUser).toEqual(['project_create', 'project_list', 'task_create', 'task_list_my']);
    });
  });
});
