/**
 * @module ToolDispatcher.test
 *
 * Injection precedence, identity checks, domain error translation and
 * per-call transactions.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolDispatcher, defineProjectTool, NO_USER_MESSAGE, PROJECT_TOOLS } from '@/domains/agent/tools';
import { createRequestContext } from '@/domains/agent/context';
import { InMemoryDomainStore, NotFoundError } from '@/domains/projects';
import { createDomainSeed } from '../../../../fixtures/domainSeed';

const echoIdentity = defineProjectTool({
  name: 'echo_identity',
  description: 'Reports the injected user next to the model-supplied one.',
  schema: z.object({ userId: z.number().optional(), note: z.string() }),
  injected: ['userId', 'store'],
  async run(args, { userId }) {
    return `${userId}|${args.userId ?? 'none'}|${args.note}`;
  },
});

describe('ToolDispatcher', () => {
  let domain: InMemoryDomainStore;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    domain = new InMemoryDomainStore(createDomainSeed());
    dispatcher = new ToolDispatcher(domain);
  });

  describe('dispatch()', () => {
    it('resolves injected names from the context, never from the model', async () => {
      const result = await dispatcher.dispatch(echoIdentity, { userId: 99, note: 'hi' }, createRequestContext('7:abc'));

      expect(result).toBe('7|none|hi');
    });

    it('answers identity-requiring tools without a user and opens no transaction', async () => {
      const transaction = vi.spyOn(domain, 'transaction');

      const result = await dispatcher.dispatch(echoIdentity, { note: 'hi' }, createRequestContext('guest:abc'));

      expect(result).toBe(NO_USER_MESSAGE);
      expect(transaction).not.toHaveBeenCalled();
    });

    it('runs tools without identity for an anonymous thread', async () => {
      const projectGet = PROJECT_TOOLS.find((t) => t.name === 'project_get');
      if (!projectGet) throw new Error('project_get missing');

      const result = await dispatcher.dispatch(projectGet, { projectId: 1 }, createRequestContext('guest'));

      expect(result).toBe('Project 1: Website | key: WEB');
    });

    it('turns domain errors into an error string', async () => {
      const failing = defineProjectTool({
        name: 'failing',
        description: 'Always missing.',
        schema: z.object({}),
        injected: ['store'],
        async run() {
          throw new NotFoundError('Task 42 not found.');
        },
      });

      await expect(dispatcher.dispatch(failing, {}, createRequestContext('1:abc'))).resolves.toBe(
        'Error: Task 42 not found.'
      );
    });

    it('propagates other errors', async () => {
      const broken = defineProjectTool({
        name: 'broken',
        description: 'Infrastructure failure.',
        schema: z.object({}),
        injected: ['store'],
        async run() {
          throw new Error('connection reset');
        },
      });

      await expect(dispatcher.dispatch(broken, {}, createRequestContext('1:abc'))).rejects.toThrow('connection reset');
    });

    it('rolls back the call transaction when the tool fails', async () => {
      const createThenFail = defineProjectTool({
        name: 'create_then_fail',
        description: 'Writes, then hits a missing entity.',
        schema: z.object({}),
        injected: ['userId', 'store'],
        async run(_args, { userId, store }) {
          await store.createTask({ projectId: 1, title: 'Orphan', reporterId: userId });
          await store.getTask(999);
          return 'unreachable';
        },
      });

      const result = await dispatcher.dispatch(createThenFail, {}, createRequestContext('1:abc'));

      expect(result).toBe('Error: Task 999 not found.');
      const titles = await domain.transaction(async (s) => (await s.searchTasks(1, 'orphan')).length);
      expect(titles).toBe(0);
    });
  });

  describe('toLangChainTools()', () => {
    it('reads the request context from the run configuration', async () => {
      const [projectList] = dispatcher.toLangChainTools(PROJECT_TOOLS.filter((t) => t.name === 'project_list'));
      if (!projectList) throw new Error('project_list missing');

      const result = await projectList.invoke(
        {},
        { configurable: { thread_id: '2:abc', requestContext: createRequestContext('2:abc') } }
      );

      expect(result).toBe('- [1] Website');
    });

    it('treats a run without context as anonymous', async () => {
      const [projectList] = dispatcher.toLangChainTools(PROJECT_TOOLS.filter((t) => t.name === 'project_list'));
      if (!projectList) throw new Error('project_list missing');

      await expect(projectList.invoke({}, { configurable: { thread_id: '2:abc' } })).resolves.toBe(NO_USER_MESSAGE);
    });

    it('keeps names and descriptions', () => {
      const tools = dispatcher.toLangChainTools(PROJECT_TOOLS);

      expect(tools.map((t) => t.name)).toEqual(PROJECT_TOOLS.map((t) => t.name));
      expect(tools[0]?.description).toBe(PROJECT_TOOLS[0]?.description);
    });
  });
});
