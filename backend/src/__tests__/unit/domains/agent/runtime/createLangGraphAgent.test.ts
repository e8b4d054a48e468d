/**
 * @module createLangGraphAgent.test
 *
 * The ReAct agent end to end with a scripted model, the in-memory domain
 * store and an in-memory checkpoint saver.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AIMessage } from '@langchain/core/messages';
import { MemorySaver } from '@langchain/langgraph-checkpoint';
import { AgentRuntime, createLangGraphAgent } from '@/domains/agent/runtime';
import { ToolDispatcher, NO_USER_MESSAGE, PROJECT_TOOLS } from '@/domains/agent/tools';
import { DEFAULT_SYSTEM_PROMPT } from '@/domains/agent/prompts';
import { InMemoryDomainStore } from '@/domains/projects';
import { createDomainSeed } from '../../../../fixtures/domainSeed';
import { createTestLogger } from '../../../../helpers/mockPinoFactory';
import { ScriptedChatModel } from '../../../../helpers/ScriptedChatModel';

function listProjectsScript(): AIMessage[] {
  return [
    new AIMessage({
      content: '',
      tool_calls: [{ id: 'call_1', name: 'project_list', args: {}, type: 'tool_call' }],
    }),
    new AIMessage('You can see the Website project.'),
  ];
}

function toolReplies(model: ScriptedChatModel): string[] {
  return model.received.flat().flatMap((message) =>
    message.getType() === 'tool' && typeof message.content === 'string' ? [message.content] : []
  );
}

describe('createLangGraphAgent', () => {
  let model: ScriptedChatModel;
  let runtime: AgentRuntime;

  beforeEach(() => {
    model = new ScriptedChatModel(listProjectsScript());
    const saver = new MemorySaver();
    runtime = new AgentRuntime({
      checkpoints: { waitUntilReady: async () => saver },
      createAgent: createLangGraphAgent({
        model,
        dispatcher: new ToolDispatcher(new InMemoryDomainStore(createDomainSeed())),
        tools: PROJECT_TOOLS,
        systemPrompt: DEFAULT_SYSTEM_PROMPT,
      }),
      logger: createTestLogger().testLogger,
    });
  });

  it('runs the tool as the thread owner and returns the final answer', async () => {
    await expect(runtime.invoke('2:abc', 'Which projects can I see?')).resolves.toBe(
      'You can see the Website project.'
    );

    expect(model.received).toHaveLength(2);
    expect(toolReplies(model)).toEqual(['- [1] Website']);
  });

  it('sends the system prompt first', async () => {
    await runtime.invoke('2:abc', 'Which projects can I see?');

    const [firstCall] = model.received;
    expect(firstCall?.[0]?.getType()).toBe('system');
    expect(firstCall?.[0]?.content).toBe(DEFAULT_SYSTEM_PROMPT);
  });

  it('answers identity-requiring tools on anonymous threads with an error string', async () => {
    await runtime.invoke('guest:abc', 'Which projects can I see?');

    expect(toolReplies(model)).toEqual([NO_USER_MESSAGE]);
  });

  it('keeps the conversation in the checkpoint', async () => {
    await runtime.invoke('2:abc', 'Which projects can I see?');

    await expect(runtime.getHistory('2:abc')).resolves.toEqual([
      { role: 'user', content: 'Which projects can I see?' },
      { role: 'assistant', content: 'You can see the Website project.' },
    ]);
    await expect(runtime.getHistory('2:other')).resolves.toEqual([]);
  });
});
