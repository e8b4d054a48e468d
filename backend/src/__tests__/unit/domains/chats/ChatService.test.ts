/**
 * @module ChatService.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChatService, InMemoryChatRepository, chatTitleFromPrompt } from '@/domains/chats';

describe('chatTitleFromPrompt', () => {
  it('keeps prompts up to fifty characters', () => {
    const prompt = 'x'.repeat(50);
    expect(chatTitleFromPrompt(prompt)).toBe(prompt);
  });

  it('cuts longer prompts and marks the cut', () => {
    const prompt = `${'a'.repeat(50)}bcdef`;
    expect(chatTitleFromPrompt(prompt)).toBe(`${'a'.repeat(50)}...`);
  });
});

describe('ChatService', () => {
  let clock: number;
  let service: ChatService;
  let threadCounter: number;

  beforeEach(() => {
    clock = Date.UTC(2026, 9, 19, 9, 0, 0);
    threadCounter = 0;
    const repository = new InMemoryChatRepository(() => {
      clock += 1000;
      return new Date(clock);
    });
    service = new ChatService(repository, {
      createThreadId: (userId) => `${userId}:thread${++threadCounter}`,
    });
  });

  it('creates a chat owned by the caller when no thread id is given', async () => {
    const chat = await service.startOrResume(7, 'Plan the launch');

    expect(chat).toMatchObject({ id: 1, userId: 7, threadId: '7:thread1', title: 'Plan the launch' });
  });

  it('resumes a chat the caller owns', async () => {
    const created = await service.startOrResume(7, 'Plan the launch');

    await expect(service.startOrResume(7, 'Next step', '7:thread1')).resolves.toEqual(created);
  });

  it('does not resume chats of other users or unknown threads', async () => {
    await service.startOrResume(7, 'Plan the launch');

    await expect(service.startOrResume(8, 'Peek', '7:thread1')).resolves.toBeNull();
    await expect(service.startOrResume(7, 'Lost', '7:missing')).resolves.toBeNull();
  });

  it('records exchanges in order and lists recently updated chats first', async () => {
    const first = await service.startOrResume(7, 'First chat');
    const second = await service.startOrResume(7, 'Second chat');
    if (!first || !second) throw new Error('chats not created');

    await service.recordExchange(first, 'Hello', 'Hi, how can I help?');

    const chats = await service.listChats(7);
    expect(chats.map((c) => c.threadId)).toEqual(['7:thread1', '7:thread2']);

    const messages = await service.listMessages(first);
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'Hello'],
      ['assistant', 'Hi, how can I help?'],
    ]);
    await expect(service.listMessages(second)).resolves.toEqual([]);
  });
});
