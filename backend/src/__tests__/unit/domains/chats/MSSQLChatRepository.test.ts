/**
 * @module MSSQLChatRepository.test
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import sql, { type ConnectionPool } from 'mssql';
import { MSSQLChatRepository } from '@/domains/chats/MSSQLChatRepository';

const { mockExecuteQuery, mockWithTransaction, transaction, events } = vi.hoisted(() => ({
  mockExecuteQuery: vi.fn(),
  mockWithTransaction: vi.fn(),
  transaction: { name: 'transaction' },
  events: new Array<string>(),
}));

vi.mock('@/infrastructure/database/database', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@/infrastructure/database/database')>()),
  executeQuery: mockExecuteQuery,
  withTransaction: mockWithTransaction,
}));

const createdAt = new Date('2026-10-19T08:00:00.000Z');
const updatedAt = new Date('2026-10-19T09:30:00.000Z');

const chatRow = {
  id: 4,
  user_id: 7,
  thread_id: '7:abc',
  title: 'Sprint planning',
  created_at: createdAt,
  updated_at: updatedAt,
};

describe('MSSQLChatRepository', () => {
  let pool: ConnectionPool;
  let repository: MSSQLChatRepository;

  beforeEach(() => {
    events.length = 0;
    mockExecuteQuery.mockReset();
    mockExecuteQuery.mockResolvedValue({ recordset: [], rowsAffected: [0] });
    mockWithTransaction.mockReset();
    mockWithTransaction.mockImplementation(async (_pool: unknown, fn: (tx: unknown) => Promise<unknown>) => {
      events.push('begin');
      try {
        const value = await fn(transaction);
        events.push('commit');
        return value;
      } catch (error) {
        events.push('rollback');
        throw error;
      }
    });

    pool = new sql.ConnectionPool({ server: 'localhost', database: 'test', user: 'sa', password: 'test-secret' });
    repository = new MSSQLChatRepository(pool);
  });

  it('creates a chat and maps the inserted row', async () => {
    mockExecuteQuery.mockResolvedValueOnce({ recordset: [chatRow], rowsAffected: [1] });

    const chat = await repository.createChat({ userId: 7, threadId: '7:abc', title: 'Sprint planning' });

    expect(chat).toEqual({
      id: 4,
      userId: 7,
      threadId: '7:abc',
      title: 'Sprint planning',
      createdAt,
      updatedAt,
    });
    expect(mockExecuteQuery).toHaveBeenCalledWith(pool, expect.stringContaining('OUTPUT INSERTED.id'), {
      user_id: 7,
      thread_id: '7:abc',
      title: 'Sprint planning',
    });
  });

  it('fails when the insert returns no row', async () => {
    await expect(repository.createChat({ userId: 7, threadId: '7:abc', title: 'x' })).rejects.toThrow(
      'Chat for thread 7:abc was not created'
    );
  });

  it('scopes a lookup to its owner', async () => {
    const chat = await repository.findChatForUser('7:abc', 8);

    expect(chat).toBeNull();
    expect(mockExecuteQuery).toHaveBeenCalledWith(
      pool,
      expect.stringContaining('WHERE thread_id = @thread_id AND user_id = @user_id'),
      { thread_id: '7:abc', user_id: 8 }
    );
  });

  it('lists chats most recently updated first', async () => {
    mockExecuteQuery.mockResolvedValueOnce({ recordset: [chatRow], rowsAffected: [1] });

    const chats = await repository.listChats(7);

    expect(chats.map((chat) => chat.id)).toEqual([4]);
    expect(mockExecuteQuery).toHaveBeenCalledWith(
      pool,
      expect.stringContaining('ORDER BY updated_at DESC, id DESC'),
      { user_id: 7 }
    );
  });

  it('stores both sides of an exchange and touches the chat in one transaction', async () => {
    await repository.appendExchange(4, 'What is overdue?', 'Nothing is overdue.');

    expect(events).toEqual(['begin', 'commit']);
    expect(mockExecuteQuery).toHaveBeenCalledTimes(2);
    expect(mockExecuteQuery).toHaveBeenNthCalledWith(1, transaction, expect.stringContaining('INSERT INTO chat_messages'), {
      chat_id: 4,
      prompt: 'What is overdue?',
      content: 'Nothing is overdue.',
    });
    expect(mockExecuteQuery).toHaveBeenNthCalledWith(2, transaction, expect.stringContaining('UPDATE chats'), {
      chat_id: 4,
    });
  });

  it('rolls the exchange back when the chat update fails', async () => {
    mockExecuteQuery
      .mockResolvedValueOnce({ recordset: [], rowsAffected: [2] })
      .mockRejectedValueOnce(new Error('Lock request time out period exceeded.'));

    await expect(repository.appendExchange(4, 'Hi', 'Hello')).rejects.toThrow('Lock request time out period exceeded.');

    expect(events).toEqual(['begin', 'rollback']);
  });

  it('maps messages in insertion order', async () => {
    mockExecuteQuery.mockResolvedValueOnce({
      recordset: [
        { id: 1, chat_id: 4, role: 'user', content: 'Hi', created_at: createdAt },
        { id: 2, chat_id: 4, role: 'assistant', content: 'Hello', created_at: createdAt },
      ],
      rowsAffected: [2],
    });

    const messages = await repository.listMessages(4);

    expect(messages).toEqual([
      { id: 1, chatId: 4, role: 'user', content: 'Hi', createdAt },
      { id: 2, chatId: 4, role: 'assistant', content: 'Hello', createdAt },
    ]);
    expect(mockExecuteQuery.mock.calls[0]?.[1]).toContain('ORDER BY id');
  });
});
