/**
 * @module domains/chats/MSSQLChatRepository
 */

import type { ConnectionPool } from 'mssql';
import type { ChatMessageRole } from '@taskpilot/shared';
import { executeQuery, withTransaction, type SqlParams } from '@/infrastructure/database/database';
import type { ChatRepository } from './ChatRepository';
import type { Chat, ChatMessage, CreateChatInput } from './types';

interface ChatRow {
  id: number;
  user_id: number;
  thread_id: string;
  title: string;
  created_at: Date;
  updated_at: Date;
}

interface ChatMessageRow {
  id: number;
  chat_id: number;
  role: ChatMessageRole;
  content: string;
  created_at: Date;
}

const CHAT_COLUMNS = 'id, user_id, thread_id, title, created_at, updated_at';

function mapChat(row: ChatRow): Chat {
  return {
    id: row.id,
    userId: row.user_id,
    threadId: row.thread_id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapMessage(row: ChatMessageRow): ChatMessage {
  return { id: row.id, chatId: row.chat_id, role: row.role, content: row.content, createdAt: row.created_at };
}

export class MSSQLChatRepository implements ChatRepository {
  constructor(private readonly pool: ConnectionPool) {}

  private async rows<T>(query: string, params?: SqlParams): Promise<T[]> {
    const result = await executeQuery<T>(this.pool, query, params);
    return result.recordset ?? [];
  }

  async createChat(input: CreateChatInput): Promise<Chat> {
    const [row] = await this.rows<ChatRow>(
      `INSERT INTO chats (user_id, thread_id, title)
       OUTPUT INSERTED.id, INSERTED.user_id, INSERTED.thread_id, INSERTED.title, INSERTED.created_at, INSERTED.updated_at
       VALUES (@user_id, @thread_id, @title)`,
      { user_id: input.userId, thread_id: input.threadId, title: input.title }
    );
    if (!row) {
      throw new Error(`Chat for thread ${input.threadId} was not created`);
    }
    return mapChat(row);
  }

  async findChatForUser(threadId: string, userId: number): Promise<Chat | null> {
    const [row] = await this.rows<ChatRow>(
      `SELECT ${CHAT_COLUMNS} FROM chats WHERE thread_id = @thread_id AND user_id = @user_id`,
      { thread_id: threadId, user_id: userId }
    );
    return row ? mapChat(row) : null;
  }

  async listChats(userId: number): Promise<Chat[]> {
    const rows = await this.rows<ChatRow>(
      `SELECT ${CHAT_COLUMNS} FROM chats WHERE user_id = @user_id ORDER BY updated_at DESC, id DESC`,
      { user_id: userId }
    );
    return rows.map(mapChat);
  }

  async appendExchange(chatId: number, prompt: string, response: string): Promise<void> {
    await withTransaction(this.pool, async (transaction) => {
      await executeQuery(
        transaction,
        `INSERT INTO chat_messages (chat_id, role, content) VALUES (@chat_id, N'user', @prompt), (@chat_id, N'assistant', @content)`,
        { chat_id: chatId, prompt, content: response }
      );
      await executeQuery(transaction, 'UPDATE chats SET updated_at = SYSUTCDATETIME() WHERE id = @chat_id', {
        chat_id: chatId,
      });
    });
  }

  async listMessages(chatId: number): Promise<ChatMessage[]> {
    const rows = await this.rows<ChatMessageRow>(
      'SELECT id, chat_id, role, content, created_at FROM chat_messages WHERE chat_id = @chat_id ORDER BY id',
      { chat_id: chatId }
    );
    return rows.map(mapMessage);
  }
}
