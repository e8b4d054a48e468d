/**
 * @module domains/chats/ChatService
 *
 * Chat ownership and the message log around agent runs. New chats get a
 * fresh thread id owned by the caller and a title taken from the first prompt.
 */

import type { Logger } from 'pino';
import { CHAT_TITLE_MAX_LENGTH } from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { createThreadId } from '@/domains/agent/context';
import type { ChatRepository } from './ChatRepository';
import type { Chat, ChatMessage } from './types';

export function chatTitleFromPrompt(prompt: string): string {
  return prompt.length > CHAT_TITLE_MAX_LENGTH ? `${prompt.slice(0, CHAT_TITLE_MAX_LENGTH)}...` : prompt;
}

export class ChatService {
  private readonly log: Logger;
  private readonly newThreadId: (userId: number) => string;

  constructor(
    private readonly chats: ChatRepository,
    deps?: { logger?: Logger; createThreadId?: (userId: number) => string }
  ) {
    this.log = deps?.logger ?? createChildLogger({ service: 'ChatService' });
    this.newThreadId = deps?.createThreadId ?? createThreadId;
  }

  /**
   * Without a thread id, create a chat for the caller. With one, return the
   * chat only when the caller owns it (null otherwise).
   */
  async startOrResume(userId: number, prompt: string, threadId?: string): Promise<Chat | null> {
    if (threadId === undefined) {
      const chat = await this.chats.createChat({
        userId,
        threadId: this.newThreadId(userId),
        title: chatTitleFromPrompt(prompt),
      });
      this.log.info({ userId, threadId: chat.threadId }, 'Chat created');
      return chat;
    }

    return this.chats.findChatForUser(threadId, userId);
  }

  findOwnedChat(userId: number, threadId: string): Promise<Chat | null> {
    return this.chats.findChatForUser(threadId, userId);
  }

  listChats(userId: number): Promise<Chat[]> {
    return this.chats.listChats(userId);
  }

  listMessages(chat: Chat): Promise<ChatMessage[]> {
    return this.chats.listMessages(chat.id);
  }

  async recordExchange(chat: Chat, prompt: string, response: string): Promise<void> {
    await this.chats.appendExchange(chat.id, prompt, response);
    this.log.debug({ chatId: chat.id, threadId: chat.threadId }, 'Exchange recorded');
  }
}
