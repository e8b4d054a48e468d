/**
 * @module domains/chats/InMemoryChatRepository
 */

import type { ChatRepository } from './ChatRepository';
import type { Chat, ChatMessage, CreateChatInput } from './types';

export class InMemoryChatRepository implements ChatRepository {
  private readonly chats: Chat[] = [];
  private readonly messages: ChatMessage[] = [];
  private nextChatId = 1;
  private nextMessageId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createChat(input: CreateChatInput): Promise<Chat> {
    if (this.chats.some((chat) => chat.threadId === input.threadId)) {
      throw new Error(`Chat for thread ${input.threadId} already exists`);
    }
    const timestamp = this.now();
    const chat: Chat = { id: this.nextChatId++, ...input, createdAt: timestamp, updatedAt: timestamp };
    this.chats.push(chat);
    return { ...chat };
  }

  async findChatForUser(threadId: string, userId: number): Promise<Chat | null> {
    const chat = this.chats.find((c) => c.threadId === threadId && c.userId === userId);
    return chat ? { ...chat } : null;
  }

  async listChats(userId: number): Promise<Chat[]> {
    return this.chats
      .filter((chat) => chat.userId === userId)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || b.id - a.id)
      .map((chat) => ({ ...chat }));
  }

  async appendExchange(chatId: number, prompt: string, response: string): Promise<void> {
    const chat = this.chats.find((c) => c.id === chatId);
    if (!chat) {
      throw new Error(`Chat ${chatId} does not exist`);
    }
    const timestamp = this.now();
    this.messages.push(
      { id: this.nextMessageId++, chatId, role: 'user', content: prompt, createdAt: timestamp },
      { id: this.nextMessageId++, chatId, role: 'assistant', content: response, createdAt: timestamp }
    );
    chat.updatedAt = timestamp;
  }

  async listMessages(chatId: number): Promise<ChatMessage[]> {
    return this.messages.filter((message) => message.chatId === chatId).map((message) => ({ ...message }));
  }
}
