/**
 * @module domains/chats/ChatRepository
 *
 * Chat headers and their message log. A chat is owned by one user and
 * identified by its thread id.
 */

import type { Chat, ChatMessage, CreateChatInput } from './types';

export interface ChatRepository {
  createChat(input: CreateChatInput): Promise<Chat>;
  /** The chat with this thread id, only when `userId` owns it. */
  findChatForUser(threadId: string, userId: number): Promise<Chat | null>;
  /** Most recently updated first. */
  listChats(userId: number): Promise<Chat[]>;
  /** Append the user prompt and the assistant reply, and touch the chat. */
  appendExchange(chatId: number, prompt: string, response: string): Promise<void>;
  /** Oldest first. */
  listMessages(chatId: number): Promise<ChatMessage[]>;
}
