/**
 * @module domains/chats/types
 */

import type { ChatMessageRole } from '@taskpilot/shared';

export interface Chat {
  id: number;
  userId: number;
  threadId: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatMessage {
  id: number;
  chatId: number;
  role: ChatMessageRole;
  content: string;
  createdAt: Date;
}

export interface CreateChatInput {
  userId: number;
  threadId: string;
  title: string;
}
