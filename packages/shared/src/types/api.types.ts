/**
 * API contract types for the assistant endpoints.
 *
 * Dates travel as ISO 8601 strings.
 *
 * @module @taskpilot/shared/types/api
 */

import type { FollowUpStatus } from '../constants/domain.constants';

export interface RunAgentResponse {
  message: string;
  threadId: string;
}

export interface ChatSummary {
  id: number;
  threadId: string;
  title: string;
  createdAt: string;
  updatedAt: string;
}

export type ChatMessageRole = 'user' | 'assistant';

export interface ChatMessageDto {
  id: number;
  role: ChatMessageRole;
  content: string;
  createdAt: string;
}

export interface ChatHistoryResponse {
  threadId: string;
  messages: ChatMessageDto[];
}

/** A turn reconstructed from the conversation checkpoint. */
export interface ConversationTurn {
  role: ChatMessageRole;
  content: string;
}

export interface FollowUpDto {
  id: number;
  taskId: number;
  userId: number;
  message: string;
  status: FollowUpStatus;
  createdAt: string;
  sentAt: string | null;
  acknowledgedAt: string | null;
}

export type FollowUpStats = Record<FollowUpStatus, number>;
