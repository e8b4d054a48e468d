/**
 * Entity → API shape conversions. Dates leave as ISO strings.
 */

import type { ChatMessageDto, ChatSummary, FollowUpDto } from '@taskpilot/shared';
import type { Chat, ChatMessage } from '@/domains/chats';
import type { FollowUp } from '@/domains/followups';

export function toChatSummary(chat: Chat): ChatSummary {
  return {
    id: chat.id,
    threadId: chat.threadId,
    title: chat.title,
    createdAt: chat.createdAt.toISOString(),
    updatedAt: chat.updatedAt.toISOString(),
  };
}

export function toChatMessageDto(message: ChatMessage): ChatMessageDto {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    createdAt: message.createdAt.toISOString(),
  };
}

export function toFollowUpDto(followUp: FollowUp): FollowUpDto {
  return {
    id: followUp.id,
    taskId: followUp.taskId,
    userId: followUp.userId,
    message: followUp.message,
    status: followUp.status,
    createdAt: followUp.createdAt.toISOString(),
    sentAt: followUp.sentAt?.toISOString() ?? null,
    acknowledgedAt: followUp.acknowledgedAt?.toISOString() ?? null,
  };
}
