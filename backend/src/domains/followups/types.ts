/**
 * @module domains/followups/types
 */

import type { FollowUpStatus, FollowUpStats } from '@taskpilot/shared';

export interface FollowUp {
  id: number;
  taskId: number;
  userId: number;
  message: string;
  status: FollowUpStatus;
  createdAt: Date;
  sentAt: Date | null;
  acknowledgedAt: Date | null;
}

export interface CreateFollowUpInput {
  taskId: number;
  userId: number;
  message: string;
}

export type { FollowUpStats };
