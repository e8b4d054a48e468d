/**
 * @module domains/followups/FollowUpRepository
 */

import type { FollowUpStatus } from '@taskpilot/shared';
import type { CreateFollowUpInput, FollowUp, FollowUpStats } from './types';

export interface FollowUpRepository {
  /** New follow-ups start as `pending`. */
  create(input: CreateFollowUpInput): Promise<FollowUp>;
  findById(id: number): Promise<FollowUp | null>;
  /** Newest first. */
  listForUser(userId: number, status?: FollowUpStatus): Promise<FollowUp[]>;
  countByStatus(userId: number): Promise<FollowUpStats>;
  updateStatus(id: number, status: FollowUpStatus, at: Date): Promise<FollowUp>;
}

export function emptyFollowUpStats(): FollowUpStats {
  return { pending: 0, sent: 0, acknowledged: 0 };
}
