/**
 * @module domains/followups/InMemoryFollowUpRepository
 */

import type { FollowUpStatus } from '@taskpilot/shared';
import { NotFoundError } from '@/domains/projects';
import { emptyFollowUpStats, type FollowUpRepository } from './FollowUpRepository';
import type { CreateFollowUpInput, FollowUp, FollowUpStats } from './types';

export class InMemoryFollowUpRepository implements FollowUpRepository {
  private readonly followUps: FollowUp[] = [];
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(input: CreateFollowUpInput): Promise<FollowUp> {
    const followUp: FollowUp = {
      id: this.nextId++,
      ...input,
      status: 'pending',
      createdAt: this.now(),
      sentAt: null,
      acknowledgedAt: null,
    };
    this.followUps.push(followUp);
    return { ...followUp };
  }

  async findById(id: number): Promise<FollowUp | null> {
    const followUp = this.followUps.find((f) => f.id === id);
    return followUp ? { ...followUp } : null;
  }

  async listForUser(userId: number, status?: FollowUpStatus): Promise<FollowUp[]> {
    return this.followUps
      .filter((f) => f.userId === userId && (status === undefined || f.status === status))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((f) => ({ ...f }));
  }

  async countByStatus(userId: number): Promise<FollowUpStats> {
    const stats = emptyFollowUpStats();
    for (const followUp of this.followUps) {
      if (followUp.userId === userId) {
        stats[followUp.status] += 1;
      }
    }
    return stats;
  }

  async updateStatus(id: number, status: FollowUpStatus, at: Date): Promise<FollowUp> {
    const followUp = this.followUps.find((f) => f.id === id);
    if (!followUp) {
      throw NotFoundError.entity('Follow-up', id);
    }
    followUp.status = status;
    if (status === 'sent') {
      followUp.sentAt = at;
    } else if (status === 'acknowledged') {
      followUp.acknowledgedAt = at;
    }
    return { ...followUp };
  }
}
