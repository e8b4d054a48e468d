/**
 * @module domains/followups/FollowUpService
 *
 * Follow-ups as seen by their recipient. A follow-up owned by someone else
 * is reported as missing.
 */

import type { FollowUpStatus } from '@taskpilot/shared';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { ConflictError, NotFoundError } from '@/domains/projects';
import type { FollowUpRepository } from './FollowUpRepository';
import type { CreateFollowUpInput, FollowUp, FollowUpStats } from './types';

export class FollowUpService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly followUps: FollowUpRepository,
    deps?: { logger?: Logger; now?: () => Date }
  ) {
    this.log = deps?.logger ?? createChildLogger({ service: 'FollowUpService' });
    this.now = deps?.now ?? (() => new Date());
  }

  create(input: CreateFollowUpInput): Promise<FollowUp> {
    return this.followUps.create(input);
  }

  list(userId: number, status?: FollowUpStatus): Promise<FollowUp[]> {
    return this.followUps.listForUser(userId, status);
  }

  stats(userId: number): Promise<FollowUpStats> {
    return this.followUps.countByStatus(userId);
  }

  async markSent(id: number): Promise<FollowUp> {
    const followUp = await this.followUps.updateStatus(id, 'sent', this.now());
    this.log.debug({ followUpId: id }, 'Follow-up marked sent');
    return followUp;
  }

  async acknowledge(userId: number, id: number): Promise<FollowUp> {
    const followUp = await this.followUps.findById(id);
    if (!followUp || followUp.userId !== userId) {
      throw NotFoundError.entity('Follow-up', id);
    }
    if (followUp.status === 'acknowledged') {
      throw new ConflictError(`Follow-up ${id} is already acknowledged.`);
    }

    const updated = await this.followUps.updateStatus(id, 'acknowledged', this.now());
    this.log.info({ followUpId: id, userId }, 'Follow-up acknowledged');
    return updated;
  }
}
