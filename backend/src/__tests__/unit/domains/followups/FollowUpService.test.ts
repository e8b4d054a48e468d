/**
 * @module FollowUpService.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FollowUpService, InMemoryFollowUpRepository } from '@/domains/followups';
import { ConflictError, NotFoundError } from '@/domains/projects';

describe('FollowUpService', () => {
  let clock: number;
  let service: FollowUpService;

  beforeEach(async () => {
    clock = Date.UTC(2026, 9, 19, 9, 0, 0);
    const tick = () => {
      clock += 1000;
      return new Date(clock);
    };
    service = new FollowUpService(new InMemoryFollowUpRepository(tick), { now: tick });

    await service.create({ taskId: 2, userId: 2, message: 'Hi Max, pricing copy?' });
    await service.create({ taskId: 2, userId: 3, message: 'Hi vic, pricing copy?' });
    await service.create({ taskId: 1, userId: 2, message: 'Hi Max, hero section?' });
  });

  it('lists the caller follow-ups newest first', async () => {
    const list = await service.list(2);

    expect(list.map((f) => f.id)).toEqual([3, 1]);
    expect(list[0]).toMatchObject({ status: 'pending', sentAt: null, acknowledgedAt: null });
  });

  it('filters by status', async () => {
    await service.markSent(1);

    expect((await service.list(2, 'sent')).map((f) => f.id)).toEqual([1]);
    expect((await service.list(2, 'pending')).map((f) => f.id)).toEqual([3]);
  });

  it('counts every status, including empty ones', async () => {
    await service.acknowledge(2, 3);

    await expect(service.stats(2)).resolves.toEqual({ pending: 1, sent: 0, acknowledged: 1 });
    await expect(service.stats(9)).resolves.toEqual({ pending: 0, sent: 0, acknowledged: 0 });
  });

  it('stamps the acknowledgement time', async () => {
    const acknowledged = await service.acknowledge(3, 2);

    expect(acknowledged.status).toBe('acknowledged');
    // three creations, then the acknowledgement
    expect(acknowledged.acknowledgedAt).toEqual(new Date(Date.UTC(2026, 9, 19, 9, 0, 4)));
  });

  it('reports a follow-up owned by someone else as missing', async () => {
    const attempt = service.acknowledge(3, 1);

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow('Follow-up 1 not found.');
  });

  it('reports an unknown follow-up as missing', async () => {
    await expect(service.acknowledge(2, 42)).rejects.toThrow('Follow-up 42 not found.');
  });

  it('refuses to acknowledge twice', async () => {
    await service.acknowledge(2, 1);

    const again = service.acknowledge(2, 1);
    await expect(again).rejects.toBeInstanceOf(ConflictError);
    await expect(again).rejects.toThrow('Follow-up 1 is already acknowledged.');
  });
});
