/**
 * Unit Tests - Follow-up Routes
 *
 * @module __tests__/unit/routes/followups.routes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createTestApp, type TestApp } from '../../helpers/testApp';

describe('Follow-up Routes', () => {
  let testApp: TestApp;

  beforeEach(async () => {
    testApp = createTestApp();
    await testApp.followUps.create({ taskId: 2, userId: 2, message: 'Hi Max, how is the pricing copy going?' });
    await testApp.followUps.create({ taskId: 2, userId: 3, message: 'Hi vic, how is the pricing copy going?' });
    await testApp.followUps.create({ taskId: 1, userId: 2, message: 'Hi Max, any blockers on the hero section?' });
  });

  afterEach(async () => {
    await testApp.close();
  });

  describe('GET /api/agent/follow-ups', () => {
    it('lists the caller follow-ups newest first', async () => {
      const res = await request(testApp.app).get('/api/agent/follow-ups').set('Authorization', testApp.bearer(2));

      expect(res.status).toBe(200);
      expect(res.body.map((f: { id: number; taskId: number }) => [f.id, f.taskId])).toEqual([
        [3, 1],
        [1, 2],
      ]);
      expect(res.body[1]).toEqual({
        id: 1,
        taskId: 2,
        userId: 2,
        message: 'Hi Max, how is the pricing copy going?',
        status: 'pending',
        createdAt: '2026-10-19T09:00:01.000Z',
        sentAt: null,
        acknowledgedAt: null,
      });
    });

    it('filters by status', async () => {
      await testApp.followUps.markSent(1);

      const res = await request(testApp.app)
        .get('/api/agent/follow-ups?status=sent')
        .set('Authorization', testApp.bearer(2));

      expect(res.body.map((f: { id: number }) => f.id)).toEqual([1]);
    });

    it('rejects an unknown status', async () => {
      const res = await request(testApp.app)
        .get('/api/agent/follow-ups?status=archived')
        .set('Authorization', testApp.bearer(2));

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(Object.keys(res.body.details)).toEqual(['status']);
    });
  });

  describe('GET /api/agent/follow-ups/stats', () => {
    it('counts the caller follow-ups per status', async () => {
      await testApp.followUps.acknowledge(2, 3);

      const res = await request(testApp.app).get('/api/agent/follow-ups/stats').set('Authorization', testApp.bearer(2));

      expect(res.body).toEqual({ pending: 1, sent: 0, acknowledged: 1 });
    });
  });

  describe('POST /api/agent/follow-ups/:id/acknowledge', () => {
    it('marks the follow-up acknowledged', async () => {
      const res = await request(testApp.app)
        .post('/api/agent/follow-ups/1/acknowledge')
        .set('Authorization', testApp.bearer(2));

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: 1, status: 'acknowledged', acknowledgedAt: '2026-10-19T09:00:04.000Z' });
    });

    it('answers 409 when already acknowledged', async () => {
      await testApp.followUps.acknowledge(2, 1);

      const res = await request(testApp.app)
        .post('/api/agent/follow-ups/1/acknowledge')
        .set('Authorization', testApp.bearer(2));

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        error: 'Conflict',
        message: 'Follow-up has already been acknowledged',
        code: 'ALREADY_ACKNOWLEDGED',
      });
    });

    it('answers 404 for a follow-up owned by someone else', async () => {
      const res = await request(testApp.app)
        .post('/api/agent/follow-ups/2/acknowledge')
        .set('Authorization', testApp.bearer(2));

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('FOLLOW_UP_NOT_FOUND');
    });

    it('validates the id', async () => {
      const res = await request(testApp.app)
        .post('/api/agent/follow-ups/abc/acknowledge')
        .set('Authorization', testApp.bearer(2));

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(Object.keys(res.body.details)).toEqual(['id']);
    });
  });
});
