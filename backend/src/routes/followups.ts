/**
 * Follow-up Routes
 *
 * Endpoints:
 * - GET /api/agent/follow-ups - Caller's follow-ups, optionally `?status=`
 * - GET /api/agent/follow-ups/stats - Caller's follow-up counts per status
 * - POST /api/agent/follow-ups/:id/acknowledge - Mark one acknowledged
 *
 * @module routes/followups
 */

import { Router, type Request, type Response } from 'express';
import {
  ErrorCode,
  followUpIdParamSchema,
  followUpListQuerySchema,
  validateSafe,
} from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { sendError, sendServiceError, sendValidationError } from '@/shared/utils/error-response';
import { authenticateJWT, requireUserId } from '@/middleware/auth';
import { ConflictError, NotFoundError } from '@/domains/projects';
import type { FollowUpService } from '@/domains/followups';
import { toFollowUpDto } from './helpers/dto';

const logger = createChildLogger({ service: 'FollowUpRoutes' });

export interface FollowUpRouterDeps {
  followUps: FollowUpService;
  jwtSecret: string;
}

export function createFollowUpRouter(deps: FollowUpRouterDeps): Router {
  const { followUps } = deps;
  const router = Router();
  const auth = authenticateJWT(deps.jwtSecret);

  router.get('/follow-ups', auth, async (req: Request, res: Response): Promise<void> => {
    const query = validateSafe(followUpListQuerySchema, req.query);
    if (!query.success) {
      sendValidationError(res, query.error);
      return;
    }

    try {
      const list = await followUps.list(requireUserId(req), query.data.status);
      res.json(list.map(toFollowUpDto));
    } catch (error) {
      sendServiceError(res, error, logger);
    }
  });

  router.get('/follow-ups/stats', auth, async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await followUps.stats(requireUserId(req)));
    } catch (error) {
      sendServiceError(res, error, logger);
    }
  });

  router.post('/follow-ups/:id/acknowledge', auth, async (req: Request, res: Response): Promise<void> => {
    const params = validateSafe(followUpIdParamSchema, req.params);
    if (!params.success) {
      sendValidationError(res, params.error);
      return;
    }

    try {
      const followUp = await followUps.acknowledge(requireUserId(req), params.data.id);
      res.json(toFollowUpDto(followUp));
    } catch (error) {
      if (error instanceof NotFoundError) {
        sendError(res, ErrorCode.FOLLOW_UP_NOT_FOUND);
      } else if (error instanceof ConflictError) {
        sendError(res, ErrorCode.ALREADY_ACKNOWLEDGED);
      } else {
        sendServiceError(res, error, logger);
      }
    }
  });

  return router;
}
