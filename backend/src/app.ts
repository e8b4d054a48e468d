/**
 * Express application
 *
 * @module app
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ErrorCode } from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { sendError } from '@/shared/utils/error-response';
import { createHttpLogger } from '@/middleware/logging';
import { createAgentRouter } from '@/routes/agent';
import { createFollowUpRouter } from '@/routes/followups';
import type { AppContext } from './appContext';

const logger = createChildLogger({ service: 'App' });

export function createApp(ctx: Pick<AppContext, 'config' | 'runtime' | 'chats' | 'followUps' | 'checkpointer'>): Express {
  const jwtSecret = ctx.config.JWT_SECRET;
  if (!jwtSecret) {
    throw new Error('JWT_SECRET is required to serve the API');
  }

  const app = express();

  app.use(createHttpLogger());
  app.use((_req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', ctx.config.CORS_ORIGIN);
    res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type');
    next();
  });
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', checkpointer: ctx.checkpointer.isReady ? 'ready' : 'starting' });
  });

  app.use('/api/agent', createAgentRouter({ runtime: ctx.runtime, chats: ctx.chats, jwtSecret }));
  app.use('/api/agent', createFollowUpRouter({ followUps: ctx.followUps, jwtSecret }));

  app.use((req: Request, res: Response) => {
    sendError(res, ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`);
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, ErrorCode.BAD_REQUEST, 'Malformed JSON body');
      return;
    }
    logger.error({ err }, 'Unhandled error');
    sendError(res, ErrorCode.INTERNAL_ERROR);
  });

  return app;
}
