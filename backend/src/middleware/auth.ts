/**
 * Authentication Middleware
 *
 * Bearer JWT verification (HS256). On success `req.userId` holds the
 * integer from the token's `sub` claim.
 *
 * @module middleware/auth
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { ErrorCode } from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { sendError } from '@/shared/utils/error-response';
import type { AccessTokenClaims } from '@/types/auth.types';

const logger = createChildLogger({ service: 'AuthMiddleware' });

const USER_ID_PATTERN = /^\d+$/;

/**
 * Sign an access token for `userId`. Used by scripts and tests.
 */
export function signAccessToken(userId: number, secret: string, expiresIn: jwt.SignOptions['expiresIn'] = '1h'): string {
  const claims: AccessTokenClaims = { sub: String(userId) };
  return jwt.sign(claims, secret, { algorithm: 'HS256', expiresIn });
}

/**
 * Verify a token and return its user id, or null when the token is invalid
 * or carries no integer subject.
 */
export function verifyAccessToken(token: string, secret: string): number | null {
  try {
    const payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || !USER_ID_PATTERN.test(payload.sub)) {
      return null;
    }
    const userId = Number(payload.sub);
    return Number.isSafeInteger(userId) ? userId : null;
  } catch (error) {
    logger.debug({ reason: error instanceof Error ? error.message : String(error) }, 'Token verification failed');
    return null;
  }
}

/**
 * Authenticate JWT Middleware
 *
 * Usage:
 * ```typescript
 * router.get('/chats', authenticateJWT(secret), (req, res) => {
 *   res.json(await chats.listChats(requireUserId(req)));
 * });
 * ```
 */
export function authenticateJWT(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader?.startsWith('Bearer ')) {
      sendError(res, ErrorCode.UNAUTHORIZED);
      return;
    }

    const userId = verifyAccessToken(authHeader.substring(7).trim(), secret);
    if (userId === null) {
      sendError(res, ErrorCode.INVALID_TOKEN);
      return;
    }

    req.userId = userId;
    next();
  };
}

/**
 * The authenticated user id. Only valid behind authenticateJWT.
 */
export function requireUserId(req: Request): number {
  if (req.userId === undefined) {
    throw new Error('requireUserId called on a route without authenticateJWT');
  }
  return req.userId;
}
