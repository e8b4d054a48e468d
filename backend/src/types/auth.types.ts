/**
 * Authentication Types
 *
 * @module types/auth
 */

/**
 * Claims of an access token. `sub` is the numeric user id as a string.
 */
export interface AccessTokenClaims {
  sub: string;
  iat?: number;
  exp?: number;
}

/**
 * Extend Express Request with the authenticated user id (set by authenticateJWT).
 */
declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}
