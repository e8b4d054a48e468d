export { authenticateJWT, requireUserId, signAccessToken, verifyAccessToken } from './auth';
export { createHttpLogger } from './logging';
