/**
 * HTTP request/response logging middleware using pino-http
 *
 * - Request ID reuse or generation (X-Request-ID header)
 * - Log level from the response status code
 * - Redaction of credential headers
 * - Health probes are not logged
 *
 * Access the request logger in routes through `req.log`.
 */

import pinoHttp from 'pino-http';
import type { RequestHandler } from 'express';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { logger as rootLogger } from '@/shared/utils/logger';

const HEALTH_ENDPOINTS = ['/health', '/ping', '/ready', '/live'];

export function createHttpLogger(logger: Logger = rootLogger): RequestHandler {
  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const existingId = req.headers['x-request-id'];
      if (typeof existingId === 'string' && existingId) {
        return existingId;
      }
      const id = `req_${randomUUID()}`;
      res.setHeader('X-Request-ID', id);
      return id;
    },

    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,

    customErrorMessage: (req, res, err) => `${req.method} ${req.url} ${res.statusCode} - ${err.message}`,

    serializers: {
      req: (req: { id: unknown; method: string; url: string; headers: Record<string, unknown> }) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: {
          ...req.headers,
          authorization: req.headers.authorization ? '[REDACTED]' : undefined,
          cookie: req.headers.cookie ? '[REDACTED]' : undefined,
        },
      }),
      res: (res: { statusCode: number }) => ({ statusCode: res.statusCode }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => HEALTH_ENDPOINTS.includes(req.url ?? ''),
    },
  });
}
