/**
 * Application logger using Pino
 *
 * Features:
 * - JSON structured logging (production) / Pretty printing (development)
 * - Environment-based log levels (debug in dev, info in prod, silent in tests)
 * - Async transports running in worker threads
 * - Standard serializers for errors, requests, responses
 * - Automatic redaction of credentials
 * - Child loggers for service and request context
 *
 * Usage:
 * ```typescript
 * logger.info({ userId: 123 }, 'User logged in');
 *
 * const serviceLogger = createChildLogger({ service: 'AgentRuntime' });
 * serviceLogger.info({ threadId }, 'Streaming run started');
 *
 * try {
 *   await operation();
 * } catch (err) {
 *   logger.error({ err }, 'Operation failed');
 * }
 * ```
 */

import pino from 'pino';
import type { Logger, LoggerOptions, TransportTargetOptions } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isTest = nodeEnv === 'test';
const isDevelopment = nodeEnv !== 'production';
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

// Service filtering for diagnostics (LOG_SERVICES=AgentRuntime,ToolDispatcher)
const allowedServices = process.env.LOG_SERVICES?.split(',').map((s) => s.trim()).filter(Boolean) ?? [];

function buildTargets(): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (isDevelopment) {
    targets.push({
      level: logLevel,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
        singleLine: false,
        messageFormat: '[{service}] {msg}',
      },
    });
  } else {
    targets.push({
      level: logLevel,
      target: 'pino/file',
      options: { destination: 1 },
    });
  }

  if (process.env.ENABLE_FILE_LOGGING === 'true') {
    targets.push({
      level: 'info',
      target: 'pino/file',
      options: {
        destination: process.env.LOG_FILE_PATH || './logs/app.log',
        mkdir: true,
      },
    });
  }

  return targets;
}

const options: LoggerOptions = {
  level: logLevel,

  serializers: {
    err: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },

  base: {
    env: nodeEnv,
    service: 'taskpilot-api',
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'password',
      'token',
      'apiKey',
      'accessToken',
      'jwtSecret',
    ],
    remove: true,
  },
};

// Worker-thread transports keep test processes alive, so tests log synchronously (and silently).
export const logger: Logger = isTest ? pino(options) : pino(options, pino.transport({ targets: buildTargets() }));

/**
 * Create a child logger with additional context
 *
 * Supports LOG_SERVICES for filtering: when set, only services in the list log.
 *
 * @example
 * const serviceLogger = createChildLogger({ service: 'ChatRepository' });
 * serviceLogger.info({ chatId: 12 }, 'Chat created');
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
  const serviceName = typeof context.service === 'string' ? context.service : undefined;

  if (allowedServices.length > 0 && serviceName && !allowedServices.includes(serviceName)) {
    return pino({ level: 'silent' });
  }

  return logger.child(context);
};
