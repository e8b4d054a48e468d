/**
 * Test loggers
 *
 * `createTestLogger` returns a real Pino logger that captures entries in
 * memory, for code that takes a `Logger` dependency.
 *
 * @example
 * ```typescript
 * const { testLogger, logs } = createTestLogger();
 * const saver = new MSSQLSaver(runner, { logger: testLogger });
 * await saver.deleteThread('7:abc');
 * expect(logs.at(-1)?.msg).toBe('Thread deleted');
 * ```
 *
 * @module __tests__/helpers/mockPinoFactory
 */

import pino from 'pino';
import type { Logger, Level } from 'pino';
import { Writable } from 'node:stream';

export type CapturedLog = Record<string, unknown> & {
  level: number;
  msg: string;
};

export interface TestLoggerResult {
  testLogger: Logger;
  logs: CapturedLog[];
  getLogsByLevel: (level: Level) => CapturedLog[];
  hasLogWithMessage: (message: string) => boolean;
}

function isCapturedLog(value: unknown): value is CapturedLog {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number' &&
    'msg' in value &&
    typeof value.msg === 'string'
  );
}

export function createTestLogger(level: Level = 'trace'): TestLoggerResult {
  const logs: CapturedLog[] = [];

  const stream = new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      const entry: unknown = JSON.parse(chunk.toString());
      if (isCapturedLog(entry)) {
        logs.push(entry);
      }
      callback();
    },
  });

  const testLogger = pino({ level, base: { env: 'test' } }, stream);

  return {
    testLogger,
    logs,
    getLogsByLevel: (wanted) => logs.filter((log) => log.level === pino.levels.values[wanted]),
    hasLogWithMessage: (message) => logs.some((log) => log.msg === message),
  };
}
