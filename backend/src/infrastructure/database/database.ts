/**
 * Database Configuration
 *
 * SQL Server connection pools and parameterized query helpers (mssql).
 *
 * Two kinds of pool exist per process:
 * - the shared application pool (`initDatabase` / `getPool`) used by
 *   repositories and the domain store;
 * - dedicated pools opened with `openDedicatedPool`, owned by a single
 *   long-lived consumer (the checkpoint supervisor) and closed by it.
 *
 * @module infrastructure/database/database
 */

import sql from 'mssql';
import type { ConnectionPool, ISqlType, IResult, Transaction, config as SqlConfig } from 'mssql';
import { env, isProd, type Environment } from '@/infrastructure/config/environment';
import { createChildLogger } from '@/shared/utils/logger';
import { retryWithBackoff, RetryPredicates } from '@/shared/utils/retry';

const logger = createChildLogger({ service: 'Database' });

/**
 * SQL Parameter Value Types
 */
export type SqlValue = string | number | boolean | Date | Buffer | null | undefined;

export type SqlType = ISqlType | (() => ISqlType);

/**
 * A value with its SQL type stated by the caller, for columns whose JS value
 * alone is ambiguous (DATE vs DATETIME2, sized NVARCHAR keys).
 */
export interface TypedSqlValue {
  type: SqlType;
  value: SqlValue;
}

/**
 * Record of parameter names to SQL-compatible values
 */
export type SqlParams = Record<string, SqlValue | TypedSqlValue>;

/**
 * Anything that can create a request: a pool or an open transaction.
 */
export type SqlExecutor = ConnectionPool | Transaction;

export function sqlParam(type: SqlType, value: SqlValue): TypedSqlValue {
  return { type, value };
}

export function isTypedSqlValue(param: SqlValue | TypedSqlValue): param is TypedSqlValue {
  return typeof param === 'object' && param !== null && !(param instanceof Date) && !Buffer.isBuffer(param);
}

/**
 * The SQL type and value bound for one parameter. Untyped values are typed
 * from their JS value; null and undefined bind as NULL.
 */
export function resolveSqlParam(param: SqlValue | TypedSqlValue): TypedSqlValue {
  if (isTypedSqlValue(param)) {
    return { type: param.type, value: param.value ?? null };
  }

  if (typeof param === 'boolean') {
    return { type: sql.Bit, value: param };
  }
  if (typeof param === 'number') {
    return { type: Number.isInteger(param) ? sql.Int : sql.Float, value: param };
  }
  if (param instanceof Date) {
    return { type: sql.DateTime2, value: param };
  }
  if (Buffer.isBuffer(param)) {
    return { type: sql.VarBinary(sql.MAX), value: param };
  }
  return { type: sql.NVarChar(sql.MAX), value: param ?? null };
}

/**
 * Build the mssql configuration from the environment.
 *
 * @param pool - Pool sizing; dedicated pools use `{ max: 1, min: 1 }`
 */
export function getDatabaseConfig(
  config: Environment = env,
  pool: { max: number; min: number } = { max: 10, min: 1 }
): SqlConfig {
  if (!config.DATABASE_SERVER || !config.DATABASE_NAME || !config.DATABASE_USER || !config.DATABASE_PASSWORD) {
    throw new Error(
      'Database configuration is incomplete. Provide DATABASE_SERVER, DATABASE_NAME, DATABASE_USER, and DATABASE_PASSWORD.'
    );
  }

  return {
    server: config.DATABASE_SERVER,
    port: config.DATABASE_PORT,
    database: config.DATABASE_NAME,
    user: config.DATABASE_USER,
    password: config.DATABASE_PASSWORD,
    options: {
      encrypt: config.DATABASE_ENCRYPT,
      trustServerCertificate: !isProd,
      enableArithAbort: true,
    },
    pool: {
      ...pool,
      idleTimeoutMillis: 300000,
      acquireTimeoutMillis: 10000,
    },
    connectionTimeout: 30000,
    requestTimeout: 30000,
  };
}

/**
 * Open and verify a pool, retrying transient connection failures.
 */
async function connectWithRetry(config: SqlConfig, signal?: AbortSignal): Promise<ConnectionPool> {
  return retryWithBackoff(
    async () => {
      const pool = new sql.ConnectionPool(config);
      await pool.connect();

      try {
        await pool.request().query('SELECT 1 AS health');
      } catch (error) {
        await pool.close();
        throw error;
      }

      return pool;
    },
    {
      maxRetries: 5,
      baseDelay: 200,
      maxDelay: 3200,
      isRetryable: RetryPredicates.isDatabaseError,
      onRetry: (attempt, error, nextDelay) => {
        logger.warn({ attempt, error: error.message, nextDelayMs: nextDelay }, 'Database connection failed, retrying');
      },
      signal,
    }
  );
}

let pool: ConnectionPool | null = null;

/**
 * Initialize the shared application pool. Idempotent.
 */
export async function initDatabase(config: SqlConfig = getDatabaseConfig()): Promise<ConnectionPool> {
  if (pool?.connected) {
    return pool;
  }

  logger.info({ server: config.server, database: config.database }, 'Connecting to SQL Server');
  const newPool = await connectWithRetry(config);

  newPool.on('error', (err: Error) => {
    logger.error({ err }, 'Database pool error');
  });

  pool = newPool;
  logger.info('Database connection pool ready');
  return newPool;
}

/**
 * Open a pool owned by the caller, who must close it.
 */
export function openDedicatedPool(signal?: AbortSignal): Promise<ConnectionPool> {
  return connectWithRetry(getDatabaseConfig(env, { max: 1, min: 1 }), signal);
}

/**
 * Get the shared pool (throws if not initialized)
 */
export function getPool(): ConnectionPool {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Close the shared pool
 */
export async function closeDatabase(): Promise<void> {
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  await closing.close();
  logger.info('Database connection closed');
}

/**
 * Execute a query with typed parameters.
 *
 * @param executor - Pool or open transaction the request runs on
 * @param query - SQL with `@paramName` placeholders
 *
 * @example
 * ```typescript
 * const result = await executeQuery<TaskRow>(pool,
 *   'SELECT * FROM tasks WHERE id = @id AND due_date < @today',
 *   { id: 42, today: sqlParam(sql.Date, new Date()) }
 * );
 * ```
 */
export async function executeQuery<T = unknown>(
  executor: SqlExecutor,
  query: string,
  params?: SqlParams
): Promise<IResult<T>> {
  const request = executor.request();

  if (params) {
    for (const [key, param] of Object.entries(params)) {
      const { type, value } = resolveSqlParam(param);
      request.input(key, type, value);
    }
  }

  return request.query<T>(query);
}

/**
 * Run `fn` inside a transaction: commit on success, rollback and rethrow on failure.
 */
export async function withTransaction<T>(
  executor: ConnectionPool,
  fn: (transaction: Transaction) => Promise<T>
): Promise<T> {
  const transaction = new sql.Transaction(executor);
  await transaction.begin();

  try {
    const result = await fn(transaction);
    await transaction.commit();
    return result;
  } catch (error) {
    try {
      await transaction.rollback();
    } catch (rollbackError) {
      logger.error({ err: rollbackError }, 'Transaction rollback failed');
    }
    throw error;
  }
}
