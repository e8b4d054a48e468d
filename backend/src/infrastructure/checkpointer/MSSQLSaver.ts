/**
 * MSSQLSaver - LangGraph checkpointer for SQL Server
 *
 * Persists conversation checkpoints and pending writes so a thread can be
 * resumed after a restart. Extends BaseCheckpointSaver from
 * @langchain/langgraph-checkpoint.
 *
 * Database tables (created by `setup()` when missing):
 * - langgraph_checkpoints: checkpoint state and metadata per thread
 * - langgraph_checkpoint_writes: pending writes per checkpoint
 *
 * Usage:
 * ```typescript
 * const saver = new MSSQLSaver(createPoolRunner(pool));
 * await saver.setup();
 * const agent = createReactAgent({ llm, tools, checkpointSaver: saver });
 * ```
 */

import { z } from 'zod';
import { BaseCheckpointSaver, copyCheckpoint, WRITES_IDX_MAP } from '@langchain/langgraph-checkpoint';
import type {
  Checkpoint,
  CheckpointTuple,
  CheckpointListOptions,
  ChannelVersions,
  CheckpointMetadata,
  PendingWrite,
  CheckpointPendingWrite,
  SerializerProtocol,
} from '@langchain/langgraph-checkpoint';
import type { RunnableConfig } from '@langchain/core/runnables';
import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import {
  executeQuery,
  isTypedSqlValue,
  sqlParam,
  type SqlParams,
  type SqlType,
} from '@/infrastructure/database/database';

/**
 * Minimal query surface the saver needs. Rows are validated before use.
 */
export interface SqlRunner {
  query(text: string, params?: SqlParams): Promise<Array<Record<string, unknown>>>;
}

/** Column types of the checkpoint tables, bound by parameter name. */
const CHECKPOINT_PARAM_TYPES = new Map<string, SqlType>([
  ['thread_id', sql.NVarChar(255)],
  ['checkpoint_ns', sql.NVarChar(255)],
  ['checkpoint_id', sql.NVarChar(255)],
  ['parent_checkpoint_id', sql.NVarChar(255)],
  ['task_id', sql.NVarChar(255)],
  ['channel', sql.NVarChar(255)],
  ['type', sql.NVarChar(255)],
  ['checkpoint', sql.VarBinary(sql.MAX)],
  ['metadata', sql.VarBinary(sql.MAX)],
  ['value', sql.VarBinary(sql.MAX)],
]);

/**
 * Attach the checkpoint column types to untyped parameters; others pass through.
 */
export function typeCheckpointParams(params: SqlParams): SqlParams {
  const typed: SqlParams = {};
  for (const [key, param] of Object.entries(params)) {
    const type = CHECKPOINT_PARAM_TYPES.get(key);
    typed[key] = type && !isTypedSqlValue(param) ? sqlParam(type, param) : param;
  }
  return typed;
}

/**
 * Adapt an mssql pool to the runner interface.
 */
export function createPoolRunner(pool: ConnectionPool): SqlRunner {
  return {
    async query(text, params) {
      const result = await executeQuery<Record<string, unknown>>(
        pool,
        text,
        params ? typeCheckpointParams(params) : undefined
      );
      return result.recordset ?? [];
    },
  };
}

const SCHEMA_SQL = `
IF OBJECT_ID(N'dbo.langgraph_checkpoints', N'U') IS NULL
CREATE TABLE dbo.langgraph_checkpoints (
  thread_id NVARCHAR(255) NOT NULL,
  checkpoint_ns NVARCHAR(255) NOT NULL DEFAULT N'',
  checkpoint_id NVARCHAR(255) NOT NULL,
  parent_checkpoint_id NVARCHAR(255) NULL,
  checkpoint VARBINARY(MAX) NOT NULL,
  metadata VARBINARY(MAX) NOT NULL,
  created_at DATETIME2 NOT NULL DEFAULT SYSUTCDATETIME(),
  CONSTRAINT PK_langgraph_checkpoints PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id)
);

IF OBJECT_ID(N'dbo.langgraph_checkpoint_writes', N'U') IS NULL
CREATE TABLE dbo.langgraph_checkpoint_writes (
  thread_id NVARCHAR(255) NOT NULL,
  checkpoint_ns NVARCHAR(255) NOT NULL DEFAULT N'',
  checkpoint_id NVARCHAR(255) NOT NULL,
  task_id NVARCHAR(255) NOT NULL,
  idx INT NOT NULL,
  channel NVARCHAR(255) NOT NULL,
  type NVARCHAR(255) NULL,
  value VARBINARY(MAX) NOT NULL,
  CONSTRAINT PK_langgraph_checkpoint_writes PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id, task_id, idx)
);
`;

const checkpointRowSchema = z.object({
  checkpoint_id: z.string(),
  parent_checkpoint_id: z.string().nullable(),
  checkpoint: z.instanceof(Buffer),
  metadata: z.instanceof(Buffer),
});

type CheckpointRow = z.infer<typeof checkpointRowSchema>;

const writeRowSchema = z.object({
  task_id: z.string(),
  channel: z.string(),
  value: z.instanceof(Buffer),
});

/**
 * Envelope structure for serialized data storage.
 *
 * Format:
 * - 4 bytes: type string length (UInt32LE)
 * - N bytes: type string (UTF-8)
 * - Rest: serialized data
 */
export interface SerializedEnvelope {
  type: string;
  data: Uint8Array;
}

export function encodeEnvelope(type: string, data: Uint8Array): Buffer {
  const typeBuffer = Buffer.from(type, 'utf8');
  const lengthBuffer = Buffer.allocUnsafe(4);
  lengthBuffer.writeUInt32LE(typeBuffer.length, 0);

  return Buffer.concat([lengthBuffer, typeBuffer, Buffer.from(data)]);
}

export function decodeEnvelope(buffer: Buffer): SerializedEnvelope {
  const typeLength = buffer.readUInt32LE(0);
  const type = buffer.toString('utf8', 4, 4 + typeLength);
  // Explicit length: a pooled Buffer's ArrayBuffer extends past this value.
  const dataLength = buffer.length - 4 - typeLength;
  const data = new Uint8Array(buffer.buffer, buffer.byteOffset + 4 + typeLength, dataLength);

  return { type, data };
}

function describeError(error: unknown): Record<string, string | undefined> {
  return error instanceof Error
    ? { message: error.message, stack: error.stack, name: error.name }
    : { value: String(error) };
}

/**
 * MSSQLSaver - Persistent checkpoint storage for LangGraph on SQL Server.
 */
export class MSSQLSaver extends BaseCheckpointSaver {
  private readonly runner: SqlRunner;
  private readonly log: Logger;
  private isSetup = false;

  /**
   * @param runner - Query runner bound to the connection this saver owns
   * @param deps - Optional dependencies for testing (logger, serializer)
   */
  constructor(runner: SqlRunner, deps?: { logger?: Logger; serde?: SerializerProtocol }) {
    super(deps?.serde);
    this.runner = runner;
    this.log = deps?.logger ?? createChildLogger({ service: 'MSSQLSaver' });
  }

  /**
   * Create the checkpoint tables if they do not exist. Idempotent.
   */
  async setup(): Promise<void> {
    if (this.isSetup) {
      return;
    }
    await this.runner.query(SCHEMA_SQL);
    this.isSetup = true;
    this.log.info('Checkpoint tables ready');
  }

  private async encode(value: unknown): Promise<Buffer> {
    const [type, data] = await this.serde.dumpsTyped(value);
    return encodeEnvelope(type, data);
  }

  private async decode(buffer: Buffer): Promise<unknown> {
    const { type, data } = decodeEnvelope(buffer);
    return this.serde.loadsTyped(type, data);
  }

  private extractConfigurable(config: RunnableConfig): {
    threadId: string;
    checkpointNs: string;
    checkpointId?: string;
  } {
    const configurable = config.configurable ?? {};
    const threadId: unknown = configurable.thread_id;
    const checkpointNs: unknown = configurable.checkpoint_ns;
    const checkpointId: unknown = configurable.checkpoint_id;

    if (typeof threadId !== 'string' || threadId.length === 0) {
      throw new Error('thread_id is required in config.configurable');
    }

    return {
      threadId,
      checkpointNs: typeof checkpointNs === 'string' ? checkpointNs : '',
      checkpointId: typeof checkpointId === 'string' ? checkpointId : undefined,
    };
  }

  private async loadPendingWrites(
    threadId: string,
    checkpointNs: string,
    checkpointId: string
  ): Promise<CheckpointPendingWrite[]> {
    const rows = await this.runner.query(
      `SELECT task_id, channel, value
         FROM dbo.langgraph_checkpoint_writes
        WHERE thread_id = @thread_id AND checkpoint_ns = @checkpoint_ns AND checkpoint_id = @checkpoint_id
        ORDER BY task_id ASC, idx ASC`,
      { thread_id: threadId, checkpoint_ns: checkpointNs, checkpoint_id: checkpointId }
    );

    const writes: CheckpointPendingWrite[] = [];
    for (const raw of rows) {
      const row = writeRowSchema.parse(raw);
      writes.push([row.task_id, row.channel, await this.decode(row.value)]);
    }
    return writes;
  }

  private async toTuple(threadId: string, checkpointNs: string, row: CheckpointRow): Promise<CheckpointTuple> {
    const checkpointEnvelope = decodeEnvelope(row.checkpoint);
    const metadataEnvelope = decodeEnvelope(row.metadata);
    const checkpoint: Checkpoint = await this.serde.loadsTyped(checkpointEnvelope.type, checkpointEnvelope.data);
    const metadata: CheckpointMetadata = await this.serde.loadsTyped(metadataEnvelope.type, metadataEnvelope.data);
    const pendingWrites = await this.loadPendingWrites(threadId, checkpointNs, row.checkpoint_id);

    return {
      config: {
        configurable: { thread_id: threadId, checkpoint_ns: checkpointNs, checkpoint_id: row.checkpoint_id },
      },
      checkpoint,
      metadata,
      parentConfig: row.parent_checkpoint_id
        ? {
            configurable: {
              thread_id: threadId,
              checkpoint_ns: checkpointNs,
              checkpoint_id: row.parent_checkpoint_id,
            },
          }
        : undefined,
      pendingWrites,
    };
  }

  /**
   * Retrieve a checkpoint tuple: the one named by checkpoint_id, or the
   * thread's most recent one.
   */
  async getTuple(config: RunnableConfig): Promise<CheckpointTuple | undefined> {
    const { threadId, checkpointNs, checkpointId } = this.extractConfigurable(config);

    try {
      const rows = checkpointId
        ? await this.runner.query(
            `SELECT checkpoint_id, parent_checkpoint_id, checkpoint, metadata
               FROM dbo.langgraph_checkpoints
              WHERE thread_id = @thread_id AND checkpoint_ns = @checkpoint_ns AND checkpoint_id = @checkpoint_id`,
            { thread_id: threadId, checkpoint_ns: checkpointNs, checkpoint_id: checkpointId }
          )
        : await this.runner.query(
            `SELECT TOP (1) checkpoint_id, parent_checkpoint_id, checkpoint, metadata
               FROM dbo.langgraph_checkpoints
              WHERE thread_id = @thread_id AND checkpoint_ns = @checkpoint_ns
              ORDER BY checkpoint_id DESC`,
            { thread_id: threadId, checkpoint_ns: checkpointNs }
          );

      const [first] = rows;
      if (!first) {
        return undefined;
      }

      return await this.toTuple(threadId, checkpointNs, checkpointRowSchema.parse(first));
    } catch (error) {
      this.log.error({ error: describeError(error), threadId, checkpointId }, 'Failed to get checkpoint');
      throw error;
    }
  }

  /**
   * List checkpoints for a thread, newest first.
   * Metadata filters are applied after decoding; `limit` counts matches.
   */
  async *list(config: RunnableConfig, options?: CheckpointListOptions): AsyncGenerator<CheckpointTuple> {
    const { threadId, checkpointNs } = this.extractConfigurable(config);
    const beforeId: unknown = options?.before?.configurable?.checkpoint_id;

    let rows: Array<Record<string, unknown>>;
    try {
      rows = await this.runner.query(
        `SELECT checkpoint_id, parent_checkpoint_id, checkpoint, metadata
           FROM dbo.langgraph_checkpoints
          WHERE thread_id = @thread_id AND checkpoint_ns = @checkpoint_ns
            AND (@before_id IS NULL OR checkpoint_id < @before_id)
          ORDER BY checkpoint_id DESC`,
        {
          thread_id: threadId,
          checkpoint_ns: checkpointNs,
          before_id: typeof beforeId === 'string' ? beforeId : null,
        }
      );
    } catch (error) {
      this.log.error({ error: describeError(error), threadId }, 'Failed to list checkpoints');
      throw error;
    }

    let yielded = 0;
    for (const raw of rows) {
      if (options?.limit !== undefined && yielded >= options.limit) {
        return;
      }

      const tuple = await this.toTuple(threadId, checkpointNs, checkpointRowSchema.parse(raw));

      if (options?.filter) {
        const metadata: Record<string, unknown> = { ...tuple.metadata };
        const matches = Object.entries(options.filter).every(([key, value]) => metadata[key] === value);
        if (!matches) {
          continue;
        }
      }

      yielded++;
      yield tuple;
    }
  }

  /**
   * Store a checkpoint. The config's current checkpoint_id becomes the parent.
   */
  async put(
    config: RunnableConfig,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
    _newVersions: ChannelVersions
  ): Promise<RunnableConfig> {
    const { threadId, checkpointNs, checkpointId: parentCheckpointId } = this.extractConfigurable(config);
    const checkpointCopy = copyCheckpoint(checkpoint);

    try {
      await this.runner.query(
        `MERGE dbo.langgraph_checkpoints WITH (HOLDLOCK) AS target
         USING (SELECT @thread_id AS thread_id, @checkpoint_ns AS checkpoint_ns, @checkpoint_id AS checkpoint_id) AS source
            ON target.thread_id = source.thread_id
           AND target.checkpoint_ns = source.checkpoint_ns
           AND target.checkpoint_id = source.checkpoint_id
         WHEN MATCHED THEN
           UPDATE SET checkpoint = @checkpoint, metadata = @metadata, parent_checkpoint_id = @parent_checkpoint_id
         WHEN NOT MATCHED THEN
           INSERT (thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, checkpoint, metadata)
           VALUES (@thread_id, @checkpoint_ns, @checkpoint_id, @parent_checkpoint_id, @checkpoint, @metadata);`,
        {
          thread_id: threadId,
          checkpoint_ns: checkpointNs,
          checkpoint_id: checkpointCopy.id,
          parent_checkpoint_id: parentCheckpointId ?? null,
          checkpoint: await this.encode(checkpointCopy),
          metadata: await this.encode(metadata),
        }
      );

      this.log.debug({ threadId, checkpointNs, checkpointId: checkpointCopy.id, parentCheckpointId }, 'Checkpoint saved');

      return {
        configurable: { thread_id: threadId, checkpoint_ns: checkpointNs, checkpoint_id: checkpointCopy.id },
      };
    } catch (error) {
      this.log.error({ error: describeError(error), threadId }, 'Failed to put checkpoint');
      throw error;
    }
  }

  /**
   * Store pending writes for a checkpoint.
   *
   * Writes to special channels (negative index) replace earlier ones;
   * regular writes are insert-once, so a replayed task does not duplicate them.
   */
  async putWrites(config: RunnableConfig, writes: PendingWrite[], taskId: string): Promise<void> {
    const { threadId, checkpointNs, checkpointId } = this.extractConfigurable(config);

    if (!checkpointId) {
      throw new Error('checkpoint_id is required for putWrites');
    }

    try {
      for (const [index, [channel, value]] of writes.entries()) {
        const idx = WRITES_IDX_MAP[channel] ?? index;
        const [type] = await this.serde.dumpsTyped(value);
        const params: SqlParams = {
          thread_id: threadId,
          checkpoint_ns: checkpointNs,
          checkpoint_id: checkpointId,
          task_id: taskId,
          idx,
          channel,
          type,
          value: await this.encode(value),
        };

        if (idx < 0) {
          await this.runner.query(
            `MERGE dbo.langgraph_checkpoint_writes WITH (HOLDLOCK) AS target
             USING (SELECT @thread_id AS thread_id, @checkpoint_ns AS checkpoint_ns, @checkpoint_id AS checkpoint_id,
                           @task_id AS task_id, @idx AS idx) AS source
                ON target.thread_id = source.thread_id AND target.checkpoint_ns = source.checkpoint_ns
               AND target.checkpoint_id = source.checkpoint_id AND target.task_id = source.task_id
               AND target.idx = source.idx
             WHEN MATCHED THEN UPDATE SET channel = @channel, type = @type, value = @value
             WHEN NOT MATCHED THEN
               INSERT (thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, value)
               VALUES (@thread_id, @checkpoint_ns, @checkpoint_id, @task_id, @idx, @channel, @type, @value);`,
            params
          );
        } else {
          await this.runner.query(
            `IF NOT EXISTS (
               SELECT 1 FROM dbo.langgraph_checkpoint_writes
                WHERE thread_id = @thread_id AND checkpoint_ns = @checkpoint_ns AND checkpoint_id = @checkpoint_id
                  AND task_id = @task_id AND idx = @idx)
             INSERT INTO dbo.langgraph_checkpoint_writes
               (thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, value)
             VALUES (@thread_id, @checkpoint_ns, @checkpoint_id, @task_id, @idx, @channel, @type, @value);`,
            params
          );
        }
      }

      this.log.debug({ threadId, checkpointId, taskId, writeCount: writes.length }, 'Pending writes saved');
    } catch (error) {
      this.log.error({ error: describeError(error), threadId, checkpointId, taskId }, 'Failed to put writes');
      throw error;
    }
  }

  /**
   * Delete all checkpoints and writes for a thread.
   */
  async deleteThread(threadId: string): Promise<void> {
    try {
      await this.runner.query('DELETE FROM dbo.langgraph_checkpoint_writes WHERE thread_id = @thread_id', {
        thread_id: threadId,
      });
      await this.runner.query('DELETE FROM dbo.langgraph_checkpoints WHERE thread_id = @thread_id', {
        thread_id: threadId,
      });
      this.log.info({ threadId }, 'Thread deleted');
    } catch (error) {
      this.log.error({ error: describeError(error), threadId }, 'Failed to delete thread');
      throw error;
    }
  }
}
