/**
 * Checkpointer Supervisor
 *
 * Owns the process-wide connection to the checkpoint backend. A single
 * background task opens the connection, publishes the saver through a
 * one-shot readiness promise, then holds the connection until `stop()`.
 *
 * @module infrastructure/checkpointer/CheckpointerSupervisor
 */

import type { BaseCheckpointSaver } from '@langchain/langgraph-checkpoint';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { isAbortError } from '@/shared/utils/retry';

/**
 * An open checkpoint backend: the saver and how to release it.
 */
export interface CheckpointConnection {
  saver: BaseCheckpointSaver;
  close(): Promise<void>;
}

export interface CheckpointConnectionFactory {
  readonly name: string;
  /** Open the connection. `signal` fires when the supervisor is stopped mid-connect. */
  open(signal: AbortSignal): Promise<CheckpointConnection>;
}

/**
 * Raised when the checkpoint store did not become ready in time, or failed to connect.
 */
export class CheckpointerNotReadyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CheckpointerNotReadyError';
  }
}

export class CheckpointerAlreadyStartedError extends Error {
  constructor() {
    super('A checkpointer supervisor is already running in this process');
    this.name = 'CheckpointerAlreadyStartedError';
  }
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export class CheckpointerSupervisor {
  private static activeInstance: CheckpointerSupervisor | null = null;

  private readonly factory: CheckpointConnectionFactory;
  private readonly log: Logger;
  private readonly controller = new AbortController();
  private readonly ready: Promise<BaseCheckpointSaver>;
  private resolveReady: (saver: BaseCheckpointSaver) => void = () => {};
  private rejectReady: (error: unknown) => void = () => {};
  private runTask: Promise<void> | null = null;
  private saver: BaseCheckpointSaver | null = null;

  constructor(factory: CheckpointConnectionFactory, deps?: { logger?: Logger }) {
    this.factory = factory;
    this.log = deps?.logger ?? createChildLogger({ service: 'CheckpointerSupervisor' });
    this.ready = new Promise<BaseCheckpointSaver>((resolve, reject) => {
      this.resolveReady = resolve;
      this.rejectReady = reject;
    });
    // Waiters attach their own handlers; this one only records the failure.
    this.ready.catch((error: unknown) => {
      this.log.debug({ err: error }, 'Checkpointer readiness rejected');
    });
  }

  /**
   * Start the background task. Throws if this or any other supervisor is running.
   */
  start(): void {
    if (this.runTask || CheckpointerSupervisor.activeInstance) {
      throw new CheckpointerAlreadyStartedError();
    }

    CheckpointerSupervisor.activeInstance = this;
    this.log.info({ backend: this.factory.name }, 'Starting checkpointer');
    this.runTask = this.run();
  }

  get isReady(): boolean {
    return this.saver !== null;
  }

  get isRunning(): boolean {
    return this.runTask !== null && CheckpointerSupervisor.activeInstance === this;
  }

  /**
   * Resolve with the saver once ready. Rejects with CheckpointerNotReadyError
   * after `timeoutMs`, or as soon as the connection attempt fails.
   */
  async waitUntilReady(timeoutMs: number): Promise<BaseCheckpointSaver> {
    if (!this.runTask) {
      throw new CheckpointerNotReadyError('Checkpointer supervisor has not been started');
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CheckpointerNotReadyError(`Checkpointer not ready after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.ready, timeout]);
    } catch (error) {
      if (error instanceof CheckpointerNotReadyError) {
        throw error;
      }
      throw new CheckpointerNotReadyError('Checkpointer failed to connect', { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Signal the background task and resolve once the connection is closed.
   */
  async stop(): Promise<void> {
    if (!this.runTask) {
      return;
    }
    this.controller.abort();
    await this.runTask;
  }

  private async run(): Promise<void> {
    let connection: CheckpointConnection | null = null;

    try {
      connection = await this.factory.open(this.controller.signal);

      if (this.controller.signal.aborted) {
        this.rejectReady(new CheckpointerNotReadyError('Checkpointer stopped before it was ready'));
        return;
      }

      this.saver = connection.saver;
      this.resolveReady(connection.saver);
      this.log.info({ backend: this.factory.name }, 'Checkpointer ready');

      await waitForAbort(this.controller.signal);
    } catch (error) {
      if (!isAbortError(error)) {
        this.log.error({ err: error, backend: this.factory.name }, 'Checkpointer connection failed');
      }
      this.rejectReady(error);
    } finally {
      this.saver = null;

      if (connection) {
        try {
          await connection.close();
          this.log.info({ backend: this.factory.name }, 'Checkpointer connection closed');
        } catch (closeError) {
          this.log.error({ err: closeError }, 'Failed to close checkpointer connection');
        }
      }

      if (CheckpointerSupervisor.activeInstance === this) {
        CheckpointerSupervisor.activeInstance = null;
      }
    }
  }
}
