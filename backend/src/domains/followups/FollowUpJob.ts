/**
 * @module domains/followups/FollowUpJob
 *
 * Runs the follow-up agent on a fixed interval. A tick that arrives while a
 * run is still in progress is skipped, so runs never overlap. `stop()`
 * cancels the current run and resolves once it has settled.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { isAbortError } from '@/shared/utils/retry';
import type { TaskFollowUpAgent } from './TaskFollowUpAgent';

export interface FollowUpJobConfig {
  intervalMs: number;
  /** Run once right after start (default: true). */
  runOnStart?: boolean;
}

export class FollowUpJob {
  private readonly log: Logger;
  private readonly now: () => Date;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private controller: AbortController | null = null;
  private current: Promise<void> | null = null;

  constructor(
    private readonly agent: Pick<TaskFollowUpAgent, 'run'>,
    private readonly config: FollowUpJobConfig,
    deps?: { logger?: Logger; now?: () => Date }
  ) {
    if (config.intervalMs <= 0) {
      throw new Error(`Follow-up interval must be positive, got ${config.intervalMs}ms`);
    }
    this.log = deps?.logger ?? createChildLogger({ service: 'FollowUpJob' });
    this.now = deps?.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  get isProcessing(): boolean {
    return this.current !== null;
  }

  start(): void {
    if (this.intervalId) {
      this.log.warn('FollowUpJob is already running');
      return;
    }

    this.controller = new AbortController();
    this.intervalId = setInterval(() => this.tick(), this.config.intervalMs);
    this.log.info({ intervalMs: this.config.intervalMs }, 'FollowUpJob started');

    if (this.config.runOnStart ?? true) {
      this.tick();
    }
  }

  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.controller?.abort();
    this.controller = null;

    await this.current;
    this.log.info('FollowUpJob stopped');
  }

  /**
   * Start a run unless one is in progress. Returns the run, or the one
   * already in progress.
   */
  tick(): Promise<void> {
    if (this.current) {
      this.log.debug('Previous follow-up run still in progress, skipping tick');
      return this.current;
    }

    const signal = this.controller?.signal;
    this.current = this.runOnce(signal).finally(() => {
      this.current = null;
    });
    return this.current;
  }

  private async runOnce(signal: AbortSignal | undefined): Promise<void> {
    try {
      const created = await this.agent.run(this.now(), { signal });
      this.log.info({ created }, 'Follow-up run finished');
    } catch (error) {
      if (isAbortError(error)) {
        this.log.info('Follow-up run cancelled');
        return;
      }
      this.log.error({ err: error }, 'Follow-up run failed');
    }
  }
}
