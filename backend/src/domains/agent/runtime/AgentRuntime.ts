/**
 * @module domains/agent/runtime/AgentRuntime
 *
 * Entry point for conversations with the assistant.
 *
 * The agent is built lazily on first use, after the checkpoint store has
 * reported ready. Concurrent first callers share one build; a failed build
 * is retried by the next caller. Runs on the same thread id are serialized
 * in arrival order, distinct threads run independently.
 *
 * @example
 * ```typescript
 * const runtime = new AgentRuntime({ checkpoints: supervisor, createAgent });
 * const reply = await runtime.invoke('7:9f0c...', 'What is due this week?');
 *
 * for await (const event of runtime.stream(threadId, prompt, { signal })) {
 *   // token | tool_start | tool_end | error
 * }
 * ```
 */

import type { BaseMessage } from '@langchain/core/messages';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { BaseCheckpointSaver } from '@langchain/langgraph-checkpoint';
import type { ConversationTurn, ExecutionEvent } from '@taskpilot/shared';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { KeyedMutex } from '@/shared/utils/KeyedMutex';
import { isAbortError, throwIfAborted } from '@/shared/utils/retry';
import { createRequestContext, withRequestContext, type RequestContext } from '@/domains/agent/context';
import { extractText, translateStreamEvents } from '@/domains/agent/streaming';
import type { AgentExecutor, AgentFactory } from './AgentExecutor';

export const DEFAULT_READY_TIMEOUT_MS = 10_000;
export const DEFAULT_RECURSION_LIMIT = 25;

/** Readiness side of the checkpoint supervisor. */
export interface CheckpointSource {
  waitUntilReady(timeoutMs: number): Promise<BaseCheckpointSaver>;
}

export interface AgentRuntimeOptions {
  checkpoints: CheckpointSource;
  createAgent: AgentFactory;
  readyTimeoutMs?: number;
  recursionLimit?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function lastAssistantText(messages: readonly BaseMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message && message.getType() === 'ai') {
      return extractText(message.content);
    }
  }
  return '';
}

export class AgentRuntime {
  private readonly checkpoints: CheckpointSource;
  private readonly createAgent: AgentFactory;
  private readonly readyTimeoutMs: number;
  private readonly recursionLimit: number;
  private readonly log: Logger;
  private readonly threadLocks = new KeyedMutex();
  private agentPromise: Promise<AgentExecutor> | null = null;

  constructor(options: AgentRuntimeOptions) {
    this.checkpoints = options.checkpoints;
    this.createAgent = options.createAgent;
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.recursionLimit = options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
    this.log = options.logger ?? createChildLogger({ service: 'AgentRuntime' });
  }

  /**
   * Resolves once the agent is built. Rejects with CheckpointerNotReadyError
   * when the checkpoint store does not become ready in time.
   */
  async ready(): Promise<void> {
    await this.getAgent();
  }

  /**
   * Run one turn to completion and return the assistant's final text.
   */
  async invoke(threadId: string, prompt: string, options: RunOptions = {}): Promise<string> {
    const { signal } = options;
    const context = createRequestContext(threadId);
    const agent = await this.getAgent();

    return this.threadLocks.withLock(
      threadId,
      async () => {
        throwIfAborted(signal);
        this.log.info({ threadId, userId: context.userId }, 'Agent run started');
        try {
          const messages = await agent.invoke(prompt, this.runConfig(context, signal));
          const reply = lastAssistantText(messages);
          this.log.info({ threadId, replyLength: reply.length }, 'Agent run completed');
          return reply;
        } catch (error) {
          if (!isAbortError(error)) {
            this.log.error({ err: error, threadId }, 'Agent run failed');
          }
          throw error;
        }
      },
      signal
    );
  }

  /**
   * Stream one turn as ExecutionEvents. A failure other than cancellation
   * ends the stream with an `error` event; cancellation propagates.
   */
  async *stream(threadId: string, prompt: string, options: RunOptions = {}): AsyncGenerator<ExecutionEvent> {
    const { signal } = options;
    const context = createRequestContext(threadId);
    const agent = await this.getAgent();
    const release = await this.threadLocks.acquire(threadId, signal);

    try {
      throwIfAborted(signal);
      this.log.info({ threadId, userId: context.userId }, 'Streaming run started');
      yield* translateStreamEvents(agent.streamEvents(prompt, this.runConfig(context, signal)));
      this.log.info({ threadId }, 'Streaming run completed');
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        this.log.info({ threadId }, 'Streaming run cancelled');
        throw error;
      }
      this.log.error({ err: error, threadId }, 'Streaming run failed');
      yield { type: 'error', message: error instanceof Error ? error.message : String(error) };
    } finally {
      release();
    }
  }

  /**
   * The thread's conversation as stored in its latest checkpoint, user and
   * assistant text only.
   */
  async getHistory(threadId: string): Promise<ConversationTurn[]> {
    const agent = await this.getAgent();
    const messages = await agent.getMessages({ configurable: { thread_id: threadId } });

    return messages.flatMap((message): ConversationTurn[] => {
      const type = message.getType();
      if (type !== 'human' && type !== 'ai') {
        return [];
      }
      const content = extractText(message.content);
      if (!content) {
        return [];
      }
      return [{ role: type === 'human' ? 'user' : 'assistant', content }];
    });
  }

  private getAgent(): Promise<AgentExecutor> {
    if (!this.agentPromise) {
      this.agentPromise = this.buildAgent().catch((error: unknown) => {
        this.agentPromise = null;
        throw error;
      });
    }
    return this.agentPromise;
  }

  private async buildAgent(): Promise<AgentExecutor> {
    const saver = await this.checkpoints.waitUntilReady(this.readyTimeoutMs);
    const agent = await this.createAgent(saver);
    this.log.info('Agent built');
    return agent;
  }

  private runConfig(context: RequestContext, signal: AbortSignal | undefined): RunnableConfig {
    return withRequestContext(
      {
        configurable: { thread_id: context.threadId },
        recursionLimit: this.recursionLimit,
        signal,
      },
      context
    );
  }
}
