/**
 * Application Context
 *
 * Everything the HTTP layer and background jobs share, built once at
 * startup and passed explicitly to routers.
 *
 * STORAGE_DRIVER selects the backing stores:
 * - `mssql`: shared SQL Server pool for domain data, chats and follow-ups,
 *   dedicated connection for checkpoints
 * - `memory`: in-process stores, optionally seeded from SEED_DATA_PATH
 *
 * @module appContext
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { Logger } from 'pino';
import type { Environment } from '@/infrastructure/config/environment';
import { closeDatabase, initDatabase } from '@/infrastructure/database/database';
import {
  CheckpointerSupervisor,
  createMemoryConnectionFactory,
  createMSSQLConnectionFactory,
} from '@/infrastructure/checkpointer';
import { ModelFactory } from '@/core/langchain/ModelFactory';
import { createChildLogger } from '@/shared/utils/logger';
import { InMemoryDomainStore, MSSQLDomainStore, loadDomainSeed, type DomainStore } from '@/domains/projects';
import { ChatService, InMemoryChatRepository, MSSQLChatRepository, type ChatRepository } from '@/domains/chats';
import {
  FollowUpJob,
  FollowUpService,
  InMemoryFollowUpRepository,
  MSSQLFollowUpRepository,
  TaskFollowUpAgent,
  type FollowUpRepository,
} from '@/domains/followups';
import { AgentRuntime, createLangGraphAgent } from '@/domains/agent/runtime';
import { PROJECT_TOOLS, ToolDispatcher } from '@/domains/agent/tools';
import { RetryingGenerator } from '@/domains/agent/generation';
import { DEFAULT_SYSTEM_PROMPT, FOLLOW_UP_PROMPT } from '@/domains/agent/prompts';

export interface AppContext {
  config: Environment;
  domainStore: DomainStore;
  chats: ChatService;
  followUps: FollowUpService;
  checkpointer: CheckpointerSupervisor;
  runtime: AgentRuntime;
  /** Null when FOLLOW_UP_INTERVAL_MINUTES is 0. */
  followUpJob: FollowUpJob | null;
  /** Stop background work and release connections. */
  close(): Promise<void>;
}

interface Stores {
  domainStore: DomainStore;
  chatRepository: ChatRepository;
  followUpRepository: FollowUpRepository;
  supervisor: CheckpointerSupervisor;
  release(): Promise<void>;
}

async function createStores(config: Environment, log: Logger): Promise<Stores> {
  if (config.STORAGE_DRIVER === 'memory') {
    const seed = config.SEED_DATA_PATH ? await loadDomainSeed(config.SEED_DATA_PATH) : {};
    log.info({ seedPath: config.SEED_DATA_PATH ?? null }, 'Using in-memory storage');
    return {
      domainStore: new InMemoryDomainStore(seed),
      chatRepository: new InMemoryChatRepository(),
      followUpRepository: new InMemoryFollowUpRepository(),
      supervisor: new CheckpointerSupervisor(createMemoryConnectionFactory()),
      release: async () => undefined,
    };
  }

  const pool = await initDatabase();
  return {
    domainStore: new MSSQLDomainStore(pool),
    chatRepository: new MSSQLChatRepository(pool),
    followUpRepository: new MSSQLFollowUpRepository(pool),
    supervisor: new CheckpointerSupervisor(createMSSQLConnectionFactory()),
    release: closeDatabase,
  };
}

export interface AppContextOverrides {
  /** Chat model for the agent and the follow-up generator (default: from config). */
  model?: BaseChatModel;
  logger?: Logger;
}

/**
 * Build the context and start the checkpointer. The follow-up job, when
 * configured, is created but not started.
 */
export async function createAppContext(config: Environment, overrides: AppContextOverrides = {}): Promise<AppContext> {
  const log = overrides.logger ?? createChildLogger({ service: 'AppContext' });
  const stores = await createStores(config, log);
  const model = overrides.model ?? ModelFactory.createDefault(config);

  const chats = new ChatService(stores.chatRepository);
  const followUps = new FollowUpService(stores.followUpRepository);

  const runtime = new AgentRuntime({
    checkpoints: stores.supervisor,
    createAgent: createLangGraphAgent({
      model,
      dispatcher: new ToolDispatcher(stores.domainStore),
      tools: PROJECT_TOOLS,
      systemPrompt: config.AGENT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    }),
    readyTimeoutMs: config.CHECKPOINTER_READY_TIMEOUT_MS,
    recursionLimit: config.AGENT_RECURSION_LIMIT,
  });

  let followUpJob: FollowUpJob | null = null;
  if (config.FOLLOW_UP_INTERVAL_MINUTES > 0) {
    const agent = new TaskFollowUpAgent({
      domainStore: stores.domainStore,
      generator: new RetryingGenerator({
        prompt: FOLLOW_UP_PROMPT,
        model,
        maxRetries: config.GENERATION_MAX_RETRIES,
        baseDelayMs: config.GENERATION_BASE_DELAY_MS,
      }),
      followUps,
    });
    followUpJob = new FollowUpJob(agent, { intervalMs: config.FOLLOW_UP_INTERVAL_MINUTES * 60_000 });
  }

  stores.supervisor.start();

  return {
    config,
    domainStore: stores.domainStore,
    chats,
    followUps,
    checkpointer: stores.supervisor,
    runtime,
    followUpJob,
    async close() {
      await followUpJob?.stop();
      await stores.supervisor.stop();
      await stores.domainStore.close?.();
      await stores.release();
      log.info('Application context closed');
    },
  };
}
