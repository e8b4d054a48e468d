/**
 * @module domains/agent
 *
 * The conversational assistant:
 *
 * - runtime: lazily built agent, per-thread serialization, invoke/stream/history
 * - context: request context carried in the run configuration
 * - tools: project tool catalog and dispatcher
 * - streaming: LangGraph events → ExecutionEvents → SSE frames
 * - generation: retrying one-shot generation for auxiliary jobs
 * - prompts: system and follow-up prompts
 */

export * from './runtime';
export * from './context';
export * from './streaming';
export * from './tools';
export * from './generation';
export * from './prompts';
