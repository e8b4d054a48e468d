export { AgentRuntime, DEFAULT_READY_TIMEOUT_MS, DEFAULT_RECURSION_LIMIT } from './AgentRuntime';
export type { AgentRuntimeOptions, CheckpointSource, RunOptions } from './AgentRuntime';
export { createLangGraphAgent } from './AgentExecutor';
export type { AgentExecutor, AgentFactory, LangGraphAgentOptions } from './AgentExecutor';
