/**
 * @module domains/agent/runtime/AgentExecutor
 *
 * The compiled agent as the runtime sees it. The default implementation is a
 * LangGraph ReAct agent over the project tools; tests substitute their own.
 */

import { HumanMessage, isBaseMessage, type BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { StreamEvent } from '@langchain/core/tracers/log_stream';
import type { BaseCheckpointSaver } from '@langchain/langgraph-checkpoint';
import { createReactAgent, ToolNode } from '@langchain/langgraph/prebuilt';
import type { ToolDispatcher, ProjectTool } from '@/domains/agent/tools';

export interface AgentExecutor {
  /** Run to completion and return the thread's messages afterwards. */
  invoke(prompt: string, config: RunnableConfig): Promise<BaseMessage[]>;
  /** Raw LangGraph `streamEvents` (v2) of one run. */
  streamEvents(prompt: string, config: RunnableConfig): AsyncIterable<StreamEvent>;
  /** Messages stored in the thread's latest checkpoint. */
  getMessages(config: RunnableConfig): Promise<BaseMessage[]>;
}

/** Builds the executor once the checkpoint saver is available. */
export type AgentFactory = (saver: BaseCheckpointSaver) => Promise<AgentExecutor>;

export interface LangGraphAgentOptions {
  model: BaseChatModel;
  dispatcher: ToolDispatcher;
  tools: readonly ProjectTool[];
  systemPrompt: string;
}

export function createLangGraphAgent(options: LangGraphAgentOptions): AgentFactory {
  return async (saver) => {
    // Tool errors other than domain errors fail the run instead of being fed back to the model.
    const toolNode = new ToolNode(options.dispatcher.toLangChainTools(options.tools), { handleToolErrors: false });

    const graph = createReactAgent({
      llm: options.model,
      tools: toolNode,
      prompt: options.systemPrompt,
      checkpointSaver: saver,
    });

    const input = (prompt: string) => ({ messages: [new HumanMessage(prompt)] });

    return {
      async invoke(prompt, config) {
        const state = await graph.invoke(input(prompt), config);
        return state.messages;
      },

      streamEvents(prompt, config) {
        return graph.streamEvents(input(prompt), { ...config, version: 'v2' });
      },

      async getMessages(config) {
        const snapshot = await graph.getState(config);
        const messages: unknown = snapshot.values.messages;
        return Array.isArray(messages) ? messages.filter(isBaseMessage) : [];
      },
    };
  };
}
