import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOpenAI } from '@langchain/openai';
import { env, type Environment } from '@/infrastructure/config/environment';

export type ModelProvider = 'anthropic' | 'openai';

export interface ModelConfig {
  provider: ModelProvider;
  modelName: string;
  temperature?: number;
  maxTokens?: number;
  streaming?: boolean;
  /** Defaults to the provider key from the environment. */
  apiKey?: string;
  /**
   * OpenAI-compatible endpoint (hosted or local gateways).
   * Ignored for Anthropic.
   */
  baseURL?: string;
  /**
   * Enable extended thinking for Anthropic models.
   * Budget must be >= 1024 tokens and below maxTokens.
   * @see https://docs.anthropic.com/en/docs/build-with-claude/extended-thinking
   */
  enableThinking?: boolean;
  thinkingBudget?: number;
}

export class ModelFactory {
  /**
   * Creates a configured ChatModel instance based on the provider
   */
  static create(config: ModelConfig): BaseChatModel {
    const {
      provider,
      modelName,
      temperature = 0.2,
      maxTokens,
      streaming = true,
      enableThinking = false,
      thinkingBudget,
    } = config;

    switch (provider) {
      case 'anthropic': {
        let thinking: { type: 'enabled'; budget_tokens: number } | { type: 'disabled' } = { type: 'disabled' };

        if (enableThinking) {
          const budget = thinkingBudget ?? 2048;
          if (budget < 1024) {
            throw new Error('Thinking budget must be at least 1024 tokens');
          }
          if (maxTokens && budget >= maxTokens) {
            throw new Error('Thinking budget must be less than maxTokens');
          }
          thinking = { type: 'enabled', budget_tokens: budget };
        }

        return new ChatAnthropic({
          model: modelName,
          // Anthropic rejects a temperature other than 1 while thinking.
          temperature: enableThinking ? undefined : temperature,
          maxTokens,
          streaming,
          apiKey: config.apiKey ?? env.ANTHROPIC_API_KEY,
          thinking,
        });
      }

      case 'openai':
        return new ChatOpenAI({
          model: modelName,
          temperature,
          maxTokens,
          streaming,
          apiKey: config.apiKey ?? env.OPENAI_API_KEY,
          configuration: config.baseURL ? { baseURL: config.baseURL } : undefined,
        });

      default: {
        const unsupported: never = provider;
        throw new Error(`Unsupported model provider: ${String(unsupported)}`);
      }
    }
  }

  /**
   * Model for the assistant, from LLM_PROVIDER / AGENT_MODEL / AGENT_TEMPERATURE.
   */
  static createDefault(config: Environment = env): BaseChatModel {
    return this.create({
      provider: config.LLM_PROVIDER,
      modelName: config.AGENT_MODEL,
      temperature: config.AGENT_TEMPERATURE,
      baseURL: config.OPENAI_BASE_URL,
    });
  }
}
