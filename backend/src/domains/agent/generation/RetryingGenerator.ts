/**
 * @module domains/agent/generation/RetryingGenerator
 *
 * One-shot text generation (prompt → model → parser) for auxiliary jobs such
 * as follow-up messages. Failed model calls are retried with linear backoff;
 * cancellation is never retried. A parser failure falls back to the raw
 * response text and costs no extra model call.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { BaseOutputParser } from '@langchain/core/output_parsers';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { ChatPromptTemplate } from '@langchain/core/prompts';
import type { Logger } from 'pino';
import type { BaseMessage } from '@langchain/core/messages';
import { createChildLogger } from '@/shared/utils/logger';
import { isAbortError, retryWithLinearBackoff } from '@/shared/utils/retry';
import { extractText } from '@/domains/agent/streaming';

export const DEFAULT_GENERATION_MAX_RETRIES = 2;
export const DEFAULT_GENERATION_BASE_DELAY_MS = 500;

export interface RetryingGeneratorOptions {
  prompt: ChatPromptTemplate;
  model: BaseChatModel;
  /** Defaults to a string parser over the model's text content. */
  parser?: BaseOutputParser<string>;
  maxRetries?: number;
  /** Delay before retry n is `baseDelayMs * n`. */
  baseDelayMs?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export type GenerationInputs = Record<string, unknown>;

export class RetryingGenerator {
  private readonly prompt: ChatPromptTemplate;
  private readonly model: BaseChatModel;
  private readonly parser: BaseOutputParser<string>;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly log: Logger;

  constructor(options: RetryingGeneratorOptions) {
    this.prompt = options.prompt;
    this.model = options.model;
    this.parser = options.parser ?? new StringOutputParser();
    this.maxRetries = options.maxRetries ?? DEFAULT_GENERATION_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_GENERATION_BASE_DELAY_MS;
    this.log = options.logger ?? createChildLogger({ service: 'RetryingGenerator' });

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new Error(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }
    if (this.baseDelayMs < 0) {
      throw new Error(`baseDelayMs must not be negative, got ${this.baseDelayMs}`);
    }
  }

  /**
   * Format the prompt, call the model once and return the trimmed parsed text.
   * After the last retry the final error is raised.
   */
  async generate(inputs: GenerationInputs, options: GenerateOptions = {}): Promise<string> {
    const { signal } = options;

    return retryWithLinearBackoff(
      async () => {
        const messages = await this.prompt.formatMessages(inputs);
        const response = await this.model.invoke(messages, { signal });
        const text = await this.parse(response, signal);
        return text.trim();
      },
      {
        maxRetries: this.maxRetries,
        baseDelay: this.baseDelayMs,
        maxDelay: Number.POSITIVE_INFINITY,
        signal,
        onRetry: (attempt, error, nextDelay) => {
          this.log.warn({ attempt, error: error.message, delayMs: nextDelay }, 'Generation failed, retrying');
        },
      }
    );
  }

  private async parse(response: BaseMessage, signal: AbortSignal | undefined): Promise<string> {
    try {
      return await this.parser.invoke(response, { signal });
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }
      this.log.warn({ err: error }, 'Output parser failed, using raw response text');
      return extractText(response.content);
    }
  }
}
