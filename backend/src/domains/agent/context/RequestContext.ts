/**
 * @module domains/agent/context/RequestContext
 *
 * Call-scoped identity for one agent invocation.
 *
 * A RequestContext is built once per top-level `invoke`/`stream` call from
 * the thread id and travels in the run configuration
 * (`configurable.requestContext`). LangGraph hands that configuration to
 * every node and tool of the same run, so concurrent runs never see each
 * other's context. Contexts are frozen.
 *
 * @example
 * ```typescript
 * const context = createRequestContext('42:9f1c...');
 * // { threadId: '42:9f1c...', userId: 42 }
 * await graph.invoke(input, withRequestContext({ configurable: { thread_id } }, context));
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { RunnableConfig } from '@langchain/core/runnables';

export interface RequestContext {
  readonly threadId: string;
  /** Acting user, or null when the thread id carries no valid identity. */
  readonly userId: number | null;
}

/** Key under `configurable` that carries the context. */
export const REQUEST_CONTEXT_KEY = 'requestContext';

const IDENTITY_PATTERN = /^-?\d+$/;

/**
 * Decode the identity segment of `"<userId>:<token>"`: the text before the
 * first `:`. An id without a separator, or whose segment is not an integer,
 * yields null; this never throws.
 */
export function parseThreadIdentity(threadId: string): number | null {
  const separator = threadId.indexOf(':');
  if (separator === -1) {
    return null;
  }
  const segment = threadId.slice(0, separator);

  if (!IDENTITY_PATTERN.test(segment)) {
    return null;
  }

  const userId = Number(segment);
  return Number.isSafeInteger(userId) ? userId : null;
}

/**
 * New thread id owned by `userId`.
 */
export function createThreadId(userId: number): string {
  return `${userId}:${randomUUID().replace(/-/g, '')}`;
}

export function createRequestContext(threadId: string): RequestContext {
  return Object.freeze({ threadId, userId: parseThreadIdentity(threadId) });
}

export function isRequestContext(value: unknown): value is RequestContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    'threadId' in value &&
    typeof value.threadId === 'string' &&
    'userId' in value &&
    (value.userId === null || typeof value.userId === 'number')
  );
}

/**
 * Copy of `config` whose `configurable` carries `context`.
 */
export function withRequestContext(config: RunnableConfig, context: RequestContext): RunnableConfig {
  return {
    ...config,
    configurable: { ...config.configurable, [REQUEST_CONTEXT_KEY]: context },
  };
}

/**
 * Context of the current run, or undefined when the run was started without one.
 */
export function getRequestContext(config: RunnableConfig | undefined): RequestContext | undefined {
  const value: unknown = config?.configurable?.[REQUEST_CONTEXT_KEY];
  return isRequestContext(value) ? value : undefined;
}
