/**
 * @module domains/agent/tools/ToolDispatcher
 *
 * Runs project tools on behalf of the model.
 *
 * A tool declares the arguments the model supplies (zod schema) and the
 * values the server injects (`userId` from the request context, `store` from
 * the call's transaction). Injected names always win: a model-supplied key
 * that matches one is dropped before validation.
 *
 * Every call runs in its own Domain Store transaction. Domain errors are
 * answered to the model as `Error: <message>`; anything else propagates and
 * fails the run.
 */

import { z } from 'zod';
import { DynamicStructuredTool, type StructuredToolInterface } from '@langchain/core/tools';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { isDomainError, type DomainStore, type ProjectStore } from '@/domains/projects';
import { getRequestContext, type RequestContext } from '@/domains/agent/context';

export type InjectedName = 'userId' | 'store';

/** Values a tool may have injected. `userId` is only injected when present. */
export interface InjectedValues {
  userId: number;
  store: ProjectStore;
}

/** Schema of model-supplied arguments; tools use `z.object`. */
export type ModelArgsSchema<TArgs> = z.ZodType<TArgs, z.ZodTypeDef, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const NO_USER_MESSAGE = 'Error: no authenticated user for this conversation.';

export interface ProjectToolDefinition<TArgs, TInjected extends InjectedName> {
  name: string;
  description: string;
  schema: ModelArgsSchema<TArgs>;
  injected: readonly TInjected[];
  run(args: TArgs, injected: Pick<InjectedValues, TInjected>): Promise<string>;
}

/**
 * A registered tool with its types erased, ready for the dispatcher.
 */
export interface ProjectTool {
  readonly name: string;
  readonly description: string;
  readonly schema: z.ZodTypeAny;
  readonly injected: readonly InjectedName[];
  execute(modelArgs: Record<string, unknown>, context: RequestContext, store: ProjectStore): Promise<string>;
}

/**
 * Register a tool. The returned ProjectTool validates model arguments with
 * the tool's own schema, after dropping keys that collide with injected names.
 */
export function defineProjectTool<TArgs, TInjected extends InjectedName>(
  definition: ProjectToolDefinition<TArgs, TInjected>
): ProjectTool {
  return {
    name: definition.name,
    description: definition.description,
    schema: definition.schema,
    injected: definition.injected,
    async execute(modelArgs, context, store) {
      const supplied = Object.fromEntries(
        Object.entries(modelArgs).filter(([key]) => !definition.injected.some((name) => name === key))
      );
      const args = definition.schema.parse(supplied);

      // Identity is read lazily so tools that do not declare it never touch a null user.
      const injected: InjectedValues = {
        store,
        get userId(): number {
          if (context.userId === null) {
            throw new Error(`Tool ${definition.name} read userId without an authenticated user`);
          }
          return context.userId;
        },
      };

      return definition.run(args, injected);
    },
  };
}

export class ToolDispatcher {
  private readonly log: Logger;

  constructor(
    private readonly domainStore: DomainStore,
    deps?: { logger?: Logger }
  ) {
    this.log = deps?.logger ?? createChildLogger({ service: 'ToolDispatcher' });
  }

  /**
   * Run one tool call inside its own transaction.
   */
  async dispatch(
    projectTool: ProjectTool,
    modelArgs: Record<string, unknown>,
    context: RequestContext
  ): Promise<string> {
    if (projectTool.injected.includes('userId') && context.userId === null) {
      this.log.warn({ tool: projectTool.name, threadId: context.threadId }, 'Tool call without an authenticated user');
      return NO_USER_MESSAGE;
    }

    try {
      const result = await this.domainStore.transaction((store) => projectTool.execute(modelArgs, context, store));
      this.log.debug({ tool: projectTool.name, threadId: context.threadId }, 'Tool call completed');
      return result;
    } catch (error) {
      if (isDomainError(error)) {
        this.log.info(
          { tool: projectTool.name, threadId: context.threadId, kind: error.kind, message: error.message },
          'Tool call rejected by domain'
        );
        return `Error: ${error.message}`;
      }
      this.log.error({ err: error, tool: projectTool.name, threadId: context.threadId }, 'Tool call failed');
      throw error;
    }
  }

  /**
   * Expose tools to LangChain. The request context is read from the run
   * configuration of each call; a run without one has no authenticated user.
   */
  toLangChainTools(projectTools: readonly ProjectTool[]): StructuredToolInterface[] {
    return projectTools.map(
      (projectTool) =>
        new DynamicStructuredTool({
          name: projectTool.name,
          description: projectTool.description,
          schema: projectTool.schema,
          func: async (input: unknown, _runManager, config) => {
            const context = getRequestContext(config) ?? {
              threadId: String(config?.configurable?.thread_id ?? ''),
              userId: null,
            };
            return this.dispatch(projectTool, isRecord(input) ? input : {}, context);
          },
        })
    );
  }
}
