/**
 * Assistant Routes
 *
 * Endpoints:
 * - POST /api/agent/run - Run one turn, answer with the final message
 * - POST /api/agent/run/stream - Run one turn as server-sent events
 * - GET /api/agent/chats - Caller's chats, most recently updated first
 * - GET /api/agent/chats/:threadId/history - Chat log of a thread
 * - GET /api/agent/chats/:threadId/checkpoint-history - Conversation from the checkpoint
 *
 * A request without `threadId` starts a new chat owned by the caller. A
 * thread the caller does not own is answered as not found.
 *
 * @module routes/agent
 */

import { Router, type Request, type Response } from 'express';
import {
  ErrorCode,
  runAgentRequestSchema,
  threadIdParamSchema,
  validateSafe,
  type ChatHistoryResponse,
  type RunAgentRequest,
  type RunAgentResponse,
} from '@taskpilot/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { isAbortError } from '@/shared/utils/retry';
import { sendError, sendServiceError, sendValidationError } from '@/shared/utils/error-response';
import { authenticateJWT, requireUserId } from '@/middleware/auth';
import type { AgentRuntime } from '@/domains/agent/runtime';
import { encodeExecutionStream } from '@/domains/agent/streaming';
import type { Chat, ChatService } from '@/domains/chats';
import { abortOnClientClose } from './helpers/abort';
import { toChatMessageDto, toChatSummary } from './helpers/dto';

const logger = createChildLogger({ service: 'AgentRoutes' });

export interface AgentRouterDeps {
  runtime: AgentRuntime;
  chats: ChatService;
  jwtSecret: string;
}

export function createAgentRouter(deps: AgentRouterDeps): Router {
  const { runtime, chats } = deps;
  const router = Router();
  const auth = authenticateJWT(deps.jwtSecret);

  /**
   * Resolve the chat for a run and make sure the agent can serve it.
   * Sends the error response and returns null when it cannot.
   */
  async function openChat(req: Request, res: Response, body: RunAgentRequest): Promise<Chat | null> {
    try {
      const chat = await chats.startOrResume(requireUserId(req), body.prompt, body.threadId);
      if (!chat) {
        sendError(res, ErrorCode.CHAT_NOT_FOUND);
        return null;
      }
      await runtime.ready();
      return chat;
    } catch (error) {
      sendServiceError(res, error, logger);
      return null;
    }
  }

  /** Owned chat for the `:threadId` param, or null once a 400/404 is sent. */
  async function ownedChatFromParams(req: Request, res: Response): Promise<Chat | null> {
    const params = validateSafe(threadIdParamSchema, req.params);
    if (!params.success) {
      sendValidationError(res, params.error);
      return null;
    }
    const chat = await chats.findOwnedChat(requireUserId(req), params.data.threadId);
    if (!chat) {
      sendError(res, ErrorCode.CHAT_NOT_FOUND);
      return null;
    }
    return chat;
  }

  router.post('/run', auth, async (req: Request, res: Response): Promise<void> => {
    const body = validateSafe(runAgentRequestSchema, req.body);
    if (!body.success) {
      sendValidationError(res, body.error);
      return;
    }

    const chat = await openChat(req, res, body.data);
    if (!chat) {
      return;
    }

    let message: string;
    try {
      message = await runtime.invoke(chat.threadId, body.data.prompt, { signal: abortOnClientClose(res) });
    } catch (error) {
      if (isAbortError(error)) {
        logger.info({ threadId: chat.threadId }, 'Client disconnected during run');
        return;
      }
      logger.error({ err: error, threadId: chat.threadId }, 'Agent run failed');
      sendError(res, ErrorCode.AGENT_ERROR);
      return;
    }

    try {
      await chats.recordExchange(chat, body.data.prompt, message);
    } catch (error) {
      logger.error({ err: error, threadId: chat.threadId }, 'Failed to persist completed exchange');
    }

    const response: RunAgentResponse = { message, threadId: chat.threadId };
    res.json(response);
  });

  router.post('/run/stream', auth, async (req: Request, res: Response): Promise<void> => {
    const body = validateSafe(runAgentRequestSchema, req.body);
    if (!body.success) {
      sendValidationError(res, body.error);
      return;
    }

    const chat = await openChat(req, res, body.data);
    if (!chat) {
      return;
    }
    const { prompt } = body.data;
    const signal = abortOnClientClose(res);

    res.status(200).set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    const frames = encodeExecutionStream({
      threadId: chat.threadId,
      events: runtime.stream(chat.threadId, prompt, { signal }),
      onComplete: ({ response }) => chats.recordExchange(chat, prompt, response),
    });

    try {
      for await (const frame of frames) {
        res.write(frame);
      }
    } catch (error) {
      if (isAbortError(error)) {
        logger.info({ threadId: chat.threadId }, 'Client disconnected during stream');
      } else {
        logger.error({ err: error, threadId: chat.threadId }, 'Stream ended unexpectedly');
      }
    } finally {
      res.end();
    }
  });

  router.get('/chats', auth, async (req: Request, res: Response): Promise<void> => {
    try {
      const list = await chats.listChats(requireUserId(req));
      res.json(list.map(toChatSummary));
    } catch (error) {
      sendServiceError(res, error, logger);
    }
  });

  router.get('/chats/:threadId/history', auth, async (req: Request, res: Response): Promise<void> => {
    try {
      const chat = await ownedChatFromParams(req, res);
      if (!chat) {
        return;
      }
      const messages = await chats.listMessages(chat);
      const response: ChatHistoryResponse = { threadId: chat.threadId, messages: messages.map(toChatMessageDto) };
      res.json(response);
    } catch (error) {
      sendServiceError(res, error, logger);
    }
  });

  router.get('/chats/:threadId/checkpoint-history', auth, async (req: Request, res: Response): Promise<void> => {
    try {
      const chat = await ownedChatFromParams(req, res);
      if (!chat) {
        return;
      }
      const messages = await runtime.getHistory(chat.threadId);
      res.json({ threadId: chat.threadId, messages });
    } catch (error) {
      sendServiceError(res, error, logger);
    }
  });

  return router;
}
