/**
 * POST /api/chat: one user message per request.
 * JSON mode waits for the turn's final reply; stream mode relays progress over SSE.
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { Coordinator } from '@/coordinator/coordinator';
import type { ReplyChannel, TurnReply } from '@/memory/sessionState';
import { componentLogger } from '@/services/logger';
import { createErrorResponse, createSuccessResponse, zodFieldErrors } from '@/utils/errorResponse';
import { SSE } from '@/utils/sse';

const log = componentLogger('chat');

export const chatRequestSchema = z.object({
  sender: z.string().trim().min(1, 'sender is required').max(200),
  message: z.string().max(4000),
  stream: z.boolean().default(false),
});

export interface ChatRouteOptions {
  chatTimeoutMs: number;
}

interface PendingReply {
  channel: ReplyChannel;
  updates: string[];
  /** Resolves with the final reply, or null when the timeout fires first. */
  final: Promise<TurnReply | null>;
}

function awaitFinalReply(timeoutMs: number): PendingReply {
  const updates: string[] = [];
  let settle: (reply: TurnReply | null) => void = () => undefined;
  const final = new Promise<TurnReply | null>((resolve) => {
    const timer = setTimeout(() => resolve(null), timeoutMs);
    settle = (reply) => {
      clearTimeout(timer);
      resolve(reply);
    };
  });
  return {
    updates,
    final,
    channel: {
      send(reply) {
        if (reply.final) settle(reply);
        else updates.push(reply.text);
      },
    },
  };
}

export function createChatRouter(coordinator: Coordinator, options: ChatRouteOptions): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(createErrorResponse('Invalid chat request', zodFieldErrors(parsed.error), 'VALIDATION_ERROR'));
      return;
    }
    const { sender, message, stream } = parsed.data;

    try {
      if (stream) {
        await streamTurn(coordinator, options, sender, message, res);
        return;
      }

      const pending = awaitFinalReply(options.chatTimeoutMs);
      const handle = await coordinator.handleUserMessage({ sender, text: message, channel: pending.channel });
      const reply = await pending.final;

      if (!reply) {
        log.warn(`${handle.sessionKey}#${handle.turnId}: no final reply within ${options.chatTimeoutMs}ms`);
        res.status(504).json({
          ...createErrorResponse('The assistant did not answer in time', undefined, 'CHAT_TIMEOUT'),
          data: { ...handle, updates: pending.updates },
        });
        return;
      }
      res.json(createSuccessResponse({ ...handle, reply: reply.text, updates: pending.updates }));
    } catch (err: unknown) {
      next(err);
    }
  });

  return router;
}

async function streamTurn(
  coordinator: Coordinator,
  options: ChatRouteOptions,
  sender: string,
  message: string,
  res: Response,
): Promise<void> {
  const sse = new SSE(res);
  sse.init();

  const timer = setTimeout(() => {
    sse.send('error', { message: 'The assistant did not answer in time', code: 'CHAT_TIMEOUT' });
    sse.close();
  }, options.chatTimeoutMs);
  res.on('close', () => clearTimeout(timer));

  const channel: ReplyChannel = {
    send(reply) {
      if (!reply.final) {
        sse.send('status', { text: reply.text });
        return;
      }
      clearTimeout(timer);
      sse.send('final', { sessionKey: reply.sessionKey, turnId: reply.turnId, text: reply.text });
      sse.close();
    },
  };

  const handle = await coordinator.handleUserMessage({ sender, text: message, channel });
  log.debug(`${handle.sessionKey}#${handle.turnId}: streaming`);
}
