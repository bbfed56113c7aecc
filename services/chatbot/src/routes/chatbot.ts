import { Router } from 'express';
import { z } from 'zod';
import { HttpError, errorMessage } from '@/utils/errors';
import { asyncHandler } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import { formatChatbotResponse } from '../format/response.formatter';
import type { RouterAgent } from '../router/router.agent';

export const MISSING_MESSAGE = 'Please provide a message';
export const ROUTER_UNAVAILABLE = 'Router agent is not available';

const messageSchema = z.object({
  message: z
    .string({ required_error: MISSING_MESSAGE, invalid_type_error: MISSING_MESSAGE })
    .trim()
    .min(1, MISSING_MESSAGE)
});

interface ChatbotRouterOptions {
  router: Pick<RouterAgent, 'route'> | null;
  logger: Logger;
}

export function createChatbotRouter({ router: agent, logger }: ChatbotRouterOptions): Router {
  const router = Router();

  router.post(
    '/chatbot',
    asyncHandler(async (req, res) => {
      const parsed = messageSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new HttpError(400, MISSING_MESSAGE);
      }
      const message = parsed.data.message;

      if (message.toLowerCase() === 'ping') {
        res.json({ status: 'success', message: 'Server is running' });
        return;
      }
      if (!agent) {
        throw new HttpError(500, ROUTER_UNAVAILABLE);
      }

      logger.info({ messageLength: message.length }, 'Chatbot message received');
      try {
        const result = await agent.route(message);
        if (!result.success) {
          logger.warn({ error: result.error }, 'Routing failed');
          res.status(500).json({
            status: 'error',
            message: `Routing failed: ${result.error ?? 'unknown error'}`,
            debug_info: result
          });
          return;
        }

        res.json({
          status: 'success',
          message: formatChatbotResponse(result.response),
          debug_info: {
            agent_used: result.agent_used,
            classification: result.classification,
            execution_time: result.execution_time
          }
        });
      } catch (err) {
        logger.error({ err }, 'Chatbot request failed');
        throw new HttpError(500, `Sorry, I encountered an error: ${errorMessage(err)}`);
      }
    })
  );

  return router;
}
