import cors from 'cors';
import express from 'express';
import type { ErrorBody } from '@/utils/http';
import { createErrorHandler, createRequestLogger } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import type { RouterAgent } from './router/router.agent';
import { createChatbotRouter } from './routes/chatbot';

export interface ChatbotServerDeps {
  router: Pick<RouterAgent, 'route'> | null;
  staticDir: string;
  logger: Logger;
}

const statusBody: ErrorBody = (message) => ({ status: 'error', message });

export function createServer(deps: ChatbotServerDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(createRequestLogger(deps.logger));

  app.get('/', (_req, res) => {
    res.json({ status: 'success', message: 'Chatbot server is running' });
  });

  app.use('/static', express.static(deps.staticDir));
  app.use(createChatbotRouter(deps));
  app.use(createErrorHandler(deps.logger, statusBody));

  return app;
}
