import path from 'path';
import cors from 'cors';
import express from 'express';
import type multer from 'multer';
import { createErrorHandler, createRequestLogger } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import type { CorsSettings } from './config/dia.config';
import type { DiaAnalyzer } from './dia/analyzer.service';
import { createAnalyzeRouter } from './routes/analyze';

export interface DiaServerDeps {
  analyzer: Pick<DiaAnalyzer, 'process'>;
  upload: multer.Multer;
  staticDir: string;
  cors: CorsSettings;
  logger: Logger;
}

export function createServer(deps: DiaServerDeps) {
  const app = express();

  app.use(
    cors({
      origin: deps.cors.origins.includes('*') ? '*' : deps.cors.origins,
      credentials: deps.cors.credentials,
      methods: deps.cors.methods,
      allowedHeaders: deps.cors.headers
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(createRequestLogger(deps.logger));

  app.get('/', (_req, res) => {
    deps.logger.info('Serving web interface');
    res.sendFile(path.join(deps.staticDir, 'index.html'));
  });

  app.get('/api/status', (_req, res) => {
    res.json({ message: 'AI-Assisted DIA API is running' });
  });

  app.use('/static', express.static(deps.staticDir));
  app.use(createAnalyzeRouter(deps));
  app.use(createErrorHandler(deps.logger));

  return app;
}
