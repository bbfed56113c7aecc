import cors from 'cors';
import express from 'express';
import { createErrorHandler, createRequestLogger } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import { createDownloadRouter } from './routes/download';
import { createGenerateRouter } from './routes/generate';
import { createSettingsRouter } from './routes/settings';
import type { DocumentationGenerator } from './docs/generator.service';
import type { ModelRegistry } from './settings/model.registry';
import type { PreferencesStore } from './settings/preferences.store';
import type multer from 'multer';

export interface AutodocServerDeps {
  generator: Pick<DocumentationGenerator, 'generateWithSizeTiers'>;
  models: Pick<ModelRegistry, 'selectedModel' | 'workflowIdFor' | 'loadConfig' | 'setSelectedModel'>;
  preferences: Pick<PreferencesStore, 'load' | 'update'>;
  upload: multer.Multer;
  uploadDir: string;
  outputDir: string;
  logger: Logger;
  now?: () => Date;
}

export function createServer(deps: AutodocServerDeps) {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(createRequestLogger(deps.logger));

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.use(createGenerateRouter(deps));
  app.use(createDownloadRouter(deps.outputDir, deps.logger));
  app.use(createSettingsRouter(deps));
  app.use(createErrorHandler(deps.logger));

  return app;
}
