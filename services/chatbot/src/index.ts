import { ConfigError, loadEnvFiles } from '@/config/env';
import { PlatformClient } from '@/services/platform/platformClient';
import { ensureDir } from '@/utils/files';
import { createLogger, type Logger } from '@/utils/logger';
import { loadChatbotConfig, type ChatbotConfig, SERVICE_ROOT } from './config/chatbot.config';
import { KnowledgeAgent } from './knowledge/knowledge.agent';
import { AzureChatClient } from './llm/azureChat.client';
import { QueryClassifier } from './router/classifier.service';
import { RouterAgent } from './router/router.agent';
import { createServer } from './server';
import { SqlAgent } from './sql/sql.agent';
import { PgWarehouse } from './sql/warehouse';

loadEnvFiles(SERVICE_ROOT);
const logger = createLogger('chatbot');

async function buildRouter(config: ChatbotConfig, log: Logger): Promise<RouterAgent> {
  const llm = new AzureChatClient({ settings: config.openai, logger: log });
  const warehouse = new PgWarehouse(config.warehouse, log);
  const sqlAgent = new SqlAgent({
    llm,
    warehouse,
    settings: config.warehouse,
    staticDir: config.staticDir,
    logger: log
  });

  const classifier = new QueryClassifier({ llm, schema: sqlAgent, logger: log });
  await classifier.initialize();

  const knowledgeAgent = new KnowledgeAgent({
    platform: new PlatformClient({ config: config.platform, logger: log }),
    workflowId: config.knowledgeWorkflowId,
    logger: log
  });

  return new RouterAgent({
    classifier,
    sqlAgent,
    knowledgeAgent,
    confidenceThreshold: config.confidenceThreshold,
    logger: log
  });
}

async function bootstrap() {
  const config = loadChatbotConfig();
  await ensureDir(config.staticDir);

  let router: RouterAgent | null = null;
  try {
    router = await buildRouter(config, logger);
    logger.info({ threshold: config.confidenceThreshold }, 'Router agent initialized');
  } catch (err) {
    logger.error({ err }, 'Failed to initialize router agent');
  }

  const app = createServer({ router, staticDir: config.staticDir, logger });
  app.listen(config.port, config.host, () => {
    logger.info(`Chatbot server listening on ${config.host}:${config.port}`);
  });
}

bootstrap().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error({ issues: err.issues }, 'Invalid configuration');
  } else {
    logger.error({ err }, 'Failed to start chatbot server');
  }
  process.exit(1);
});
