import { PlatformClient } from '@/services/platform/platformClient';
import { ConfigError, loadEnvFiles } from '@/config/env';
import { ensureDir } from '@/utils/files';
import { createLogger } from '@/utils/logger';
import { createDiskUpload } from '@/utils/uploads';
import { loadDiaConfig, SERVICE_ROOT } from './config/dia.config';
import { DiaAnalyzer } from './dia/analyzer.service';
import { createServer } from './server';

loadEnvFiles(SERVICE_ROOT);
const logger = createLogger('dia_assistant');

async function bootstrap() {
  const config = loadDiaConfig();
  await ensureDir(config.uploadsDir);
  await ensureDir(config.staticDir);

  const platform = new PlatformClient({ config: config.platform, logger });
  const analyzer = new DiaAnalyzer({ platform, workflowId: config.workflowId, logger });

  const app = createServer({
    analyzer,
    upload: createDiskUpload(config.uploadsDir, config.maxUploadMb),
    staticDir: config.staticDir,
    cors: config.cors,
    logger
  });

  logger.info(
    { uploadsDir: config.uploadsDir, staticDir: config.staticDir },
    'DIA Assistant API starting'
  );
  app.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.host}:${config.port}`);
  });
}

bootstrap().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error({ issues: err.issues }, 'Invalid configuration');
  } else {
    logger.error({ err }, 'Failed to start DIA Assistant API');
  }
  process.exit(1);
});
