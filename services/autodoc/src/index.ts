import { ConfigError, loadEnvFiles } from '@/config/env';
import { PlatformClient } from '@/services/platform/platformClient';
import { ensureDir } from '@/utils/files';
import { createLogger } from '@/utils/logger';
import { createMemoryUpload } from '@/utils/uploads';
import { loadAutodocConfig, SERVICE_ROOT } from './config/autodoc.config';
import { DocumentationGenerator } from './docs/generator.service';
import { createServer } from './server';
import { ModelRegistry } from './settings/model.registry';
import { PreferencesStore } from './settings/preferences.store';

loadEnvFiles(SERVICE_ROOT);
const logger = createLogger('autodoc');

async function bootstrap() {
  const config = loadAutodocConfig();
  await ensureDir(config.outputDir);
  await ensureDir(config.uploadDir);

  const models = await ModelRegistry.fromFile(config.modelsFile, {
    preferencesDir: config.preferencesDir,
    workflowOverride: config.workflowOverride,
    logger
  });
  const platform = new PlatformClient({ config: config.platform, logger });

  const app = createServer({
    generator: new DocumentationGenerator({ platform, logger }),
    models,
    preferences: new PreferencesStore(config.preferencesDir, logger),
    upload: createMemoryUpload(config.maxUploadMb),
    uploadDir: config.uploadDir,
    outputDir: config.outputDir,
    logger
  });

  app.listen(config.port, config.host, () => {
    logger.info({ outputDir: config.outputDir, models: models.availableModels }, `Autodoc API listening on ${config.host}:${config.port}`);
  });
}

bootstrap().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error({ issues: err.issues }, 'Invalid configuration');
  } else {
    logger.error({ err }, 'Failed to start Autodoc API');
  }
  process.exit(1);
});
