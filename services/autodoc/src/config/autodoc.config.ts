import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  optionalString,
  parseEnv,
  platformEnvShape,
  requirePlatformCredentials,
  toPlatformConfig,
  type PlatformConfig
} from '@/config/env';
import { resolveFrom } from '@/utils/files';

export const SERVICE_ROOT = fileURLToPath(new URL('../..', import.meta.url));

const autodocSchema = z
  .object({
    ...platformEnvShape,
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(5001),
    OUTPUT_DIR: z.string().default('output'),
    UPLOAD_DIR: z.string().default('template_uploads'),
    PREFERENCES_DIR: z.string().default('~/.autodoc'),
    MODELS_FILE: z.string().default('config/models.json'),
    MAX_UPLOAD_MB: z.coerce.number().positive().default(10),
    WORKFLOW_ID: optionalString()
  })
  .superRefine(requirePlatformCredentials);

export interface AutodocConfig {
  host: string;
  port: number;
  outputDir: string;
  uploadDir: string;
  preferencesDir: string;
  modelsFile: string;
  maxUploadMb: number;
  workflowOverride?: string;
  platform: PlatformConfig;
}

export function loadAutodocConfig(env: NodeJS.ProcessEnv = process.env, root = SERVICE_ROOT): AutodocConfig {
  const parsed = parseEnv(autodocSchema, env);
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    outputDir: resolveFrom(root, parsed.OUTPUT_DIR),
    uploadDir: resolveFrom(root, parsed.UPLOAD_DIR),
    preferencesDir: resolveFrom(root, parsed.PREFERENCES_DIR),
    modelsFile: resolveFrom(root, parsed.MODELS_FILE),
    maxUploadMb: parsed.MAX_UPLOAD_MB,
    workflowOverride: parsed.WORKFLOW_ID,
    platform: toPlatformConfig(parsed)
  };
}
