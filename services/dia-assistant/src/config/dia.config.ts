import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  booleanFlag,
  parseEnv,
  platformEnvShape,
  requirePlatformCredentials,
  stringList,
  toPlatformConfig,
  type PlatformConfig
} from '@/config/env';
import { resolveFrom } from '@/utils/files';

export const SERVICE_ROOT = fileURLToPath(new URL('../..', import.meta.url));

const diaSchema = z
  .object({
    ...platformEnvShape,
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(8000),
    UPLOADS_DIR: z.string().default('uploads'),
    STATIC_DIR: z.string().default('static'),
    MAX_UPLOAD_MB: z.coerce.number().positive().default(25),
    ALLOW_ORIGINS: stringList(),
    ALLOW_CREDENTIALS: booleanFlag(false),
    ALLOW_METHODS: stringList(),
    ALLOW_HEADERS: stringList(),
    WORKFLOW_ID: z.string().min(1, 'WORKFLOW_ID is required')
  })
  .superRefine(requirePlatformCredentials);

export interface CorsSettings {
  origins: string[];
  credentials: boolean;
  methods: string[];
  headers: string[];
}

export interface DiaConfig {
  host: string;
  port: number;
  uploadsDir: string;
  staticDir: string;
  maxUploadMb: number;
  workflowId: string;
  cors: CorsSettings;
  platform: PlatformConfig;
}

const orWildcard = (values: string[]) => (values.length > 0 ? values : ['*']);

export function loadDiaConfig(env: NodeJS.ProcessEnv = process.env, root = SERVICE_ROOT): DiaConfig {
  const parsed = parseEnv(diaSchema, env);
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    uploadsDir: resolveFrom(root, parsed.UPLOADS_DIR),
    staticDir: resolveFrom(root, parsed.STATIC_DIR),
    maxUploadMb: parsed.MAX_UPLOAD_MB,
    workflowId: parsed.WORKFLOW_ID,
    cors: {
      origins: orWildcard(parsed.ALLOW_ORIGINS),
      credentials: parsed.ALLOW_CREDENTIALS,
      methods: orWildcard(parsed.ALLOW_METHODS),
      headers: orWildcard(parsed.ALLOW_HEADERS)
    },
    platform: toPlatformConfig(parsed)
  };
}

