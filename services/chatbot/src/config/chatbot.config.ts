import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  optionalString,
  optionalUrl,
  parseEnv,
  platformEnvShape,
  requirePlatformCredentials,
  stringList,
  toPlatformConfig,
  type PlatformConfig
} from '@/config/env';
import { resolveFrom } from '@/utils/files';

export const SERVICE_ROOT = fileURLToPath(new URL('../..', import.meta.url));

const chatbotSchema = z
  .object({
    ...platformEnvShape,
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(5000),
    STATIC_DIR: z.string().default('static'),
    CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.36),
    KNOWLEDGE_WORKFLOW_ID: z.string().min(1, 'KNOWLEDGE_WORKFLOW_ID is required'),

    DATABASE_URL: optionalString(),
    DB_SCHEMA: z.string().default('public'),
    DB_ALLOWED_TABLES: stringList(),
    DB_TABLE_PATTERN: optionalString(),
    DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),

    OPENAI_BASE_URL: z.string().url('OPENAI_BASE_URL must be a valid URL'),
    OPENAI_API_KEY: optionalString(),
    OPENAI_DEPLOYMENT: optionalString(),
    OPENAI_API_VERSION: z.string().default('2024-02-01'),
    OPENAI_CREDENTIALS_URL: optionalUrl(),
    OPENAI_WORKSPACE_ID: optionalString(),
    OPENAI_MODEL_NAME: optionalString(),
    OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000)
  })
  .superRefine(requirePlatformCredentials)
  .superRefine((env, ctx) => {
    if (env.OPENAI_API_KEY && env.OPENAI_DEPLOYMENT) return;
    if (env.OPENAI_CREDENTIALS_URL && env.OPENAI_WORKSPACE_ID && env.OPENAI_MODEL_NAME) return;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['OPENAI_API_KEY'],
      message:
        'set OPENAI_API_KEY and OPENAI_DEPLOYMENT, or OPENAI_CREDENTIALS_URL, OPENAI_WORKSPACE_ID and OPENAI_MODEL_NAME'
    });
  });

export interface OpenAiSettings {
  baseUrl: string;
  apiKey?: string;
  deployment?: string;
  apiVersion: string;
  credentialsUrl?: string;
  workspaceId?: string;
  modelName?: string;
  timeoutMs: number;
}

export interface WarehouseSettings {
  connectionString?: string;
  schema: string;
  allowedTables: string[];
  tablePattern?: string;
  statementTimeoutMs: number;
  poolMax: number;
}

export interface ChatbotConfig {
  host: string;
  port: number;
  staticDir: string;
  confidenceThreshold: number;
  knowledgeWorkflowId: string;
  warehouse: WarehouseSettings;
  openai: OpenAiSettings;
  platform: PlatformConfig;
}

export function loadChatbotConfig(env: NodeJS.ProcessEnv = process.env, root = SERVICE_ROOT): ChatbotConfig {
  const parsed = parseEnv(chatbotSchema, env);
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    staticDir: resolveFrom(root, parsed.STATIC_DIR),
    confidenceThreshold: parsed.CONFIDENCE_THRESHOLD,
    knowledgeWorkflowId: parsed.KNOWLEDGE_WORKFLOW_ID,
    warehouse: {
      connectionString: parsed.DATABASE_URL,
      schema: parsed.DB_SCHEMA,
      allowedTables: parsed.DB_ALLOWED_TABLES,
      tablePattern: parsed.DB_TABLE_PATTERN,
      statementTimeoutMs: parsed.DB_STATEMENT_TIMEOUT_MS,
      poolMax: parsed.DB_POOL_MAX
    },
    openai: {
      baseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ''),
      apiKey: parsed.OPENAI_API_KEY,
      deployment: parsed.OPENAI_DEPLOYMENT,
      apiVersion: parsed.OPENAI_API_VERSION,
      credentialsUrl: parsed.OPENAI_CREDENTIALS_URL,
      workspaceId: parsed.OPENAI_WORKSPACE_ID,
      modelName: parsed.OPENAI_MODEL_NAME,
      timeoutMs: parsed.OPENAI_TIMEOUT_MS
    },
    platform: toPlatformConfig(parsed)
  };
}
