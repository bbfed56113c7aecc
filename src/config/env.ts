import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

/** Loads `<serviceRoot>/.env`, then `.env` in the working directory. Values already set win. */
export function loadEnvFiles(serviceRoot: string): void {
  dotenv.config({ path: path.join(serviceRoot, '.env') });
  dotenv.config();
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Treats empty strings as unset so `FOO=` in a .env file behaves like a missing variable. */
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const optionalString = () => z.preprocess(blankAsUndefined, z.string().trim().optional());

export const optionalUrl = () => z.preprocess(blankAsUndefined, z.string().url().optional());

export const booleanFlag = (fallback: boolean) =>
  z
    .preprocess(blankAsUndefined, z.enum(['true', 'false', 'TRUE', 'FALSE', 'True', 'False']).optional())
    .transform((value) => (value === undefined ? fallback : value.toLowerCase() === 'true'));

export const stringList = () =>
  z
    .preprocess(blankAsUndefined, z.string().optional())
    .transform((value) =>
      value
        ? value
            .split(',')
            .map((item) => item.trim())
            .filter(Boolean)
        : []
    );

export const platformEnvShape = {
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PLATFORM_BASE_URL: z.string().url('PLATFORM_BASE_URL must be a valid URL'),
  PLATFORM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  AUTH_URL: optionalUrl(),
  CLIENT_ID: optionalString(),
  CLIENT_SECRET: optionalString(),
  AUDIENCE: optionalString(),
  GRANT_TYPE: z.string().default('client_credentials'),
  PERSONAL_TOKEN: optionalString()
};

type PlatformEnv = {
  PLATFORM_BASE_URL: string;
  PLATFORM_TIMEOUT_MS: number;
  AUTH_URL?: string;
  CLIENT_ID?: string;
  CLIENT_SECRET?: string;
  AUDIENCE?: string;
  GRANT_TYPE: string;
  PERSONAL_TOKEN?: string;
};

export function requirePlatformCredentials(env: PlatformEnv, ctx: z.RefinementCtx) {
  if (env.PERSONAL_TOKEN) return;
  if (env.AUTH_URL && env.CLIENT_ID && env.CLIENT_SECRET && env.AUDIENCE) return;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    path: ['PERSONAL_TOKEN'],
    message: 'set PERSONAL_TOKEN, or AUTH_URL, CLIENT_ID, CLIENT_SECRET and AUDIENCE'
  });
}

export interface PlatformAuthConfig {
  personalToken?: string;
  authUrl?: string;
  clientId?: string;
  clientSecret?: string;
  audience?: string;
  grantType: string;
}

export interface PlatformConfig {
  baseUrl: string;
  timeoutMs: number;
  auth: PlatformAuthConfig;
}

export function toPlatformConfig(env: PlatformEnv): PlatformConfig {
  return {
    baseUrl: env.PLATFORM_BASE_URL.replace(/\/+$/, ''),
    timeoutMs: env.PLATFORM_TIMEOUT_MS,
    auth: {
      personalToken: env.PERSONAL_TOKEN,
      authUrl: env.AUTH_URL,
      clientId: env.CLIENT_ID,
      clientSecret: env.CLIENT_SECRET,
      audience: env.AUDIENCE,
      grantType: env.GRANT_TYPE
    }
  };
}

export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): z.output<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

const platformSchema = z.object(platformEnvShape).superRefine(requirePlatformCredentials);

export function loadPlatformConfig(env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  return toPlatformConfig(parseEnv(platformSchema, env));
}
