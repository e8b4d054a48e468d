/**
 * Environment Configuration
 *
 * Loads and validates environment variables.
 *
 * @module infrastructure/config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

const numberFrom = (fallback: string) => z.string().default(fallback).transform(Number).pipe(z.number());
const booleanFrom = (fallback: 'true' | 'false') =>
  z.string().default(fallback).transform((v) => v === 'true');

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3001').transform(Number).pipe(z.number().min(1000).max(65535)),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Storage backend for domain data, chats and follow-ups
  STORAGE_DRIVER: z.enum(['mssql', 'memory']).default('mssql'),
  // JSON file loaded into the memory driver at startup
  SEED_DATA_PATH: z.string().optional(),

  // Database
  DATABASE_SERVER: z.string().optional(),
  DATABASE_NAME: z.string().optional(),
  DATABASE_USER: z.string().optional(),
  DATABASE_PASSWORD: z.string().optional(),
  DATABASE_PORT: numberFrom('1433'),
  DATABASE_ENCRYPT: booleanFrom('true'),

  // Auth
  JWT_SECRET: z.string().optional(),

  // Model provider
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  AGENT_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  AGENT_TEMPERATURE: numberFrom('0.2'),

  // Agent runtime
  AGENT_RECURSION_LIMIT: numberFrom('25'),
  AGENT_SYSTEM_PROMPT: z.string().optional(),
  CHECKPOINTER_READY_TIMEOUT_MS: numberFrom('10000'),

  // Auxiliary generation
  GENERATION_MAX_RETRIES: numberFrom('2'),
  GENERATION_BASE_DELAY_MS: numberFrom('500'),
  FOLLOW_UP_INTERVAL_MINUTES: numberFrom('0'),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment record.
 * Throws with the failing fields when validation fails.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment variables: ${fields}`);
  }

  return parsed.data;
}

/**
 * Typed environment configuration
 */
export const env = parseEnvironment(process.env);

export const isProd = env.NODE_ENV === 'production';

export const isDev = env.NODE_ENV === 'development';

/**
 * Validate that the secrets needed to serve requests are present.
 * Called once at startup; throws listing everything that is missing.
 */
export function validateRequiredSecrets(config: Environment = env): void {
  const missing: string[] = [];

  if (!config.JWT_SECRET) {
    missing.push('JWT_SECRET');
  }
  if (config.LLM_PROVIDER === 'anthropic' && !config.ANTHROPIC_API_KEY) {
    missing.push('ANTHROPIC_API_KEY');
  }
  if (config.LLM_PROVIDER === 'openai' && !config.OPENAI_API_KEY) {
    missing.push('OPENAI_API_KEY');
  }
  if (config.STORAGE_DRIVER === 'mssql') {
    for (const key of ['DATABASE_SERVER', 'DATABASE_NAME', 'DATABASE_USER', 'DATABASE_PASSWORD'] as const) {
      if (!config[key]) {
        missing.push(key);
      }
    }
  }

  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }
}

/**
 * Configuration summary safe to log (no secrets).
 */
export function describeConfig(config: Environment = env): Record<string, string | number | boolean> {
  return {
    nodeEnv: config.NODE_ENV,
    port: config.PORT,
    storageDriver: config.STORAGE_DRIVER,
    databaseServer: config.DATABASE_SERVER ?? 'not set',
    databaseName: config.DATABASE_NAME ?? 'not set',
    llmProvider: config.LLM_PROVIDER,
    agentModel: config.AGENT_MODEL,
    recursionLimit: config.AGENT_RECURSION_LIMIT,
    checkpointerReadyTimeoutMs: config.CHECKPOINTER_READY_TIMEOUT_MS,
    followUpIntervalMinutes: config.FOLLOW_UP_INTERVAL_MINUTES,
    jwtSecretSet: Boolean(config.JWT_SECRET),
  };
}
