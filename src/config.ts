/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

const BooleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

/**
 * Configuration schema with validation and defaults.
 */
export const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['google', 'anthropic', 'openai']).default('google'),
  LLM_MODEL: z.string().default('gemini-1.5-flash-latest'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),

  // API Keys (provider-specific)
  GOOGLE_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Database Configuration (MySQL)
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_USER: z.string().default('root'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().default('tshirt_store'),

  // Pipeline Configuration
  SQL_READ_ONLY_GUARD: BooleanFlag.describe(
    'Reject generated SQL that is not a single read statement'
  ),
  PREVIEW_ROWS: z.coerce.number().int().positive().default(10),
  LOW_STOCK_THRESHOLD: z.coerce.number().int().nonnegative().default(10),

  // Server Configuration
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  /** Absent when the provider's key is not set; the model client fails on use. */
  apiKey?: string;
  maxTokens: number;
}

/**
 * Extended configuration with derived KNEX_CONFIG, DB_CONNECTION and LLM_CONFIG.
 */
export interface Config extends Omit<BaseConfig,
  'DB_HOST' | 'DB_PORT' | 'DB_USER' | 'DB_PASSWORD' | 'DB_NAME' |
  'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_MAX_TOKENS' |
  'GOOGLE_API_KEY' | 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY'
> {
  DB_CONNECTION: Knex.MySqlConnectionConfig;
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
}

const API_KEY_BY_PROVIDER = {
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const satisfies Record<LLMProvider, keyof BaseConfig>;

/**
 * Name of the environment variable holding the key for a provider.
 */
export function apiKeyVariable(provider: LLMProvider): string {
  return API_KEY_BY_PROVIDER[provider];
}

/**
 * Build the derived configuration from already-validated values.
 */
export function buildConfig(baseConfig: BaseConfig): Config {
  const dbConnection: Knex.MySqlConnectionConfig = {
    host: baseConfig.DB_HOST,
    port: baseConfig.DB_PORT,
    user: baseConfig.DB_USER,
    password: baseConfig.DB_PASSWORD,
    database: baseConfig.DB_NAME,
  };

  // One connection per executor call; the factory destroys the instance afterwards.
  const knexConfig: Knex.Config = {
    client: 'mysql2',
    connection: dbConnection,
    pool: { min: 0, max: 1 },
  };

  const llmConfig: LLMConfig = {
    provider: baseConfig.LLM_PROVIDER,
    model: baseConfig.LLM_MODEL,
    apiKey: baseConfig[API_KEY_BY_PROVIDER[baseConfig.LLM_PROVIDER]] || undefined,
    maxTokens: baseConfig.LLM_MAX_TOKENS,
  };

  const {
    DB_HOST,
    DB_PORT,
    DB_USER,
    DB_PASSWORD,
    DB_NAME,
    LLM_PROVIDER,
    LLM_MODEL,
    LLM_MAX_TOKENS,
    GOOGLE_API_KEY,
    ANTHROPIC_API_KEY,
    OPENAI_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    DB_CONNECTION: dbConnection,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
  };
}

/**
 * Parse and validate configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  let baseConfig: BaseConfig;

  try {
    baseConfig = ConfigSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }

  return buildConfig(baseConfig);
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
