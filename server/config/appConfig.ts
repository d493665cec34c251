/**
 * Application configuration
 *
 * Environment variables are validated once at start-up. `.env` is loaded by
 * dotenv in server/index.ts before this module is read. LOG_LEVEL is only
 * validated here; server/lib/logger.ts reads it directly.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { loggers } from '../lib/logger';

const log = loggers.config;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  EC_RULES_FILE: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_API_KEY_FILE: z.string().default('API_KEY/API_KEY.txt'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  rulesFile?: string;
  openai: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Base directory for relative key file paths */
  cwd?: string;
}

/**
 * Read the API key from a file, or undefined when the file is absent or empty
 */
export function readApiKeyFile(filePath: string, cwd: string = process.cwd()): string | undefined {
  const resolved = path.resolve(cwd, filePath);
  if (!fs.existsSync(resolved)) {
    return undefined;
  }
  const key = fs.readFileSync(resolved, 'utf-8').trim();
  return key === '' ? undefined : key;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadConfigOptions = {}
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  const parsed = result.data;
  const apiKey = parsed.OPENAI_API_KEY ?? readApiKeyFile(parsed.OPENAI_API_KEY_FILE, options.cwd);

  const config: AppConfig = {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    rulesFile: parsed.EC_RULES_FILE,
    openai: {
      apiKey,
      model: parsed.OPENAI_MODEL,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
  };

  log.debug(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      rulesFile: config.rulesFile,
      llmConfigured: apiKey !== undefined,
      model: config.openai.model,
    },
    'Configuration loaded'
  );

  return config;
}
