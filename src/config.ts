import { config as loadDotenv } from 'dotenv';
import { ConfigError } from './errors';
import type { LogLevel } from './util/logger';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface AppConfig {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL?: string; // any OpenAI-compatible endpoint
  CHAT_MODEL: string;
  TIMEOUT_MS?: number; // unset = SDK default
  STRICT_CONTRACTS: boolean; // word-count breaches fail the stage instead of warning
  LOG_LEVEL: LogLevel;
  LOG_FILE?: string;
  OUTPUT_DIR: string;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got: ${raw}`);
  }
  return parsed;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ConfigError(`${key} must be a boolean (true/false/1/0/yes/no), got: ${raw}`);
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = (readString(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${raw}`);
  }
  return level;
}

/**
 * Read configuration from the environment. A missing API key is not an error
 * here so that library code can be imported without credentials; call
 * {@link validateConfig} before talking to the model.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    OPENAI_API_KEY: readString(env, 'OPENAI_API_KEY') ?? '',
    OPENAI_BASE_URL: readString(env, 'OPENAI_BASE_URL'),
    CHAT_MODEL: readString(env, 'CHAT_MODEL') ?? 'gpt-4o-mini',
    TIMEOUT_MS: readInt(env, 'REQUEST_TIMEOUT_MS'),
    STRICT_CONTRACTS: readBool(env, 'STRICT_CONTRACTS', false),
    LOG_LEVEL: readLogLevel(env),
    LOG_FILE: readString(env, 'LOG_FILE'),
    OUTPUT_DIR: readString(env, 'OUTPUT_DIR') ?? './reports'
  };
}

export function validateConfig(cfg: AppConfig): void {
  if (!cfg.OPENAI_API_KEY) {
    throw new ConfigError('Missing required environment variable: OPENAI_API_KEY (set it in .env)');
  }
}

let cached: AppConfig | undefined;

/** Load `.env` and read the environment once, on first use rather than at import. */
export function getConfig(): AppConfig {
  if (!cached) {
    loadDotenv();
    cached = loadConfig();
  }
  return cached;
}
