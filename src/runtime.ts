import { validateConfig, type AppConfig } from './config';
import { OpenAIModelClient, type ModelClient } from './openai/client';
import { createLogger, type Logger } from './util/logger';

export interface Runtime {
  cfg: AppConfig;
  client: ModelClient;
  logger: Logger;
}

/** Startup wiring shared by the CLIs. Throws ConfigError when the API key is missing. */
export function createRuntime(cfg: AppConfig): Runtime {
  validateConfig(cfg);
  const logger = createLogger({ level: cfg.LOG_LEVEL, file: cfg.LOG_FILE });
  const client = new OpenAIModelClient({
    apiKey: cfg.OPENAI_API_KEY,
    baseURL: cfg.OPENAI_BASE_URL,
    timeoutMs: cfg.TIMEOUT_MS,
    logger
  });
  return { cfg, client, logger };
}
