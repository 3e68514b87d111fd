import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Also append every entry to this file. */
  file?: string;
  /** Where console output goes; defaults to the matching console method. */
  sink?: (level: Exclude<LogLevel, 'silent'>, line: string) => void;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export function formatLogEntry(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  let entry = `[${now.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${scope}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
}

function consoleSink(level: Exclude<LogLevel, 'silent'>, line: string): void {
  switch (level) {
    case 'debug': return console.debug(line);
    case 'info': return console.info(line);
    case 'warn': return console.warn(line);
    case 'error': return console.error(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const scope = options.scope ?? 'Research';
  const sink = options.sink ?? consoleSink;

  if (options.file) {
    mkdirSync(dirname(options.file), { recursive: true });
  }

  function write(entryLevel: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (PRIORITY[entryLevel] < PRIORITY[level]) return;
    const entry = formatLogEntry(entryLevel, scope, message, context);
    sink(entryLevel, entry);
    if (options.file) {
      try {
        appendFileSync(options.file, entry + '\n');
      } catch (err) {
        console.error(`[Logger] Failed to write to ${options.file}:`, err);
      }
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: childScope => createLogger({ ...options, scope: `${scope}:${childScope}` })
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

/** Unleveled console output for CLI results. */
export function log(...args: unknown[]): void {
  console.log(...args);
}
