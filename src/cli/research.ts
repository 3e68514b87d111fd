#!/usr/bin/env node
import { getConfig } from '../config';
import { ConfigError } from '../errors';
import { describeFailure, runPipeline } from '../engine/pipeline';
import { exportSession } from '../export/markdown';
import { createRuntime } from '../runtime';
import { newSessionId } from '../state/sessionStore';
import type { RunResult } from '../types';
import { log, type Logger } from '../util/logger';

export interface ResearchArgs {
  topic: string;
  outDir: string;
  export: boolean;
  strict: boolean;
  json: boolean;
}

const USAGE = 'Usage: research "<topic>" [--out <dir>] [--no-export] [--strict] [--json]';

export function parseResearchArgs(argv: string[], defaultOutDir: string): ResearchArgs {
  const words: string[] = [];
  const args: ResearchArgs = { topic: '', outDir: defaultOutDir, export: true, strict: false, json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--out': {
        const dir = argv[++i];
        if (!dir) throw new Error(`--out needs a directory\n${USAGE}`);
        args.outDir = dir;
        break;
      }
      case '--no-export': args.export = false; break;
      case '--strict': args.strict = true; break;
      case '--json': args.json = true; break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option ${arg}\n${USAGE}`);
        words.push(arg);
    }
  }

  args.topic = words.join(' ').trim();
  if (!args.topic) throw new Error(USAGE);
  return args;
}

/** Write the session's results to `dir`; a failed write is logged and reported as false. */
export function exportRun(result: RunResult, dir: string, logger: Logger): boolean {
  try {
    for (const file of exportSession(result.state, dir, result.completedAt)) {
      logger.info(`Wrote ${file.stage}`, { path: file.path });
    }
    return true;
  } catch (error) {
    logger.error('Export failed', { dir, error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

async function main(): Promise<number> {
  const config = getConfig();
  let args: ResearchArgs;
  try {
    args = parseResearchArgs(process.argv.slice(2), config.OUTPUT_DIR);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    return 2;
  }

  const { cfg, client, logger } = createRuntime(config);
  const result = await runPipeline(args.topic, {
    client,
    model: cfg.CHAT_MODEL,
    sessionId: newSessionId(),
    strictContracts: args.strict || cfg.STRICT_CONTRACTS,
    logger
  });

  if (args.json) {
    log(JSON.stringify(result, null, 2));
  } else if (result.state.report) {
    log(result.state.report.markdown);
  }

  log(`\n[Research] ${result.transitions.join(' -> ')} in ${result.durationMs}ms (${result.usage.requests} calls, ${result.usage.inputTokens + result.usage.outputTokens} tokens)`);
  for (const warning of result.warnings) {
    log(`[Research] Warning (${warning.stage}): ${warning.message}`);
  }
  const exported = !args.export || exportRun(result, args.outDir, logger);
  if (result.state.failure) {
    console.error(`[Research] ${describeFailure(result.state.failure)}`);
    return 1;
  }
  return exported ? 0 : 1;
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  }).catch(error => {
    if (error instanceof ConfigError) {
      console.error(`[Research] ${error.message}`);
      process.exitCode = 2;
      return;
    }
    console.error(error);
    process.exitCode = 1;
  });
}
