#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { getConfig } from '../config';
import { ConfigError } from '../errors';
import { describeFailure, runInSession, STAGE_LABELS } from '../engine/pipeline';
import { exportSession, renderSession } from '../export/markdown';
import type { ModelClient } from '../openai/client';
import { createRuntime } from '../runtime';
import { SessionStore } from '../state/sessionStore';
import { STAGES, type RunResult, type SessionState, type StageName } from '../types';
import { log, type Logger } from '../util/logger';

export const EXAMPLE_TOPICS = [
  'What are the best businesses for young generation in India to start and earn?',
  'Best affordable shops in Agra for a 10 lakh budget?',
  'Best off-the-beaten-path destinations in India for first-time solo travelers?'
];

const HELP = [
  'Commands:',
  '  topic <text>       set the research topic',
  '  run [topic]        start research on the current (or given) topic',
  '  examples           list example topics',
  '  example <n>        pick example n and start research',
  '  show [stage]       print plan | findings | report | critique (default: status)',
  '  export [dir]       write available results as markdown files',
  '  reset              clear the session',
  '  help               show this help',
  '  quit               leave'
];

export interface InteractiveOptions {
  client: ModelClient;
  model: string;
  outDir: string;
  strictContracts: boolean;
  logger: Logger;
}

function isStage(value: string): value is StageName {
  return STAGES.some(stage => stage === value);
}

/** One interactive user: a topic, a run trigger, a reset trigger and the display of results. */
export class InteractiveSession {
  private readonly store = new SessionStore();
  readonly sessionId: string;
  private topic = '';
  private completedAt: RunResult['completedAt'] = {};

  constructor(private readonly options: InteractiveOptions) {
    this.sessionId = this.store.create().sessionId;
  }

  get state(): SessionState {
    return this.store.require(this.sessionId);
  }

  /** Returns the lines to print, or null when the user quits. */
  async handle(line: string): Promise<string[] | null> {
    const input = line.trim();
    const space = input.indexOf(' ');
    const command = (space === -1 ? input : input.slice(0, space)).toLowerCase();
    const rest = space === -1 ? '' : input.slice(space + 1).trim();

    switch (command) {
      case '': return [];
      case 'quit':
      case 'exit':
        return null;
      case 'help': return HELP;
      case 'topic':
        if (!rest) return ['Enter a topic to research: topic <text>'];
        this.topic = rest;
        return [`Topic set: ${rest}`];
      case 'run':
        if (rest) this.topic = rest;
        return this.run();
      case 'examples':
        return EXAMPLE_TOPICS.map((t, i) => `  ${i + 1}. ${t}`);
      case 'example': {
        const picked = EXAMPLE_TOPICS[Number(rest) - 1];
        if (!picked) return [`Pick an example between 1 and ${EXAMPLE_TOPICS.length}`];
        this.topic = picked;
        return this.run();
      }
      case 'show': return this.show(rest.toLowerCase());
      case 'export': return this.export(rest || this.options.outDir);
      case 'reset':
        this.store.reset(this.sessionId);
        this.topic = '';
        this.completedAt = {};
        return ['Session cleared.'];
      default:
        return [`Unknown command "${command}". Type help for the list.`];
    }
  }

  private async run(): Promise<string[]> {
    if (!this.topic.trim()) return ['Set a topic first: topic <text>'];

    const lines: string[] = [];
    const result = await runInSession(this.store, this.sessionId, this.topic, {
      client: this.options.client,
      model: this.options.model,
      strictContracts: this.options.strictContracts,
      logger: this.options.logger
    });
    this.completedAt = result.completedAt;

    const { plan, findings } = result.state;
    if (plan) {
      lines.push('Research Plan', JSON.stringify(plan, null, 2));
    }
    if (findings) {
      const at = result.completedAt.findings;
      lines.push(`Findings from ${findings.source}${at ? ` at ${at}` : ''}`, findings.summary);
    }
    for (const warning of result.warnings) {
      lines.push(`Warning (${warning.stage}): ${warning.message}`);
    }
    if (result.state.failure) {
      lines.push(describeFailure(result.state.failure));
    } else if (result.state.report) {
      lines.push('Research complete! Draft & review ready.', result.state.report.markdown.slice(0, 600), '...use "show report" for the full document and "show critique" for the review.');
    }
    return lines;
  }

  private show(what: string): string[] {
    const state = this.state;
    if (!what || what === 'status') {
      const held = STAGES.filter(stage => state[stage] !== undefined);
      return [
        `Session ${state.sessionId}: ${state.status}${state.topic ? ` (${state.topic})` : ''}`,
        `Results: ${held.length ? held.join(', ') : 'none'}`
      ];
    }
    if (!isStage(what)) return [`Unknown stage "${what}". Use one of: ${STAGES.join(', ')}`];
    const markdown = renderSession(state, this.completedAt)[what];
    return markdown === undefined ? [`No ${STAGE_LABELS[what]} result yet.`] : [markdown];
  }

  private export(dir: string): string[] {
    try {
      const files = exportSession(this.state, dir, this.completedAt);
      return files.length ? files.map(f => `Saved ${f.stage}: ${f.path}`) : ['Nothing to export yet. Run research first.'];
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.options.logger.error('Export failed', { dir, error: message });
      return [`Export failed: ${message}`];
    }
  }
}

async function main(): Promise<void> {
  const { cfg, client, logger } = createRuntime(getConfig());
  const session = new InteractiveSession({
    client,
    model: cfg.CHAT_MODEL,
    outDir: cfg.OUTPUT_DIR,
    strictContracts: cfg.STRICT_CONTRACTS,
    logger
  });

  log(`Research Agents (${cfg.CHAT_MODEL}) - session ${session.sessionId}`);
  log(HELP.join('\n'));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const output = await session.handle(await rl.question('> '));
      if (output === null) break;
      if (output.length) log(output.join('\n'));
    }
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(error instanceof ConfigError ? `[Research] ${error.message}` : error);
    process.exitCode = error instanceof ConfigError ? 2 : 1;
  });
}
