import { InputError, UpstreamError, isStageError } from '../errors';
import type { ModelClient } from '../openai/client';
import type { SessionStore } from '../state/sessionStore';
import type {
  ContractWarning,
  PipelineStatus,
  RunResult,
  SessionState,
  StageFailure,
  StageName,
  TokenUsage
} from '../types';
import { deepFreeze } from '../util/freeze';
import { silentLogger, type Logger } from '../util/logger';
import type { GeneratorContext, StageOutput } from './agent';
import { checkFindings, checkReport, enforce } from './contracts';
import { generateCritique } from './critique';
import { generateFindings } from './findings';
import { generatePlan } from './plan';
import { generateReport } from './report';

export interface PipelineOptions {
  client: ModelClient;
  model: string;
  sessionId?: string;
  /** Fail the stage when findings/report miss their length or structure targets. */
  strictContracts?: boolean;
  logger?: Logger;
  /** Called with every new snapshot, starting with the idle one. */
  onTransition?: (state: SessionState) => void;
}

export const STAGE_LABELS: Record<StageName, string> = {
  plan: 'Triage Agent (research plan)',
  findings: 'Research Agent (findings)',
  report: 'Editor Agent (report)',
  critique: 'Critic Agent (critique)'
};

export function describeFailure(failure: StageFailure): string {
  const label = STAGE_LABELS[failure.stage];
  if (failure.kind === 'malformed') {
    return `${label} returned a malformed response: ${failure.message}. Please run the research again.`;
  }
  return `${label} failed: ${failure.message}`;
}

/**
 * Run plan -> findings -> report -> critique once. The first failing stage
 * ends the run; whatever earlier stages produced stays in the returned state.
 */
export async function runPipeline(topic: string, options: PipelineOptions): Promise<RunResult> {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new InputError('Topic must be a non-empty string');
  }

  const startTime = Date.now();
  const logger = (options.logger ?? silentLogger).child('Pipeline');
  const ctx: GeneratorContext = { client: options.client, model: options.model };
  const strict = options.strictContracts ?? false;

  const transitions: PipelineStatus[] = [];
  const warnings: ContractWarning[] = [];
  const usage: TokenUsage = { inputTokens: 0, outputTokens: 0, requests: 0 };
  const completedAt: RunResult['completedAt'] = {};

  let state: SessionState = { sessionId: options.sessionId ?? '', topic: trimmed, status: 'idle' };
  let stage: StageName = 'plan';

  const emit = (): void => {
    deepFreeze(state);
    transitions.push(state.status);
    options.onTransition?.(state);
  };
  const advance = (next: Partial<SessionState> & { status: PipelineStatus }): void => {
    state = { ...state, ...next };
    emit();
  };
  const take = <T>(output: StageOutput<T>): T => {
    completedAt[stage] = new Date().toISOString();
    usage.requests += 1;
    usage.inputTokens += output.usage?.inputTokens ?? 0;
    usage.outputTokens += output.usage?.outputTokens ?? 0;
    return output.value;
  };
  const note = (found: ContractWarning[]): void => {
    for (const warning of found) {
      logger.warn(warning.message, { stage: warning.stage });
    }
    warnings.push(...found);
    enforce(found, strict);
  };

  emit();
  logger.info(`Working on: ${trimmed}`, { sessionId: state.sessionId, model: options.model });

  try {
    advance({ status: 'plan_pending' });
    logger.info('Triage Agent: creating research plan...');
    const plan = take(await generatePlan(ctx, trimmed));

    stage = 'findings';
    advance({ status: 'findings_pending', plan });
    logger.info('Research Agent: gathering concise findings...', { queries: plan.queries.length });
    const findings = take(await generateFindings(ctx, plan));
    note(checkFindings(findings));

    stage = 'report';
    advance({ status: 'report_pending', findings });
    logger.info('Editor Agent: drafting the comprehensive report...');
    const report = take(await generateReport(ctx, plan, findings));
    note(checkReport(report));

    stage = 'critique';
    advance({ status: 'critique_pending', report });
    logger.info('Critic Agent: reviewing the report...', { words: report.wordCount });
    const critique = take(await generateCritique(ctx, report));

    advance({ status: 'done', critique });
    logger.info('Research complete', { issues: critique.issues.length, suggestions: critique.suggestions.length });
  } catch (error) {
    if (!isStageError(error)) throw error;

    const failure: StageFailure = {
      stage: error.stage ?? stage,
      kind: error instanceof UpstreamError ? 'upstream' : 'malformed',
      message: error.message
    };
    logger.error(describeFailure(failure), error instanceof UpstreamError
      ? { kind: error.kind, status: error.status }
      : { code: error.code, issues: error.issues });
    advance({ status: 'failed', failure });
  }

  return { state, transitions, warnings, usage, durationMs: Date.now() - startTime, completedAt };
}

/**
 * Drive one run for a stored session: the session is cleared, then every
 * snapshot the pipeline emits replaces it wholesale.
 */
export async function runInSession(
  store: SessionStore,
  sessionId: string,
  topic: string,
  options: Omit<PipelineOptions, 'sessionId'>
): Promise<RunResult> {
  store.require(sessionId);
  return runPipeline(topic, {
    ...options,
    sessionId,
    onTransition: snapshot => {
      store.commit(snapshot);
      options.onTransition?.(snapshot);
    }
  });
}
