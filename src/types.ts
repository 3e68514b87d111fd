export type StageName = 'plan' | 'findings' | 'report' | 'critique';

export const STAGES: readonly StageName[] = ['plan', 'findings', 'report', 'critique'];

export interface ResearchPlan {
  topic: string;
  queries: string[];    // 3–5
  focusAreas: string[]; // 3–5
}

export interface Findings {
  summary: string; // < 300 words, asked for, not enforced
  source: string;  // agent and model that wrote the summary
}

export interface Report {
  title: string;
  markdown: string;
  outline: string[];
  sources: string[]; // unique, may be empty
  wordCount: number; // >= 1000, asked for, not enforced
}

export interface Critique {
  issues: string[];
  suggestions: string[];
}

export type PipelineStatus =
  | 'idle'
  | 'plan_pending'
  | 'findings_pending'
  | 'report_pending'
  | 'critique_pending'
  | 'done'
  | 'failed';

export interface StageFailure {
  stage: StageName;
  kind: 'upstream' | 'malformed';
  message: string;
}

export interface SessionState {
  readonly sessionId: string;
  readonly topic?: string;
  readonly status: PipelineStatus;
  readonly plan?: ResearchPlan;
  readonly findings?: Findings;
  readonly report?: Report;
  readonly critique?: Critique;
  readonly failure?: StageFailure;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  requests: number;
}

export interface ContractWarning {
  stage: StageName;
  message: string;
}

export interface RunResult {
  state: SessionState;
  transitions: PipelineStatus[];
  warnings: ContractWarning[];
  usage: TokenUsage;
  durationMs: number;
  /** ISO time each stage finished; kept out of the state so reruns compare equal. */
  completedAt: Partial<Record<StageName, string>>;
}
