import { STAGES, type Critique, type Findings, type Report, type ResearchPlan, type RunResult, type SessionState, type StageName } from '../types';
import { saveJSON, saveText } from '../util/fileCache';
import { titleCase } from '../util/text';

const UNSAFE_FILE_CHARS = /[\\/:*?"<>|]/g;

const SUFFIXES: Record<StageName, string> = {
  plan: '_Plan',
  findings: '_Findings',
  report: '',
  critique: '_Critique'
};

/** "renewable energy policy" + "_Critique" -> "Renewable_Energy_Policy_Critique.md" */
export function exportFileName(topic: string, suffix = ''): string {
  const base = titleCase(topic).replace(UNSAFE_FILE_CHARS, '').replace(/ /g, '_') || 'Report';
  return `${base}${suffix}.md`;
}

function bullets(items: readonly string[]): string {
  return items.length ? items.map(item => `- ${item}`).join('\n') : '_None._';
}

export function renderPlanMarkdown(plan: ResearchPlan): string {
  return [
    `# Research Plan: ${plan.topic}`,
    '',
    '## Search Queries',
    '',
    plan.queries.map((q, i) => `${i + 1}. ${q}`).join('\n'),
    '',
    '## Focus Areas',
    '',
    bullets(plan.focusAreas),
    ''
  ].join('\n');
}

export function renderFindingsMarkdown(topic: string, findings: Findings, collectedAt?: string): string {
  const meta = collectedAt ? `**Source:** ${findings.source} | **Collected:** ${collectedAt}` : `**Source:** ${findings.source}`;
  return `# Findings: ${topic}\n\n${meta}\n\n${findings.summary}\n`;
}

export function renderReportMarkdown(report: Report): string {
  return report.markdown.endsWith('\n') ? report.markdown : `${report.markdown}\n`;
}

export function renderCritiqueMarkdown(topic: string, critique: Critique): string {
  return [
    `# Critique: ${topic}`,
    '',
    '## Issues',
    '',
    bullets(critique.issues),
    '',
    '## Suggestions',
    '',
    bullets(critique.suggestions),
    ''
  ].join('\n');
}

export interface ExportedFile {
  stage: StageName;
  path: string;
}

/** Markdown for every stage result the session holds, keyed by stage. */
export function renderSession(state: SessionState, completedAt: RunResult['completedAt'] = {}): Partial<Record<StageName, string>> {
  const topic = state.topic ?? state.plan?.topic ?? 'Report';
  const rendered: Partial<Record<StageName, string>> = {};
  if (state.plan) rendered.plan = renderPlanMarkdown(state.plan);
  if (state.findings) rendered.findings = renderFindingsMarkdown(topic, state.findings, completedAt.findings);
  if (state.report) rendered.report = renderReportMarkdown(state.report);
  if (state.critique) rendered.critique = renderCritiqueMarkdown(topic, state.critique);
  return rendered;
}

/**
 * Write each available stage result to `dir`, plus a JSON dump of the plan
 * for reuse by other tools.
 */
export function exportSession(
  state: SessionState,
  dir: string,
  completedAt: RunResult['completedAt'] = {}
): ExportedFile[] {
  const topic = state.topic ?? state.plan?.topic ?? 'Report';
  const rendered = renderSession(state, completedAt);
  const files: ExportedFile[] = [];

  for (const stage of STAGES) {
    const markdown = rendered[stage];
    if (markdown === undefined) continue;
    files.push({ stage, path: saveText(dir, exportFileName(topic, SUFFIXES[stage]), markdown) });
  }
  if (state.plan) {
    saveJSON(dir, exportFileName(topic, '_Plan').replace(/\.md$/, ''), state.plan);
  }
  return files;
}
