import { MalformedResponseError } from '../errors';
import type { ContractWarning, Findings, Report } from '../types';
import { countWords } from '../util/text';

export const FINDINGS_MAX_WORDS = 300;
export const REPORT_MIN_WORDS = 1000;

export function checkFindings(findings: Pick<Findings, 'summary'>): ContractWarning[] {
  const words = countWords(findings.summary);
  return words < FINDINGS_MAX_WORDS
    ? []
    : [{ stage: 'findings', message: `Findings run to ${words} words (expected fewer than ${FINDINGS_MAX_WORDS})` }];
}

export function checkReport(report: Report): ContractWarning[] {
  const warnings: ContractWarning[] = [];
  if (report.wordCount < REPORT_MIN_WORDS) {
    warnings.push({ stage: 'report', message: `Report has ${report.wordCount} words (expected at least ${REPORT_MIN_WORDS})` });
  }
  if (report.outline.length === 0) {
    warnings.push({ stage: 'report', message: 'Report has no section headings' });
  }
  if (report.sources.length === 0) {
    warnings.push({ stage: 'report', message: 'Report lists no sources' });
  }
  return warnings;
}

/** In strict mode any breach fails the stage. */
export function enforce(warnings: ContractWarning[], strict: boolean): void {
  if (!strict || warnings.length === 0) return;
  const [first] = warnings;
  const error = new MalformedResponseError(
    'RESPONSE_CONTRACT_VIOLATED',
    warnings.map(w => w.message).join('; '),
    warnings.map(w => w.message)
  );
  error.stage = first.stage;
  throw error;
}
