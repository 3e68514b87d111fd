import type { AgentDefinition } from '../prompts/system';
import type { ChatMessage } from '../openai/client';
import type { Findings, Report, ResearchPlan } from '../types';

export function buildMessages(agent: AgentDefinition, task: string): ChatMessage[] {
  return [
    { role: 'system', content: agent.instructions },
    { role: 'user', content: `User query / task:\n${task}` }
  ];
}

export function planTask(topic: string): string {
  return `Topic: ${topic}\nReturn JSON only.`;
}

export function findingsTask(plan: ResearchPlan): string {
  return [
    `Topic: ${plan.topic}`,
    `Search Queries: ${JSON.stringify(plan.queries)}`,
    `Focus Areas: ${JSON.stringify(plan.focusAreas)}`,
    'Provide concise findings.'
  ].join('\n');
}

export function reportTask(plan: ResearchPlan, findings: Findings): string {
  return [
    `Topic: ${plan.topic}`,
    '',
    `Focus Areas: ${JSON.stringify(plan.focusAreas)}`,
    '',
    `Research Notes:\n${findings.summary}`,
    '',
    'Write the full report now.'
  ].join('\n');
}

export function critiqueTask(report: Report): string {
  return `Report to review:\n\n${report.markdown}`;
}
