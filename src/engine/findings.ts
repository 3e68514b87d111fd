import { RESEARCH_AGENT } from '../prompts/system';
import type { Findings, ResearchPlan } from '../types';
import { runAgent, type GeneratorContext, type StageOutput } from './agent';
import { findingsTask } from './buildMessages';

export async function generateFindings(ctx: GeneratorContext, plan: ResearchPlan): Promise<StageOutput<Findings>> {
  const { text, usage } = await runAgent(ctx, RESEARCH_AGENT, findingsTask(plan));
  return { value: { summary: text.trim(), source: `${RESEARCH_AGENT.name} (${ctx.model})` }, usage };
}
