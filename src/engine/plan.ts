import { InputError, MalformedResponseError } from '../errors';
import { TRIAGE_AGENT } from '../prompts/system';
import { ResearchPlanSchema } from '../schemas/research';
import type { ResearchPlan } from '../types';
import { runAgent, type GeneratorContext, type StageOutput } from './agent';
import { planTask } from './buildMessages';
import { validateReply } from './sanitize';

export function parsePlan(text: string): ResearchPlan {
  return validateReply(ResearchPlanSchema, text, 'Research plan');
}

export async function generatePlan(ctx: GeneratorContext, topic: string): Promise<StageOutput<ResearchPlan>> {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new InputError('Topic must be a non-empty string');
  }

  const { text, usage } = await runAgent(ctx, TRIAGE_AGENT, planTask(trimmed));
  try {
    return { value: parsePlan(text), usage };
  } catch (error) {
    if (error instanceof MalformedResponseError) error.stage = 'plan';
    throw error;
  }
}
