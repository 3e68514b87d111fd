import { MalformedResponseError } from '../errors';
import { CRITIC_AGENT } from '../prompts/system';
import { CritiqueSchema } from '../schemas/research';
import type { Critique, Report } from '../types';
import { runAgent, type GeneratorContext, type StageOutput } from './agent';
import { critiqueTask } from './buildMessages';
import { validateReply } from './sanitize';

export function parseCritique(text: string): Critique {
  return validateReply(CritiqueSchema, text, 'Critique');
}

export async function generateCritique(ctx: GeneratorContext, report: Report): Promise<StageOutput<Critique>> {
  const { text, usage } = await runAgent(ctx, CRITIC_AGENT, critiqueTask(report));
  try {
    return { value: parseCritique(text), usage };
  } catch (error) {
    if (error instanceof MalformedResponseError) error.stage = 'critique';
    throw error;
  }
}
