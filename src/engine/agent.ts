import { UpstreamError } from '../errors';
import { toUpstreamError, type CompletionResult, type ModelClient } from '../openai/client';
import type { AgentDefinition } from '../prompts/system';
import type { TokenUsage } from '../types';
import { buildMessages } from './buildMessages';

export interface GeneratorContext {
  client: ModelClient;
  model: string;
}

export interface StageOutput<T> {
  value: T;
  usage?: TokenUsage;
}

/** Issue one request for an agent. Every rejection becomes an UpstreamError tagged with the stage. */
export async function runAgent(ctx: GeneratorContext, agent: AgentDefinition, task: string): Promise<CompletionResult> {
  let result: CompletionResult;
  try {
    result = await ctx.client.complete({
      stage: agent.stage,
      model: ctx.model,
      messages: buildMessages(agent, task),
      json: agent.json,
      temperature: agent.temperature
    });
  } catch (error) {
    const upstream = toUpstreamError(error);
    upstream.stage = agent.stage;
    throw upstream;
  }

  if (!result.text.trim()) {
    const empty = new UpstreamError('empty_response', `${agent.name} returned no content`);
    empty.stage = agent.stage;
    throw empty;
  }
  return result;
}
