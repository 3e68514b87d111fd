import type { StageName } from '../types';

export interface AgentDefinition {
  name: string;
  stage: StageName;
  instructions: string;
  /** Ask the endpoint for a JSON object reply. */
  json: boolean;
  temperature?: number;
}

export const TRIAGE_AGENT: AgentDefinition = {
  name: 'Triage Agent',
  stage: 'plan',
  json: true,
  temperature: 0.2,
  instructions: `You are the coordinator. Given a topic, produce a research plan as pure JSON only.
Keys: topic (string), search_queries (3-5 items), focus_areas (3-5 items).
Every query and focus area must be a non-empty string.
Do not add commentary outside JSON.`
};

export const RESEARCH_AGENT: AgentDefinition = {
  name: 'Research Agent',
  stage: 'findings',
  json: false,
  instructions: `You are a research assistant. Summarize findings in 2-3 short paragraphs, under 300 words.
Focus on crisp facts, key points, and useful takeaways. No fluff. Include bulleted lists if helpful.`
};

export const EDITOR_AGENT: AgentDefinition = {
  name: 'Editor Agent',
  stage: 'report',
  json: false,
  instructions: `You are a senior researcher. Using the plan and notes, write a comprehensive markdown report
(>= 1000 words, target ~5-10 pages). Include:
- A clear title as a level-1 heading
- An outline of sections
- Well-structured level-2 headings for each section
- Evidence-backed points that mention their sources inline
- A 'Sources' section at the end, one source per bullet`
};

export const CRITIC_AGENT: AgentDefinition = {
  name: 'Critic Agent',
  stage: 'critique',
  json: true,
  temperature: 0.2,
  instructions: `You are a critical reviewer. Review the provided report for clarity, structure, depth,
coverage, and factual balance. Return pure JSON only with two keys:
issues (array of strings, each one concrete problem; may be empty) and
suggestions (array of strings, each one actionable fix).
Keep the whole review under 400 words. Do not add commentary outside JSON.`
};
