import { EDITOR_AGENT } from '../prompts/system';
import type { Findings, Report, ResearchPlan } from '../types';
import { countWords, titleCase } from '../util/text';
import { runAgent, type GeneratorContext, type StageOutput } from './agent';
import { reportTask } from './buildMessages';

const HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const FENCE = /^\s*(```|~~~)/;
const LIST_ITEM = /^\s*(?:[-*+]|\d+[.)])\s+(.+?)\s*$/;
const SOURCES_HEADING = /^(sources|references|bibliography)\b/i;
const NOT_A_SECTION = /^(outline|table of contents|contents)$/i;

function cleanHeading(text: string): string {
  return text.replace(/^[*_]+|[*_]+$/g, '').trim();
}

/**
 * Read the title, section outline and sources out of the editor's markdown.
 * Nothing here is validated; absent parts come back empty.
 */
export function parseReport(markdown: string, fallbackTitle: string): Report {
  let title: string | undefined;
  const outline: string[] = [];
  const sources = new Set<string>();

  let inFence = false;
  let sourcesLevel: number | null = null;

  for (const line of markdown.split(/\r?\n/)) {
    if (FENCE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const heading = line.match(HEADING);
    if (heading) {
      const level = heading[1].length;
      const text = cleanHeading(heading[2]);
      if (sourcesLevel !== null && level <= sourcesLevel) sourcesLevel = null;

      if (level === 1 && title === undefined) {
        title = text;
      } else if (level === 2 && !NOT_A_SECTION.test(text)) {
        outline.push(text);
      }
      if (SOURCES_HEADING.test(text)) sourcesLevel = level;
      continue;
    }

    if (sourcesLevel !== null) {
      const item = line.match(LIST_ITEM);
      if (item) sources.add(item[1]);
    }
  }

  return {
    title: title ?? titleCase(fallbackTitle),
    markdown,
    outline,
    sources: [...sources],
    wordCount: countWords(markdown)
  };
}

export async function generateReport(
  ctx: GeneratorContext,
  plan: ResearchPlan,
  findings: Findings
): Promise<StageOutput<Report>> {
  const { text, usage } = await runAgent(ctx, EDITOR_AGENT, reportTask(plan, findings));
  return { value: parseReport(text.trim(), plan.topic), usage };
}
