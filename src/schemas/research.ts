import { z } from 'zod';

const Entry = z.string().trim().min(1);

/** Plan as the triage agent is asked to return it. */
export const ResearchPlanWireSchema = z.object({
  topic: z.string().trim().min(1),
  search_queries: z.array(Entry).min(3).max(5),
  focus_areas: z.array(Entry).min(3).max(5)
});

export const ResearchPlanSchema = ResearchPlanWireSchema.transform(wire => ({
  topic: wire.topic,
  queries: wire.search_queries,
  focusAreas: wire.focus_areas
}));

export const CritiqueSchema = z.object({
  issues: z.array(Entry),
  suggestions: z.array(Entry)
});
