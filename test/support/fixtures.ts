export const TOPIC = 'renewable energy policy';

export const PLAN_JSON = JSON.stringify({
  topic: TOPIC,
  search_queries: [
    'renewable energy subsidies',
    'feed-in tariff outcomes',
    'carbon pricing and renewables'
  ],
  focus_areas: ['Policy instruments', 'Cost trends', 'Grid integration']
});

// 10 words
const SENTENCE = 'Clean power auctions lowered prices while grid upgrades lagged behind.';

function paragraph(sentences: number): string {
  return Array.from({ length: sentences }, () => SENTENCE).join(' ');
}

export const FINDINGS_TEXT = [
  'Auctions and feed-in tariffs drove most new wind and solar capacity.',
  '',
  '- Costs fell sharply over the last decade.',
  '- Grid integration is now the main constraint.'
].join('\n');

export const REPORT_MARKDOWN = [
  '# Renewable Energy Policy',
  '',
  '## Outline',
  '1. Policy Instruments',
  '2. Cost Trends',
  '3. Grid Integration',
  '',
  '## Policy Instruments',
  paragraph(40),
  '',
  '## Cost Trends',
  paragraph(40),
  '',
  '## Grid Integration',
  paragraph(40),
  '',
  '## Sources',
  '- Example Energy Agency annual outlook',
  '- Example Institute policy brief'
].join('\n');

export const CRITIQUE_JSON = JSON.stringify({
  issues: ['Grid integration section lacks regional data'],
  suggestions: ['Add storage cost comparisons']
});

export const HAPPY_SCRIPT = {
  plan: PLAN_JSON,
  findings: FINDINGS_TEXT,
  report: REPORT_MARKDOWN,
  critique: CRITIQUE_JSON
};
