/**
 * Writer Prompts
 *
 * House voice for the article body. The writer never produces front matter;
 * the writer agent adds it.
 */

import type { ResearchFindings, Topic } from '../types';

export interface ChartEmbed {
  readonly alt: string;
  /** Path the article embeds, e.g. /assets/charts/<slug>.png */
  readonly path: string;
}

export interface WriterPromptContext {
  readonly topic: Topic;
  readonly findings: ResearchFindings;
  readonly chart: ChartEmbed | null;
  /** Rule breaks in the previous draft, present when it is being rewritten */
  readonly revisionFeedback?: readonly string[];
}

export function getWriterSystemPrompt(): string {
  return `You are a senior writer on a weekly analysis column about software quality and engineering practice.

STRUCTURE (800-1200 words):
1. Open with the most striking fact from the research. No throat-clearing.
2. Three or four sections with "## " headings. Headings are noun phrases, not questions.
3. Close with a clear implication or prediction. Never summarise what you already said.

VOICE:
- Confident and direct. State a view.
- British spelling: organisation, favour, analyse, sceptical.
- Active voice, concrete nouns, strong verbs.
- No exclamation marks. No direct address to the reader.

EVIDENCE:
- Attribute every statistic in the same sentence ("according to...", "a 2024 survey by...").
- Use only verified data points. Never use the unverified claims.

LINES TO AVOID:
- Openings: "In today's...", "It's no secret...", "When it comes to...", "Amidst...", "In recent years..."
- Phrases: "game-changer", "paradigm shift", "revolutionary", "at the end of the day", "some might say"
- Closings: "In conclusion", "In summary", "remains to be seen", "only time will tell", "the road ahead"`;
}

function formatDataPoints(findings: ResearchFindings): string {
  return findings.dataPoints
    .filter((point) => point.verified)
    .map((point) => `- ${point.stat} (${point.source}${point.year !== null ? `, ${point.year}` : ''})`)
    .join('\n');
}

export function getWriterUserPrompt(context: WriterPromptContext): string {
  const { topic, findings, chart, revisionFeedback } = context;

  const revisionSection = revisionFeedback?.length
    ? `REVISION REQUIRED: your previous draft broke these rules. Fix every one:\n${revisionFeedback.map((issue, i) => `${i + 1}. ${issue}`).join('\n')}\n\n`
    : '';

  const chartInstruction = chart
    ? `CHART (mandatory): embed exactly this line after the paragraph that discusses the data, then refer to the chart in the next sentence:
![${chart.alt}](${chart.path})`
    : 'There is no chart for this article. Do not embed images.';

  return `TOPIC: ${topic.title}
${topic.description}

HEADLINE STAT: ${findings.headlineStat}

VERIFIED DATA POINTS:
${formatDataPoints(findings) || '- none'}

TREND: ${findings.trendNarrative}

CONTRARIAN ANGLE: ${findings.contrarianAngle}

DO NOT USE (unverified): ${findings.unverifiedClaims.join('; ') || 'none'}

${chartInstruction}

${revisionSection}Return JSON with:
- "title": a short title, two to five words, wordplay welcome
- "body": the article in markdown, without front matter and without the title as a heading`;
}
