/**
 * Editor Prompts
 *
 * The editor fixes the draft and then judges five areas. Its verdicts feed
 * the editorial gate, so they must describe the edited text, not the draft.
 */

import type { ResearchFindings } from '../types';

export interface EditorPromptContext {
  readonly title: string;
  readonly body: string;
  readonly findings: ResearchFindings;
  /** File name the article must embed, null when there is no chart */
  readonly chartFileName: string | null;
}

export function getEditorSystemPrompt(): string {
  return `You are the chief editor of a weekly analysis column. You receive a draft and return the edited article plus your verdict on five areas.

EDIT FIRST:
- Remove every [NEEDS SOURCE] and [UNVERIFIED] flag: source the claim from the research or delete it.
- Cut throat-clearing openings and summary closings. The ending must state an implication.
- Replace clichés ("game-changer", "paradigm shift", "revolutionary") with what actually changed.
- Remove exclamation marks.
- Keep the chart embed line exactly as written if there is one.

THEN JUDGE THE EDITED TEXT, one verdict per area ("pass", "fail" or "n/a"):
- "opening": does the first paragraph lead with a striking, sourced fact?
- "evidence": is every statistic attributed, with no unverified claims used?
- "voice": is it confident, direct, British-spelt, free of banned phrases?
- "structure": do the sections advance one argument and end on an implication?
- "chart": is the chart embedded and referred to in the text? Use "n/a" when there is no chart.

Fail an area only when you could not fix it.`;
}

export function getEditorUserPrompt(context: EditorPromptContext): string {
  const sources = context.findings.dataPoints
    .map((point) => `- ${point.stat} (${point.source}${point.year !== null ? `, ${point.year}` : ''})`)
    .join('\n');

  return `TITLE: ${context.title}

CHART FILE: ${context.chartFileName ?? 'none'}

RESEARCH (for fact-checking):
${sources || '- none'}
Unverified, must not appear: ${context.findings.unverifiedClaims.join('; ') || 'none'}

DRAFT:
${context.body}

Return JSON with:
- "editedBody": the full edited article body in markdown
- "verdicts": { "opening", "evidence", "voice", "structure", "chart" }, each { "verdict": "pass" | "fail" | "n/a", "rationale": one sentence }
- "fixesApplied": array of short descriptions of what you changed`;
}
