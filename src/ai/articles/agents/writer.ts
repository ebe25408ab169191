/**
 * Writer Agent
 *
 * Writes the article body through the oracle and wraps it in front matter.
 * The draft is checked against the editorial rules; critical rule breaks get
 * one rewrite with the issues fed back. The chart spec is derived from the research chart data without an oracle
 * call, so the chart and the article always describe the same numbers.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { toFileSlug } from '../../../utils/slug';
import type { ChartSpec } from '../chart/types';
import { ORACLE_CONFIG } from '../config';
import { checkDraft, type EditorialRules } from '../gates/editorial-checks';
import { renderArticle } from '../markdown-utils';
import { getWriterSystemPrompt, getWriterUserPrompt, type ChartEmbed } from '../prompts/writer-prompts';
import { withRetry } from '../retry';
import type { ArticleDraft, OracleAgentDeps, ResearchChartData, ResearchFindings, Topic } from '../types';

export const WriterResponseSchema = z.object({
  title: z.string().min(1),
  body: z.string().min(1),
});

export const ARTICLE_LAYOUT = 'post';
export const ARTICLE_CATEGORY = 'quality-engineering';

export interface WriterInput {
  readonly topic: Topic;
  readonly findings: ResearchFindings;
  readonly chart: ChartEmbed | null;
  /** ISO date (YYYY-MM-DD) for the front matter */
  readonly date: string;
}

export interface WriterDeps extends OracleAgentDeps {
  /** Rules for the self-check; defaults to the bundled editorial rules */
  readonly editorialRules?: EditorialRules;
}

/** Critical issues fed back for the rewrite */
const MAX_REVISION_ISSUES = 5;

/**
 * Chart spec for research chart data. An empty subtitle falls back to the
 * y-axis label so the unit is always stated.
 */
export function buildChartSpec(chartData: ResearchChartData): ChartSpec {
  return {
    title: chartData.title.trim(),
    subtitle: chartData.subtitle.trim() || (chartData.yLabel?.trim() ?? ''),
    type: chartData.type,
    categories: [...chartData.categories],
    series: chartData.series.map((series) => ({ name: series.name, values: [...series.values], label: series.name })),
    sourceLine: chartData.sourceLine.trim(),
  };
}

/**
 * Writes the article draft.
 *
 * @throws FatalOracleError when the oracle cannot produce a draft
 */
export async function runWriter(input: WriterInput, deps: WriterDeps): Promise<ArticleDraft> {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');
  const { topic, findings, chart, date } = input;

  const draft = async (revisionFeedback?: readonly string[]) => {
    const { content } = await withRetry(
      () =>
        deps.oracle.generate({
          task: 'write',
          system: getWriterSystemPrompt(),
          prompt: getWriterUserPrompt({ topic, findings, chart, revisionFeedback }),
          schema: WriterResponseSchema,
          temperature: deps.temperature ?? ORACLE_CONFIG.WRITE_TEMPERATURE,
          maxOutputTokens: deps.maxOutputTokens,
        }),
      { logger: log, ...deps.retry, context: revisionFeedback ? 'Article rewrite' : 'Article draft' }
    );
    const title = content.title.trim();
    const markdown = renderArticle({ layout: ARTICLE_LAYOUT, title, date, category: ARTICLE_CATEGORY }, content.body);
    return { title, markdown, words: content.body.split(/\s+/).filter(Boolean).length };
  };

  log.info(`Writing "${topic.title}"${chart ? ' with chart' : ''}...`);
  let current = await draft();
  let check = checkDraft(current.markdown, deps.editorialRules);
  let regenerated = false;

  if (check.critical.length > 0) {
    log.warn(`Draft has ${check.critical.length} critical issue(s), rewriting once: ${check.critical.join('; ')}`);
    current = await draft(check.critical.slice(0, MAX_REVISION_ISSUES));
    check = checkDraft(current.markdown, deps.editorialRules);
    regenerated = true;
    if (check.critical.length > 0) {
      log.warn(`Rewrite still has ${check.critical.length} critical issue(s); the editorial gate decides`);
    }
  }

  log.info(`Draft complete: "${current.title}" (${current.words} words)`);
  return {
    title: current.title,
    slug: toFileSlug(current.title),
    markdown: current.markdown,
    regenerated,
    selfCheckIssues: [...check.critical, ...check.warnings],
  };
}
