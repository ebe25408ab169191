/**
 * Researcher Agent
 *
 * Produces the research findings for the selected topic. Chart data that
 * does not line up with its categories is dropped rather than passed on,
 * and the article is written without a chart.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { ORACLE_CONFIG } from '../config';
import { getResearcherSystemPrompt, getResearcherUserPrompt } from '../prompts/researcher-prompts';
import { withRetry } from '../retry';
import type { OracleAgentDeps, ResearchChartData, ResearchFindings, Topic } from '../types';

const DataPointSchema = z.object({
  stat: z.string().min(1),
  source: z.string().min(1),
  year: z.number().int().nullable(),
  url: z.string().nullable(),
  verified: z.boolean(),
});

const ChartDataSchema = z.object({
  title: z.string().min(1),
  subtitle: z.string(),
  type: z.enum(['line', 'bar', 'scatter']),
  yLabel: z.string().nullable(),
  categories: z.array(z.string().min(1)).min(1),
  series: z
    .array(
      z.object({
        name: z.string().min(1),
        values: z.array(z.number().finite()),
      })
    )
    .min(1),
  sourceLine: z.string(),
});

export const ResearchResponseSchema = z.object({
  headlineStat: z.string().min(1),
  dataPoints: z.array(DataPointSchema),
  trendNarrative: z.string(),
  contrarianAngle: z.string(),
  unverifiedClaims: z.array(z.string()),
  chartData: ChartDataSchema.nullable(),
});

export type ResearcherDeps = OracleAgentDeps;

/**
 * Reason the chart data cannot be plotted, or null when it can.
 */
export function describeChartDataProblem(chartData: ResearchChartData): string | null {
  const ragged = chartData.series.find((series) => series.values.length !== chartData.categories.length);
  if (ragged) {
    return `series "${ragged.name}" has ${ragged.values.length} values for ${chartData.categories.length} categories`;
  }
  return null;
}

/**
 * Researches a topic.
 *
 * @throws FatalOracleError when the oracle cannot produce findings
 */
export async function runResearcher(topic: Topic, deps: ResearcherDeps): Promise<ResearchFindings> {
  const log = deps.logger ?? createPrefixedLogger('[Researcher]');

  log.info(`Researching "${topic.title}"...`);

  const { content } = await withRetry(
    () =>
      deps.oracle.generate({
        task: 'research',
        system: getResearcherSystemPrompt(),
        prompt: getResearcherUserPrompt(topic),
        schema: ResearchResponseSchema,
        temperature: deps.temperature ?? ORACLE_CONFIG.RESEARCH_TEMPERATURE,
        maxOutputTokens: deps.maxOutputTokens,
      }),
    { logger: log, ...deps.retry, context: 'Research findings' }
  );

  let chartData: ResearchChartData | null = content.chartData;
  if (chartData) {
    const problem = describeChartDataProblem(chartData);
    if (problem) {
      log.warn(`Dropping chart data: ${problem}`);
      chartData = null;
    }
  }

  const verified = content.dataPoints.filter((point) => point.verified).length;
  log.info(
    `Research complete: ${verified}/${content.dataPoints.length} verified data points, ${chartData ? 'chart proposed' : 'no chart'}`
  );

  return { ...content, chartData };
}
