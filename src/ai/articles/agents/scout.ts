/**
 * Topic Scout Agent
 *
 * Proposes candidate topics for the editorial board. Ids are assigned here,
 * in the order the oracle returned the topics, so input order for the
 * consensus tie-break is stable.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { DISCOVERY_CONFIG, ORACLE_CONFIG } from '../config';
import { getTopicScoutSystemPrompt, getTopicScoutUserPrompt } from '../prompts/scout-prompts';
import { withRetry } from '../retry';
import type { OracleAgentDeps, Topic } from '../types';

export const ScoutResponseSchema = z.object({
  topics: z
    .array(
      z.object({
        title: z.string().min(1),
        description: z.string().min(1),
        relevanceScore: z.number().min(0).max(10),
      })
    )
    .min(1),
});

export interface TopicScoutDeps extends OracleAgentDeps {
  readonly topicCount?: number;
  /** ISO date; defaults to today */
  readonly currentDate?: string;
}

/**
 * Discovers candidate topics for a brief.
 *
 * @throws FatalOracleError when the oracle cannot produce a topic list
 */
export async function runTopicScout(brief: string, deps: TopicScoutDeps): Promise<Topic[]> {
  const log = deps.logger ?? createPrefixedLogger('[Scout]');
  const topicCount = deps.topicCount ?? DISCOVERY_CONFIG.TOPIC_COUNT;

  log.info(`Discovering ${topicCount} topics...`);

  const { content } = await withRetry(
    () =>
      deps.oracle.generate({
        task: 'discover',
        system: getTopicScoutSystemPrompt(),
        prompt: getTopicScoutUserPrompt({
          brief,
          topicCount,
          currentDate: deps.currentDate ?? new Date().toISOString().slice(0, 10),
        }),
        schema: ScoutResponseSchema,
        temperature: deps.temperature ?? ORACLE_CONFIG.DISCOVER_TEMPERATURE,
        maxOutputTokens: deps.maxOutputTokens,
      }),
    { logger: log, ...deps.retry, context: 'Topic discovery' }
  );

  const topics = content.topics.slice(0, topicCount).map((topic, index) => ({
    id: `topic-${index + 1}`,
    title: topic.title.trim(),
    description: topic.description.trim(),
    relevanceScore: topic.relevanceScore,
  }));

  log.info(`Found ${topics.length} topics`);
  return topics;
}
