/**
 * Board Voter Agent
 *
 * Asks one board member to score one topic. The response schema only
 * accepts integer scores in range, so anything else surfaces as a malformed
 * oracle response and goes through the retry policy.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { CONSENSUS_CONFIG, ORACLE_CONFIG } from '../config';
import { getVoterSystemPrompt, getVoterUserPrompt } from '../prompts/voter-prompts';
import { withRetry } from '../retry';
import type { OracleAgentDeps, Topic, Vote, VoterSpec } from '../types';

export const VoteResponseSchema = z.object({
  score: z.number().int().min(CONSENSUS_CONFIG.MIN_SCORE).max(CONSENSUS_CONFIG.MAX_SCORE),
  rationale: z.string().min(1),
});

export type VoteResponse = z.infer<typeof VoteResponseSchema>;

export type BoardVoterDeps = OracleAgentDeps;

/**
 * Collects one vote.
 *
 * @throws FatalOracleError when the oracle cannot produce a valid score
 */
export async function runBoardVoter(voter: VoterSpec, topic: Topic, deps: BoardVoterDeps): Promise<Vote> {
  const log = deps.logger ?? createPrefixedLogger('[BoardVoter]');

  const { content } = await withRetry(
    () =>
      deps.oracle.generate({
        task: 'vote',
        system: getVoterSystemPrompt(voter),
        prompt: getVoterUserPrompt(topic),
        schema: VoteResponseSchema,
        temperature: deps.temperature ?? ORACLE_CONFIG.VOTE_TEMPERATURE,
        maxOutputTokens: deps.maxOutputTokens,
      }),
    { logger: log, ...deps.retry, context: `Vote ${voter.id}/${topic.id}` }
  );

  log.debug(`${voter.name} scored "${topic.title}" ${content.score}/10`);
  return { voterId: voter.id, topicId: topic.id, score: content.score, rationale: content.rationale };
}
