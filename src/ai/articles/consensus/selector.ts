/**
 * Consensus Selector
 *
 * Fans each (voter, topic) pair out to the oracle, waits for every vote and
 * aggregates the result. Voters that could not return all their votes
 * after retries drop out; if too many drop out there is no quorum.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { isFatalOracleError, isOracleError } from '../../oracle/types';
import { runBoardVoter } from '../agents/board-voter';
import { DEFAULT_PIPELINE_CONFIG, type ConsensusSettings } from '../config';
import {
  NoQuorumError,
  type ConsensusResult,
  type OracleAgentDeps,
  type Topic,
  type Vote,
  type VoterSpec,
} from '../types';
import { aggregateVotes, validateTopics, validateVoters, type VoterWeights } from './aggregate';

// ============================================================================
// Types
// ============================================================================

export interface ConsensusSelectorDeps extends OracleAgentDeps {
  readonly settings?: ConsensusSettings;
  /** Called after each batch with the number of votes settled so far */
  readonly onVoteProgress?: (settled: number, total: number) => void;
}

interface VoteTask {
  readonly voter: VoterSpec;
  readonly topic: Topic;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Voters needed for quorum. At least one voter is always required.
 */
export function requiredQuorum(voterCount: number, minQuorumFraction: number): number {
  return Math.max(1, Math.ceil(voterCount * minQuorumFraction));
}

/**
 * Effective weights: configured overrides first, then the voter's own weight.
 */
export function resolveVoterWeights(voters: readonly VoterSpec[], overrides: VoterWeights): VoterWeights {
  const weights: Record<string, number> = {};
  for (const voter of voters) {
    weights[voter.id] = overrides[voter.id] ?? voter.weight ?? 1;
  }
  return weights;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

// ============================================================================
// Selector
// ============================================================================

export class ConsensusSelector {
  private readonly settings: ConsensusSettings;
  private readonly log: Logger;

  constructor(private readonly deps: ConsensusSelectorDeps) {
    this.settings = deps.settings ?? DEFAULT_PIPELINE_CONFIG.consensus;
    this.log = deps.logger ?? createPrefixedLogger('[Consensus]');
  }

  /**
   * Picks a topic.
   *
   * @throws EmptyTopicSetError, InvalidBoardInputError or NoQuorumError before
   *   any oracle call when the topics or voters cannot be voted on
   * @throws NoQuorumError when fewer than the configured share of voters returned every vote
   * @throws FatalOracleError for non-retryable oracle failures
   */
  async select(topics: readonly Topic[], voters: readonly VoterSpec[]): Promise<ConsensusResult> {
    validateTopics(topics);
    if (voters.length === 0) {
      throw new NoQuorumError(0, 1, 0);
    }
    validateVoters(voters, resolveVoterWeights(voters, this.settings.voterWeights));

    const tasks: VoteTask[] = voters.flatMap((voter) => topics.map((topic) => ({ voter, topic })));
    const batches = chunk(tasks, Math.max(1, this.settings.maxConcurrentVotes));

    this.log.info(`Collecting ${tasks.length} votes from ${voters.length} voters on ${topics.length} topics`);

    const votes: Vote[] = [];
    const failedVoters = new Set<string>();
    let settled = 0;

    for (const batch of batches) {
      const results = await Promise.allSettled(batch.map((task) => this.collectVote(task)));

      for (let i = 0; i < results.length; i++) {
        const result = results[i];
        const task = batch[i];
        if (result.status === 'fulfilled') {
          votes.push(result.value);
          continue;
        }

        const reason: unknown = result.reason;
        // Bad credentials and the like will fail every vote the same way
        if (isFatalOracleError(reason) && reason.reason === 'non-retryable') {
          throw reason;
        }
        if (!isOracleError(reason)) {
          throw reason;
        }
        this.log.warn(`Vote ${task.voter.id}/${task.topic.id} failed: ${reason.message}`);
        failedVoters.add(task.voter.id);
      }

      settled += batch.length;
      this.deps.onVoteProgress?.(settled, tasks.length);
    }

    const qualified = voters.filter((voter) => !failedVoters.has(voter.id));
    const required = requiredQuorum(voters.length, this.settings.minQuorumFraction);
    if (qualified.length < required) {
      throw new NoQuorumError(qualified.length, required, voters.length);
    }

    const qualifiedIds = new Set(qualified.map((voter) => voter.id));
    const result = aggregateVotes(
      topics,
      votes.filter((vote) => qualifiedIds.has(vote.voterId)),
      resolveVoterWeights(qualified, this.settings.voterWeights)
    );

    this.log.info(
      `Board selected "${result.winningTopic.title}" (${result.weightedScore.toFixed(2)}/10, ${result.unanimous ? 'unanimous' : `${result.dissentingVotes.length} dissenting`})`
    );
    return result;
  }

  private collectVote({ voter, topic }: VoteTask): Promise<Vote> {
    return runBoardVoter(voter, topic, {
      oracle: this.deps.oracle,
      retry: this.deps.retry,
      temperature: this.deps.temperature,
      maxOutputTokens: this.deps.maxOutputTokens,
      logger: this.log,
    });
  }
}
