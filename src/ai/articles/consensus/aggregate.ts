/**
 * Vote Aggregation
 *
 * Pure weighted-mean aggregation of board votes. The result depends only on
 * the set of votes, never on the order they arrived in.
 */

import { CONSENSUS_CONFIG, ConfigValidationError } from '../config';
import {
  EmptyTopicSetError,
  InvalidBoardInputError,
  InvalidVoteError,
  VoteOutOfRangeError,
  type ConsensusResult,
  type Topic,
  type TopicRanking,
  type Vote,
  type VoterSpec,
} from '../types';

export type VoterWeights = Readonly<Record<string, number>>;

export function isValidScore(score: number): boolean {
  return Number.isInteger(score) && score >= CONSENSUS_CONFIG.MIN_SCORE && score <= CONSENSUS_CONFIG.MAX_SCORE;
}

function compareVotes(a: Vote, b: Vote): number {
  if (a.voterId !== b.voterId) return a.voterId < b.voterId ? -1 : 1;
  if (a.topicId !== b.topicId) return a.topicId < b.topicId ? -1 : 1;
  return 0;
}

function weightOf(weights: VoterWeights, voterId: string): number {
  const weight = weights[voterId] ?? 1;
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new ConfigValidationError(`Weight for voter ${voterId} must be a positive number (got ${weight})`);
  }
  return weight;
}

/**
 * Rejects an empty topic set, repeated topic ids and relevance scores that
 * are not finite.
 */
export function validateTopics(topics: readonly Topic[]): void {
  if (topics.length === 0) {
    throw new EmptyTopicSetError();
  }
  const seen = new Set<string>();
  for (const topic of topics) {
    if (seen.has(topic.id)) {
      throw new InvalidBoardInputError(`Duplicate topic id: ${topic.id}`);
    }
    seen.add(topic.id);
    if (!Number.isFinite(topic.relevanceScore)) {
      throw new InvalidBoardInputError(`Topic ${topic.id} has a non-finite relevance score`);
    }
  }
}

/**
 * Rejects repeated voter ids and weights that are not positive.
 */
export function validateVoters(voters: readonly VoterSpec[], weights: VoterWeights): void {
  const seen = new Set<string>();
  for (const voter of voters) {
    if (seen.has(voter.id)) {
      throw new InvalidBoardInputError(`Duplicate voter id: ${voter.id}`);
    }
    seen.add(voter.id);
    weightOf(weights, voter.id);
  }
}

/**
 * Rejects out-of-range scores, votes for unknown topics and repeated
 * (voter, topic) pairs. Returns the votes in canonical order.
 */
export function validateVotes(topics: readonly Topic[], votes: readonly Vote[]): Vote[] {
  const topicIds = new Set(topics.map((topic) => topic.id));
  const seen = new Set<string>();

  for (const vote of votes) {
    if (!isValidScore(vote.score)) {
      throw new VoteOutOfRangeError(vote);
    }
    if (!topicIds.has(vote.topicId)) {
      throw new InvalidVoteError(vote, 'unknown-topic');
    }
    const key = `${vote.voterId}\u0000${vote.topicId}`;
    if (seen.has(key)) {
      throw new InvalidVoteError(vote, 'duplicate');
    }
    seen.add(key);
  }

  return [...votes].sort(compareVotes);
}

/**
 * Orders topics by weighted score, then by relevance, then by input order.
 */
export function rankTopics(topics: readonly Topic[], scores: ReadonlyMap<string, number>): TopicRanking[] {
  const indexed = topics.map((topic, index) => ({ topic, index, score: scores.get(topic.id) ?? 0 }));

  indexed.sort((a, b) => {
    if (Math.abs(a.score - b.score) > CONSENSUS_CONFIG.TIE_EPSILON) return b.score - a.score;
    if (a.topic.relevanceScore !== b.topic.relevanceScore) return b.topic.relevanceScore - a.topic.relevanceScore;
    return a.index - b.index;
  });

  return indexed.map((entry, position) => ({
    rank: position + 1,
    topic: entry.topic,
    weightedScore: entry.score,
  }));
}

/**
 * Aggregates votes into a consensus.
 *
 * A topic's score is the weighted mean of the votes cast for it; voters
 * without a configured weight count as 1. Topics nobody voted for score 0.
 *
 * @example
 * const result = aggregateVotes(topics, votes, { economist_editor: 1.3 });
 * result.winningTopic.title;
 */
export function aggregateVotes(
  topics: readonly Topic[],
  votes: readonly Vote[],
  weights: VoterWeights = {}
): ConsensusResult {
  validateTopics(topics);
  const ordered = validateVotes(topics, votes);

  const totals = new Map<string, { weighted: number; weight: number }>();
  for (const vote of ordered) {
    const weight = weightOf(weights, vote.voterId);
    const total = totals.get(vote.topicId) ?? { weighted: 0, weight: 0 };
    total.weighted += vote.score * weight;
    total.weight += weight;
    totals.set(vote.topicId, total);
  }

  const scores = new Map<string, number>();
  for (const [topicId, total] of totals) {
    scores.set(topicId, total.weighted / total.weight);
  }

  const rankings = rankTopics(topics, scores);
  const winner = rankings[0];
  const rankOf = new Map(rankings.map((ranking) => [ranking.topic.id, ranking.rank]));

  const winnerVotes = ordered.filter((vote) => vote.topicId === winner.topic.id);
  const perVoterScores: Record<string, number> = {};
  for (const vote of winnerVotes) {
    perVoterScores[vote.voterId] = vote.score;
  }

  // Each voter's own favourite; equal scores resolve by overall rank
  const favourites = new Map<string, Vote>();
  for (const vote of ordered) {
    const current = favourites.get(vote.voterId);
    if (
      !current ||
      vote.score > current.score ||
      (vote.score === current.score && (rankOf.get(vote.topicId) ?? 0) < (rankOf.get(current.topicId) ?? 0))
    ) {
      favourites.set(vote.voterId, vote);
    }
  }

  const unanimous =
    favourites.size > 0 && [...favourites.values()].every((vote) => vote.topicId === winner.topic.id);

  return {
    winningTopic: winner.topic,
    weightedScore: winner.weightedScore,
    perVoterScores,
    rankings,
    unanimous,
    dissentingVotes: winnerVotes.filter((vote) => vote.score < CONSENSUS_CONFIG.DISSENT_THRESHOLD),
    voterCount: favourites.size,
    votes: ordered,
  };
}
