import { describe, it, expect, vi } from 'vitest';

import {
  aggregateVotes,
  ConsensusSelector,
  formatConsensusReport,
  loadEditorialBoard,
  parseEditorialBoard,
  requiredQuorum,
  resolveVoterWeights,
} from '../../../src/ai/articles/consensus';
import { createPipelineConfig } from '../../../src/ai/articles/config';
import {
  EmptyTopicSetError,
  InvalidBoardInputError,
  InvalidVoteError,
  NoQuorumError,
  VoteOutOfRangeError,
  type Topic,
  type Vote,
} from '../../../src/ai/articles/types';
import { FatalOracleError, TransientOracleError } from '../../../src/ai/oracle/types';
import { silentLogger } from '../../../src/utils/logger';
import { DEFAULT_SCORES, TOPICS, VOTERS, votesFrom } from '../helpers/fixtures';
import { failWith, ScriptedOracle, type TaskScript } from '../helpers/scripted-oracle';

const noWait = (_ms: number): Promise<void> => Promise.resolve();

function vote(voterId: string, topicId: string, score: number): Vote {
  return { voterId, topicId, score, rationale: `${voterId} on ${topicId}` };
}

const WEIGHTS = { pragmatist: 1, skeptic: 2 };

const DEFAULT_VOTES: Vote[] = [
  vote('pragmatist', 'topic-a', 8),
  vote('pragmatist', 'topic-b', 6),
  vote('skeptic', 'topic-a', 7),
  vote('skeptic', 'topic-b', 5),
];

describe('aggregateVotes', () => {
  it('picks the topic with the highest weighted mean', () => {
    const result = aggregateVotes(TOPICS, DEFAULT_VOTES, WEIGHTS);

    expect(result.winningTopic.id).toBe('topic-a');
    expect(result.weightedScore).toBeCloseTo(22 / 3);
    expect(result.rankings.map((ranking) => [ranking.rank, ranking.topic.id])).toEqual([
      [1, 'topic-a'],
      [2, 'topic-b'],
    ]);
    expect(result.rankings[1].weightedScore).toBeCloseTo(16 / 3);
    expect(result.perVoterScores).toEqual({ pragmatist: 8, skeptic: 7 });
    expect(result.unanimous).toBe(true);
    expect(result.dissentingVotes).toEqual([]);
    expect(result.voterCount).toBe(2);
  });

  it('does not depend on the order votes arrive in', () => {
    const forwards = aggregateVotes(TOPICS, DEFAULT_VOTES, WEIGHTS);
    const backwards = aggregateVotes(TOPICS, [...DEFAULT_VOTES].reverse(), WEIGHTS);

    expect(backwards).toEqual(forwards);
  });

  it('breaks a score tie by relevance', () => {
    const votes = [vote('pragmatist', 'topic-a', 7), vote('pragmatist', 'topic-b', 7)];

    expect(aggregateVotes(TOPICS, votes).winningTopic.id).toBe('topic-b');
  });

  it('breaks a full tie by input order', () => {
    const topics: Topic[] = TOPICS.map((topic) => ({ ...topic, relevanceScore: 5 }));
    const votes = [vote('pragmatist', 'topic-a', 7), vote('pragmatist', 'topic-b', 7)];

    expect(aggregateVotes(topics, votes).winningTopic.id).toBe('topic-a');
    expect(aggregateVotes([...topics].reverse(), votes).winningTopic.id).toBe('topic-b');
  });

  it('lets a heavier voter outweigh a lighter one', () => {
    const votes = [
      vote('pragmatist', 'topic-a', 9),
      vote('pragmatist', 'topic-b', 3),
      vote('skeptic', 'topic-a', 4),
      vote('skeptic', 'topic-b', 8),
    ];

    expect(aggregateVotes(TOPICS, votes).winningTopic.id).toBe('topic-a');
    // b: (3 + 16) / 3 beats a: (9 + 8) / 3
    expect(aggregateVotes(TOPICS, votes, WEIGHTS).winningTopic.id).toBe('topic-b');
  });

  it('reports dissent and a split decision', () => {
    const votes = [
      vote('pragmatist', 'topic-a', 9),
      vote('pragmatist', 'topic-b', 3),
      vote('skeptic', 'topic-a', 4),
      vote('skeptic', 'topic-b', 6),
    ];
    const result = aggregateVotes(TOPICS, votes);

    expect(result.winningTopic.id).toBe('topic-a');
    expect(result.unanimous).toBe(false);
    expect(result.dissentingVotes).toEqual([vote('skeptic', 'topic-a', 4)]);
  });

  it('scores topics nobody voted for as zero', () => {
    const result = aggregateVotes(TOPICS, [vote('pragmatist', 'topic-b', 2)]);

    expect(result.winningTopic.id).toBe('topic-b');
    expect(result.rankings[1]).toMatchObject({ topic: TOPICS[0], weightedScore: 0 });
  });

  it('rejects invalid input', () => {
    expect(() => aggregateVotes([], [])).toThrow(EmptyTopicSetError);
    expect(() => aggregateVotes(TOPICS, [vote('pragmatist', 'topic-a', 11)])).toThrow(VoteOutOfRangeError);
    expect(() => aggregateVotes(TOPICS, [vote('pragmatist', 'topic-a', 6.5)])).toThrow(
      'Vote from pragmatist for topic-a is 6.5; scores must be integers from 0 to 10'
    );
    expect(() => aggregateVotes(TOPICS, [vote('pragmatist', 'topic-z', 5)])).toThrow(
      'Voter pragmatist voted for unknown topic topic-z'
    );
    expect(() =>
      aggregateVotes(TOPICS, [vote('pragmatist', 'topic-a', 5), vote('pragmatist', 'topic-a', 6)])
    ).toThrow(InvalidVoteError);
    expect(() => aggregateVotes([TOPICS[1], TOPICS[1]], [])).toThrow('Duplicate topic id: topic-b');
    expect(() => aggregateVotes([{ ...TOPICS[0], relevanceScore: Infinity }], [])).toThrow(
      'Topic topic-a has a non-finite relevance score'
    );
  });
});

describe('requiredQuorum', () => {
  it('rounds up and never drops below one voter', () => {
    expect(requiredQuorum(5, 1)).toBe(5);
    expect(requiredQuorum(5, 0.5)).toBe(3);
    expect(requiredQuorum(5, 0)).toBe(1);
  });
});

describe('resolveVoterWeights', () => {
  it('prefers configured overrides over voter weights', () => {
    expect(resolveVoterWeights(VOTERS, { skeptic: 3 })).toEqual({ pragmatist: 1, skeptic: 3 });
    expect(resolveVoterWeights([{ id: 'x', name: 'X', persona: 'p' }], {})).toEqual({ x: 1 });
  });
});

describe('ConsensusSelector', () => {
  const retry = { maxAttempts: 1, sleep: noWait, logger: silentLogger };

  it('collects every vote and reports progress per batch', async () => {
    const oracle = new ScriptedOracle({ vote: votesFrom(DEFAULT_SCORES) });
    const onVoteProgress = vi.fn();
    const settings = createPipelineConfig({ consensus: { maxConcurrentVotes: 3 } }).consensus;
    const selector = new ConsensusSelector({ oracle, settings, onVoteProgress, retry, logger: silentLogger });

    const result = await selector.select(TOPICS, VOTERS);

    expect(result.winningTopic.id).toBe('topic-a');
    expect(result.weightedScore).toBeCloseTo(22 / 3);
    expect(oracle.callsFor('vote')).toHaveLength(4);
    expect(onVoteProgress.mock.calls).toEqual([
      [3, 4],
      [4, 4],
    ]);
  });

  it('fails without quorum when a voter drops out', async () => {
    const flakySkeptic: TaskScript = (call, n) =>
      call.system.startsWith('You are The Skeptic,')
        ? failWith(new TransientOracleError('rate limited'))
        : votesFrom(DEFAULT_SCORES)(call, n);
    const oracle = new ScriptedOracle({ vote: flakySkeptic });
    const selector = new ConsensusSelector({ oracle, retry, logger: silentLogger });

    const error = await selector.select(TOPICS, VOTERS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoQuorumError);
    expect(error instanceof NoQuorumError && error.message).toBe(
      'Only 1 of 2 voters returned valid votes (2 required)'
    );
  });

  it('aggregates the remaining voters when quorum allows', async () => {
    const flakySkeptic: TaskScript = (call, n) =>
      call.system.startsWith('You are The Skeptic,')
        ? failWith(new TransientOracleError('rate limited'))
        : votesFrom(DEFAULT_SCORES)(call, n);
    const oracle = new ScriptedOracle({ vote: flakySkeptic });
    const settings = createPipelineConfig({ consensus: { minQuorumFraction: 0.5 } }).consensus;
    const selector = new ConsensusSelector({ oracle, settings, retry, logger: silentLogger });

    const result = await selector.select(TOPICS, VOTERS);

    expect(result.voterCount).toBe(1);
    expect(result.weightedScore).toBe(8);
    expect(result.votes.every((entry) => entry.voterId === 'pragmatist')).toBe(true);
  });

  it('rethrows non-retryable oracle failures', async () => {
    const oracle = new ScriptedOracle({});
    const selector = new ConsensusSelector({ oracle, retry, logger: silentLogger });

    await expect(selector.select(TOPICS, VOTERS)).rejects.toBeInstanceOf(FatalOracleError);
  });

  it('rejects empty topic sets and boards before calling the oracle', async () => {
    const oracle = new ScriptedOracle({ vote: votesFrom(DEFAULT_SCORES) });
    const selector = new ConsensusSelector({ oracle, retry, logger: silentLogger });

    await expect(selector.select([], VOTERS)).rejects.toBeInstanceOf(EmptyTopicSetError);
    await expect(selector.select(TOPICS, [])).rejects.toThrow('No voters configured');
    expect(oracle.calls).toEqual([]);
  });

  it('rejects repeated ids and non-finite relevance before calling the oracle', async () => {
    const oracle = new ScriptedOracle({ vote: votesFrom(DEFAULT_SCORES) });
    const selector = new ConsensusSelector({ oracle, retry, logger: silentLogger });

    await expect(selector.select([TOPICS[0], TOPICS[0]], VOTERS)).rejects.toThrow('Duplicate topic id: topic-a');
    await expect(selector.select(TOPICS, [VOTERS[1], VOTERS[1]])).rejects.toThrow('Duplicate voter id: skeptic');
    await expect(
      selector.select([{ ...TOPICS[0], relevanceScore: Number.NaN }, TOPICS[1]], VOTERS)
    ).rejects.toBeInstanceOf(InvalidBoardInputError);
    expect(oracle.calls).toEqual([]);
  });
});

describe('formatConsensusReport', () => {
  it('renders ranking, votes and decision', () => {
    const report = formatConsensusReport(aggregateVotes(TOPICS, DEFAULT_VOTES, WEIGHTS), VOTERS);

    expect(report.split('\n')).toEqual([
      '# Editorial Board Decision',
      '',
      '**Selected topic:** Flaky tests cost more than teams think',
      '**Weighted score:** 7.33/10 from 2 voters',
      '**Consensus:** unanimous',
      '',
      '## Ranking',
      '',
      '| Rank | Topic | Score |',
      '|---|---|---|',
      '| 1 | Flaky tests cost more than teams think | 7.33 |',
      '| 2 | The test pyramid is out of date | 5.33 |',
      '',
      '## Votes for the selected topic',
      '',
      '- **The Pragmatist** (8/10): pragmatist on topic-a',
      '- **The Skeptic** (7/10): skeptic on topic-a',
      '',
    ]);
  });

  it('lists dissent', () => {
    const votes = [vote('pragmatist', 'topic-a', 9), vote('skeptic', 'topic-a', 3)];
    const report = formatConsensusReport(aggregateVotes(TOPICS, votes), VOTERS);

    expect(report).toContain('**Consensus:** unanimous');
    expect(report.endsWith('## Dissent\n\n- The Skeptic scored it 3/10\n')).toBe(true);
  });
});

describe('editorial board', () => {
  it('loads the default board', () => {
    const board = loadEditorialBoard();

    expect(board.length).toBeGreaterThan(0);
    expect(new Set(board.map((voter) => voter.id)).size).toBe(board.length);
  });

  it('rejects malformed and duplicate entries', () => {
    expect(() => parseEditorialBoard({ voters: [] })).toThrow(/^Invalid editorial board: /);
    expect(() =>
      parseEditorialBoard({
        voters: [
          { id: 'a', name: 'A', persona: 'p' },
          { id: 'a', name: 'B', persona: 'q' },
        ],
      })
    ).toThrow('Duplicate voter id in editorial board: a');
  });
});
