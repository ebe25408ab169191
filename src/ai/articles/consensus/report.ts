/**
 * Board decision report, in markdown.
 */

import type { ConsensusResult, VoterSpec } from '../types';

function voterName(voterId: string, voters: readonly VoterSpec[]): string {
  return voters.find((voter) => voter.id === voterId)?.name ?? voterId;
}

/**
 * Renders the ranking, the winner's vote breakdown and any dissent.
 *
 * @example
 * logger.info(formatConsensusReport(result, board));
 */
export function formatConsensusReport(result: ConsensusResult, voters: readonly VoterSpec[] = []): string {
  const lines: string[] = [
    '# Editorial Board Decision',
    '',
    `**Selected topic:** ${result.winningTopic.title}`,
    `**Weighted score:** ${result.weightedScore.toFixed(2)}/10 from ${result.voterCount} voters`,
    `**Consensus:** ${result.unanimous ? 'unanimous' : 'split'}`,
    '',
    '## Ranking',
    '',
    '| Rank | Topic | Score |',
    '|---|---|---|',
    ...result.rankings.map(
      (ranking) => `| ${ranking.rank} | ${ranking.topic.title} | ${ranking.weightedScore.toFixed(2)} |`
    ),
    '',
    '## Votes for the selected topic',
    '',
  ];

  const winnerVotes = result.votes.filter((vote) => vote.topicId === result.winningTopic.id);
  for (const vote of winnerVotes) {
    lines.push(`- **${voterName(vote.voterId, voters)}** (${vote.score}/10): ${vote.rationale}`);
  }

  if (result.dissentingVotes.length > 0) {
    lines.push('', '## Dissent', '');
    for (const vote of result.dissentingVotes) {
      lines.push(`- ${voterName(vote.voterId, voters)} scored it ${vote.score}/10`);
    }
  }

  return `${lines.join('\n')}\n`;
}
