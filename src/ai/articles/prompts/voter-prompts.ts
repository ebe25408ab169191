/**
 * Board Voter Prompts
 *
 * Each board member scores one topic from their own perspective.
 */

import type { Topic, VoterSpec } from '../types';

export function getVoterSystemPrompt(voter: VoterSpec): string {
  return `You are ${voter.name}, a member of the editorial board of a technology publication for engineering leaders.

${voter.persona}

You will be shown one proposed article topic. Score it from 0 to 10 for how much you would want to read it:
- 0-3: you would scroll past
- 4-6: you might skim it
- 7-8: you would read it
- 9-10: you would forward it to your team

Score only from your own perspective. Do not try to guess what the other board members think.`;
}

export function getVoterUserPrompt(topic: Topic): string {
  return `PROPOSED TOPIC: ${topic.title}

${topic.description}

Return JSON with:
- "score": an integer from 0 to 10
- "rationale": two or three sentences explaining the score`;
}
