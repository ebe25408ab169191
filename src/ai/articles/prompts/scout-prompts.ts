/**
 * Topic Scout Prompts
 *
 * Prompts for proposing candidate topics before the board votes.
 */

export interface ScoutPromptContext {
  /** What the publication wants to cover this cycle */
  readonly brief: string;
  readonly topicCount: number;
  /** ISO date the topics should be timely for */
  readonly currentDate: string;
}

export function getTopicScoutSystemPrompt(): string {
  return `You are the topic scout for a weekly analysis column on software quality and engineering practice, written for engineering leaders.

You propose topics that:
- Have hard, citable data behind them (surveys, industry reports, academic studies)
- Carry a contrarian or non-obvious angle
- Lend themselves to one clear chart
- Matter to someone who has to make a decision

Avoid vendor announcements, tutorials and topics that have been covered to death.`;
}

export function getTopicScoutUserPrompt(context: ScoutPromptContext): string {
  return `Today's date is ${context.currentDate}.

BRIEF:
${context.brief}

Propose exactly ${context.topicCount} distinct topics.

Return JSON with:
- "topics": an array of objects, each with
  - "title": a short working title (under 80 characters)
  - "description": two sentences on the angle and the data behind it
  - "relevanceScore": a number from 0 to 10 for how timely the topic is`;
}
