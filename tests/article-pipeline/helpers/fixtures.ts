import { join } from 'node:path';

import type { ChartImageRef } from '../../../src/ai/articles/chart/chart-exporter';
import type { ChartSpec } from '../../../src/ai/articles/chart/types';
import type { ChartExportFn } from '../../../src/ai/articles/orchestrator';
import type {
  ArticlePublisher,
  PublishReceipt,
  PublishRequest,
} from '../../../src/ai/articles/services/publishers';
import type { Topic, VoterSpec } from '../../../src/ai/articles/types';
import { silentLogger, type StructuredLogger } from '../../../src/utils/logger';
import { reply, type TaskScript } from './scripted-oracle';

// ============================================================================
// Board
// ============================================================================

export const TOPICS: Topic[] = [
  {
    id: 'topic-a',
    title: 'Flaky tests cost more than teams think',
    description: 'What reruns really cost a delivery team.',
    relevanceScore: 7,
  },
  {
    id: 'topic-b',
    title: 'The test pyramid is out of date',
    description: 'Whether the classic shape still fits service-heavy systems.',
    relevanceScore: 8,
  },
];

export const VOTERS: VoterSpec[] = [
  { id: 'pragmatist', name: 'The Pragmatist', weight: 1, persona: 'You care about delivery speed.' },
  { id: 'skeptic', name: 'The Skeptic', weight: 2, persona: 'You ask where every number came from.' },
];

/**
 * Scores by voter name, then topic title.
 */
export type ScoreTable = Readonly<Record<string, Readonly<Record<string, number>>>>;

export const DEFAULT_SCORES: ScoreTable = {
  'The Pragmatist': {
    'Flaky tests cost more than teams think': 8,
    'The test pyramid is out of date': 6,
  },
  'The Skeptic': {
    'Flaky tests cost more than teams think': 7,
    'The test pyramid is out of date': 5,
  },
};

/**
 * Vote script answering from a score table. Voter and topic are read back
 * from the prompts the board voter sends.
 */
export function votesFrom(table: ScoreTable): TaskScript {
  return (call) => {
    for (const [voterName, scores] of Object.entries(table)) {
      if (!call.system.startsWith(`You are ${voterName},`)) continue;
      for (const [title, score] of Object.entries(scores)) {
        if (call.prompt.startsWith(`PROPOSED TOPIC: ${title}\n`)) {
          return reply({ score, rationale: `${voterName} gives ${title} ${score}.` });
        }
      }
    }
    throw new Error(`No score for prompt: ${call.prompt.slice(0, 60)}`);
  };
}

// ============================================================================
// Stage responses
// ============================================================================

export const CHART_TITLE = 'Share of CI runs hit by flaky tests';

export function researchResponse(options: { chart?: boolean; chartTitle?: string } = {}): unknown {
  const { chart = true, chartTitle = CHART_TITLE } = options;
  return {
    headlineStat: 'One CI run in five fails on a flaky test',
    dataPoints: [
      {
        stat: '12% of engineering time goes to reruns',
        source: 'Example CI survey',
        year: 2025,
        url: null,
        verified: true,
      },
    ],
    trendNarrative: 'Flaky failures have risen every year since 2021.',
    contrarianAngle: 'Teams that delete flaky tests ship faster without more incidents.',
    unverifiedClaims: [],
    chartData: chart
      ? {
          title: chartTitle,
          subtitle: '% of runs',
          type: 'line',
          yLabel: null,
          categories: ['2021', '2022', '2023', '2024'],
          series: [{ name: 'Flaky share', values: [20, 35, 50, 65] }],
          sourceLine: 'Source: Example CI survey, 2025',
        }
      : null,
  };
}

export const ARTICLE_TITLE = 'Flaky tests cost more than teams think';
export const ARTICLE_SLUG = 'flaky-tests-cost-more-than-teams-think';

export const writerResponse = { title: ARTICLE_TITLE, body: 'Draft body.' };

/**
 * Body that passes every deterministic editorial rule.
 */
export function editedBody(options: { chartPath?: string | null } = {}): string {
  const { chartPath = '/assets/charts/session-1.png' } = options;
  return [
    'Flaky tests now fail one CI run in five, according to a 2025 survey of 300 engineering teams.',
    'That cost is rarely counted. Teams rerun failed jobs instead of fixing them, and the reruns hide the trend.',
    ...(chartPath ? [`![${CHART_TITLE}](${chartPath})`] : []),
    '## Where the time goes',
    'The same survey found that engineers spend 12% of their week waiting on reruns.',
    '## What changes next',
    'Teams that quarantine flaky tests within a day ship more often than those that tolerate them.',
  ].join('\n\n');
}

type VerdictName = 'opening' | 'evidence' | 'voice' | 'structure' | 'chart';

export function editorResponse(
  options: {
    body?: string;
    failing?: Partial<Record<VerdictName, string>>;
    chartVerdict?: 'pass' | 'n/a';
  } = {}
): unknown {
  const { body = editedBody(), failing = {}, chartVerdict = 'pass' } = options;
  const verdict = (name: VerdictName, passRationale: string) => {
    const failure = failing[name];
    return failure ? { verdict: 'fail', rationale: failure } : { verdict: 'pass', rationale: passRationale };
  };

  return {
    editedBody: body,
    verdicts: {
      opening: verdict('opening', 'Leads with the number.'),
      evidence: verdict('evidence', 'Every figure is sourced.'),
      voice: verdict('voice', 'Plain and direct.'),
      structure: verdict('structure', 'Ends on a consequence.'),
      chart:
        failing.chart !== undefined
          ? { verdict: 'fail', rationale: failing.chart }
          : chartVerdict === 'n/a'
            ? { verdict: 'n/a', rationale: 'No chart.' }
            : { verdict: 'pass', rationale: 'Chart is introduced in the text.' },
    },
    fixesApplied: ['Tightened the opening'],
  };
}

// ============================================================================
// Collaborators
// ============================================================================

export const silentStructuredLogger: StructuredLogger = {
  ...silentLogger,
  structured: () => undefined,
};

/**
 * Chart export that skips rasterising. The default size matches the
 * 800x550 canvas at scale 2.
 */
export function fakeExportChart(overrides: Partial<ChartImageRef> = {}): ChartExportFn {
  return async (_spec: ChartSpec, _layout, options) => ({
    fileName: `${options.slug}.png`,
    imagePath: join(options.chartsDir, `${options.slug}.png`),
    specPath: join(options.chartsDir, `${options.slug}.json`),
    publicPath: `${options.publicPathPrefix}/${options.slug}.png`,
    format: 'png',
    width: 1600,
    height: 1100,
    bytes: 2048,
    ...overrides,
  });
}

export class RecordingPublisher implements ArticlePublisher {
  readonly requests: PublishRequest[] = [];

  constructor(private readonly failure?: Error) {}

  async publish(request: PublishRequest): Promise<PublishReceipt> {
    if (this.failure) throw this.failure;
    this.requests.push(request);
    return {
      destination: 'file',
      location: `/site/_posts/${request.metadata.date}-${request.metadata.slug}.md`,
      publishedAt: '2026-03-02T09:00:00.000Z',
    };
  }
}
