import { describe, it, expect } from 'vitest';

import {
  buildChartSpec,
  describeChartDataProblem,
  runBoardVoter,
  runEditor,
  runResearcher,
  runTopicScout,
  runWriter,
} from '../../../src/ai/articles/agents';
import type { ResearchChartData, ResearchFindings } from '../../../src/ai/articles/types';
import { FatalOracleError } from '../../../src/ai/oracle/types';
import { silentLogger } from '../../../src/utils/logger';
import {
  ARTICLE_SLUG,
  ARTICLE_TITLE,
  editedBody,
  editorResponse,
  researchResponse,
  TOPICS,
  VOTERS,
  writerResponse,
} from '../helpers/fixtures';
import { reply, ScriptedOracle, sequence } from '../helpers/scripted-oracle';

const noWait = (_ms: number): Promise<void> => Promise.resolve();
const retry = { sleep: noWait, logger: silentLogger };

const chartData: ResearchChartData = {
  title: ' Share of CI runs hit by flaky tests ',
  subtitle: '',
  type: 'line',
  yLabel: '% of runs',
  categories: ['2021', '2022'],
  series: [{ name: 'Flaky share', values: [20, 35] }],
  sourceLine: 'Source: Example CI survey, 2025 ',
};

const findings: ResearchFindings = {
  headlineStat: 'One CI run in five fails on a flaky test',
  dataPoints: [],
  trendNarrative: 'Rising.',
  contrarianAngle: 'Delete them.',
  unverifiedClaims: [],
  chartData: null,
};

describe('runTopicScout', () => {
  it('assigns ids in the order topics came back', async () => {
    const oracle = new ScriptedOracle({
      discover: sequence(
        reply({
          topics: [
            { title: ' Flaky tests ', description: 'Cost of reruns.', relevanceScore: 7 },
            { title: 'Test pyramids', description: 'Still useful?', relevanceScore: 8 },
            { title: 'Contract tests', description: 'Between services.', relevanceScore: 6 },
          ],
        })
      ),
    });

    const topics = await runTopicScout('testing economics', {
      oracle,
      topicCount: 2,
      currentDate: '2026-03-02',
      retry,
      logger: silentLogger,
    });

    expect(topics).toEqual([
      { id: 'topic-1', title: 'Flaky tests', description: 'Cost of reruns.', relevanceScore: 7 },
      { id: 'topic-2', title: 'Test pyramids', description: 'Still useful?', relevanceScore: 8 },
    ]);
    expect(oracle.calls[0].temperature).toBe(0.7);
  });
});

describe('runBoardVoter', () => {
  it('returns the vote with voter and topic ids', async () => {
    const oracle = new ScriptedOracle({ vote: sequence(reply({ score: 9, rationale: 'Worth forwarding.' })) });

    const vote = await runBoardVoter(VOTERS[1], TOPICS[0], { oracle, retry, logger: silentLogger });

    expect(vote).toEqual({ voterId: 'skeptic', topicId: 'topic-a', score: 9, rationale: 'Worth forwarding.' });
    expect(oracle.calls[0].system.startsWith('You are The Skeptic,')).toBe(true);
  });

  it('retries scores outside the scale and gives up when they persist', async () => {
    const oracle = new ScriptedOracle({ vote: sequence(reply({ score: 11, rationale: 'Too keen.' })) });

    await expect(
      runBoardVoter(VOTERS[0], TOPICS[0], { oracle, retry: { ...retry, maxAttempts: 2 }, logger: silentLogger })
    ).rejects.toBeInstanceOf(FatalOracleError);
    expect(oracle.callsFor('vote')).toHaveLength(2);
  });
});

describe('runResearcher', () => {
  it('keeps chart data whose series match the categories', async () => {
    const oracle = new ScriptedOracle({ research: sequence(reply(researchResponse())) });

    const result = await runResearcher(TOPICS[0], { oracle, retry, logger: silentLogger });

    expect(result.chartData?.categories).toEqual(['2021', '2022', '2023', '2024']);
    expect(result.dataPoints).toHaveLength(1);
  });

  it('drops ragged chart data', async () => {
    const ragged = Object.assign({}, researchResponse(), {
      chartData: { ...chartData, series: [{ name: 'Flaky share', values: [20] }] },
    });
    const oracle = new ScriptedOracle({ research: sequence(reply(ragged)) });

    const result = await runResearcher(TOPICS[0], { oracle, retry, logger: silentLogger });

    expect(result.chartData).toBeNull();
    expect(result.headlineStat).toBe('One CI run in five fails on a flaky test');
  });
});

describe('describeChartDataProblem', () => {
  it('names the ragged series', () => {
    expect(describeChartDataProblem(chartData)).toBeNull();
    expect(
      describeChartDataProblem({ ...chartData, series: [{ name: 'Short', values: [1] }] })
    ).toBe('series "Short" has 1 values for 2 categories');
  });
});

describe('buildChartSpec', () => {
  it('trims text and falls back to the y label for the subtitle', () => {
    expect(buildChartSpec(chartData)).toEqual({
      title: 'Share of CI runs hit by flaky tests',
      subtitle: '% of runs',
      type: 'line',
      categories: ['2021', '2022'],
      series: [{ name: 'Flaky share', values: [20, 35], label: 'Flaky share' }],
      sourceLine: 'Source: Example CI survey, 2025',
    });
  });
});

describe('runWriter', () => {
  it('wraps the body in front matter and derives the slug', async () => {
    const oracle = new ScriptedOracle({ write: sequence(reply(writerResponse)) });

    const draft = await runWriter(
      {
        topic: TOPICS[0],
        findings,
        chart: { alt: 'Share of CI runs', path: '/assets/charts/session-1.png' },
        date: '2026-03-02',
      },
      { oracle, retry, logger: silentLogger }
    );

    expect(draft).toEqual({
      title: ARTICLE_TITLE,
      slug: ARTICLE_SLUG,
      markdown:
        '---\nlayout: "post"\ntitle: "Flaky tests cost more than teams think"\ndate: "2026-03-02"\ncategory: "quality-engineering"\n---\n\nDraft body.\n',
      regenerated: false,
      selfCheckIssues: [],
    });
    expect(oracle.calls[0].prompt).toContain('![Share of CI runs](/assets/charts/session-1.png)');
  });

  const input = { topic: TOPICS[0], findings, chart: null, date: '2026-03-02' };
  const bannedDraft = { title: ARTICLE_TITLE, body: "In today's world, flaky tests are a game-changer." };

  it('rewrites once with the rule breaks when the draft fails its self-check', async () => {
    const oracle = new ScriptedOracle({
      write: sequence(
        reply(bannedDraft),
        reply({ title: ARTICLE_TITLE, body: 'Flaky tests fail one CI run in five [NEEDS SOURCE].' })
      ),
    });

    const draft = await runWriter(input, { oracle, retry, logger: silentLogger });

    expect(oracle.calls).toHaveLength(2);
    expect(oracle.calls[0].prompt).not.toContain('REVISION REQUIRED');
    expect(oracle.calls[1].prompt).toContain(
      'REVISION REQUIRED: your previous draft broke these rules. Fix every one:\n1. Banned opening "In today\'s"\n2. Banned phrase "game-changer"\n'
    );
    expect(draft.regenerated).toBe(true);
    expect(draft.selfCheckIssues).toEqual(['Unresolved [NEEDS SOURCE] flag']);
    expect(draft.markdown.endsWith('Flaky tests fail one CI run in five [NEEDS SOURCE].\n')).toBe(true);
  });

  it('keeps the rewrite when it still breaks the rules', async () => {
    const oracle = new ScriptedOracle({ write: sequence(reply(bannedDraft), reply(bannedDraft)) });

    const draft = await runWriter(input, { oracle, retry, logger: silentLogger });

    expect(oracle.calls).toHaveLength(2);
    expect(draft.regenerated).toBe(true);
    expect(draft.selfCheckIssues).toEqual(['Banned opening "In today\'s"', 'Banned phrase "game-changer"']);
  });
});

describe('runEditor', () => {
  const draft = {
    title: ARTICLE_TITLE,
    slug: ARTICLE_SLUG,
    markdown: '---\nlayout: "post"\ntitle: "Flaky tests cost more than teams think"\ndate: "2026-03-02"\n---\n\nDraft body.\n',
    regenerated: false,
    selfCheckIssues: [],
  };

  it('runs at temperature 0 and keeps the draft front matter', async () => {
    const oracle = new ScriptedOracle({ edit: sequence(reply(editorResponse())) });

    const review = await runEditor(
      { draft, findings, chartFileName: 'session-1.png' },
      { oracle, retry, logger: silentLogger }
    );

    expect(oracle.calls[0].temperature).toBe(0);
    expect(review.editedMarkdown).toBe(
      `---\nlayout: "post"\ntitle: "Flaky tests cost more than teams think"\ndate: "2026-03-02"\n---\n\n${editedBody()}\n`
    );
    expect(review.verdicts.opening).toEqual({ verdict: 'pass', rationale: 'Leads with the number.' });
    expect(review.fixesApplied).toEqual(['Tightened the opening']);
  });

  it('passes failing verdicts through', async () => {
    const oracle = new ScriptedOracle({
      edit: sequence(reply(editorResponse({ failing: { voice: 'Too breathless.' } }))),
    });

    const review = await runEditor({ draft, findings, chartFileName: null }, { oracle, retry, logger: silentLogger });

    expect(review.verdicts.voice).toEqual({ verdict: 'fail', rationale: 'Too breathless.' });
  });
});
