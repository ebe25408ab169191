import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createPipelineConfig, pathsUnder } from '../../../src/ai/articles/config';
import {
  StageOrchestrator,
  type ChartExportFn,
  type PipelineOutcome,
} from '../../../src/ai/articles/orchestrator';
import { FileQuarantineStore } from '../../../src/ai/articles/services/quarantine-store';
import { FileSessionStore } from '../../../src/ai/articles/services/session-store';
import { EDITORIAL_CHECK_NAMES } from '../../../src/ai/articles/gates';
import { PipelineRunError, PublishError, type PipelineStage } from '../../../src/ai/articles/types';
import { TransientOracleError } from '../../../src/ai/oracle/types';
import {
  ARTICLE_SLUG,
  ARTICLE_TITLE,
  DEFAULT_SCORES,
  editedBody,
  editorResponse,
  fakeExportChart,
  RecordingPublisher,
  researchResponse,
  silentStructuredLogger,
  TOPICS,
  VOTERS,
  votesFrom,
  writerResponse,
} from '../helpers/fixtures';
import { failWith, reply, ScriptedOracle, sequence, type OracleScripts } from '../helpers/scripted-oracle';

const DATE = '2026-03-02';
const INPUT = { topics: TOPICS };
const BRIEF = { brief: 'What flaky tests cost delivery teams' };

const discoveredTopics = {
  topics: TOPICS.map(({ title, description, relevanceScore }) => ({ title, description, relevanceScore })),
};

function happyScripts(overrides: OracleScripts = {}): OracleScripts {
  return {
    vote: votesFrom(DEFAULT_SCORES),
    research: () => reply(researchResponse()),
    write: () => reply(writerResponse),
    edit: () => reply(editorResponse()),
    ...overrides,
  };
}

describe('StageOrchestrator', () => {
  let dir: string;
  let publisher: RecordingPublisher;
  let sessionStore: FileSessionStore;
  let quarantineStore: FileQuarantineStore;
  const sleep = vi.fn((_ms: number) => Promise.resolve());

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
    publisher = new RecordingPublisher();
    sessionStore = new FileSessionStore(join(dir, 'sessions'));
    quarantineStore = new FileQuarantineStore(join(dir, 'quarantine'));
    sleep.mockClear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function orchestrator(oracle: ScriptedOracle, exportChart: ChartExportFn = fakeExportChart()) {
    return new StageOrchestrator({
      oracle,
      config: createPipelineConfig({ paths: pathsUnder(dir) }),
      voters: VOTERS,
      sessionStore,
      quarantineStore,
      publisher,
      exportChart,
      sleep,
      createSessionId: () => 'session-1',
      logger: silentStructuredLogger,
    });
  }

  async function runFailure(run: Promise<PipelineOutcome>): Promise<PipelineRunError> {
    const error = await run.then(
      () => null,
      (caught: unknown) => caught
    );
    if (!(error instanceof PipelineRunError)) {
      throw new Error(`Expected PipelineRunError, got ${String(error)}`);
    }
    return error;
  }

  it('publishes an article that clears both gates', async () => {
    const oracle = new ScriptedOracle(happyScripts());
    const events: Array<[PipelineStage, number]> = [];

    const outcome = await orchestrator(oracle).run(INPUT, {
      date: DATE,
      onProgress: (stage, progress) => events.push([stage, progress]),
    });

    expect(outcome.status).toBe('published');
    if (outcome.status !== 'published') return;
    expect(outcome.receipt.location).toBe(`/site/_posts/${DATE}-${ARTICLE_SLUG}.md`);
    expect(outcome.session).toMatchObject({ status: 'published', lastCompletedStage: 'publish' });
    expect(outcome.session.gateResults.map((gate) => [gate.gateName, gate.overallPassed])).toEqual([
      ['editorial', true],
      ['visual', true],
    ]);
    expect(outcome.consensusReport).toContain('**Selected topic:** Flaky tests cost more than teams think');

    const [request] = publisher.requests;
    expect(request.metadata).toMatchObject({
      sessionId: 'session-1',
      title: ARTICLE_TITLE,
      slug: ARTICLE_SLUG,
      date: DATE,
      topicTitle: TOPICS[0].title,
    });
    expect(request.metadata.boardScore).toBeCloseTo(22 / 3);
    expect(request.chartImagePath).toBe(join(dir, 'assets', 'charts', 'session-1.png'));
    expect(request.articleMarkdown.endsWith(`${editedBody()}\n`)).toBe(true);

    expect(events.filter(([, progress]) => progress === 0).map(([stage]) => stage)).toEqual([
      'select',
      'research',
      'write',
      'chart',
      'edit',
      'visual-qa',
      'publish',
    ]);
    expect((await sessionStore.load('session-1'))?.status).toBe('published');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('quarantines a draft that fails the editorial gate', async () => {
    const oracle = new ScriptedOracle(
      happyScripts({
        research: () => reply(researchResponse({ chart: false })),
        edit: () =>
          reply(
            editorResponse({
              body: editedBody({ chartPath: null }),
              failing: { opening: 'Buries the lead.' },
              chartVerdict: 'n/a',
            })
          ),
      })
    );

    const outcome = await orchestrator(oracle).run(INPUT, { date: DATE });

    expect(outcome.status).toBe('quarantined');
    if (outcome.status !== 'quarantined') return;
    expect(outcome.failedGate.gateName).toBe('editorial');
    expect(
      outcome.failedGate.checks.map((check) => (check.notApplicable ? 'N/A' : check.passed ? 'PASS' : 'FAIL'))
    ).toEqual(['FAIL', 'PASS', 'PASS', 'PASS', 'N/A']);
    expect(outcome.session).toMatchObject({ status: 'quarantined', lastCompletedStage: 'chart', chartImageRef: null });
    expect(outcome.session.annotations).toMatchObject([
      { kind: 'gate-failure', stage: 'edit', message: 'Gate editorial failed: Opening-strength' },
    ]);
    expect(publisher.requests).toEqual([]);

    const record = JSON.parse(await readFile(outcome.quarantine.recordPath, 'utf8'));
    expect(record.failureReport).toMatchObject({ kind: 'gate-failure', stage: 'edit', lastCompletedStage: 'chart' });
    const checks: Array<{ name: string; rationale: string }> = record.failureReport.failedGate.checks;
    expect(checks.map((check) => check.name)).toEqual([...EDITORIAL_CHECK_NAMES]);
    expect(checks.every((check) => check.rationale.length > 0)).toBe(true);
    expect(checks[0].rationale).toContain('Buries the lead.');
    expect(await readFile(outcome.quarantine.reportPath, 'utf8')).toContain('Opening-strength');
  });

  it('discovers topics from a brief before the board votes', async () => {
    const oracle = new ScriptedOracle(happyScripts({ discover: sequence(reply(discoveredTopics)) }));
    const started: PipelineStage[] = [];

    const outcome = await orchestrator(oracle).run(BRIEF, {
      date: DATE,
      onProgress: (stage, progress) => {
        if (progress === 0) started.push(stage);
      },
    });

    expect(outcome.status).toBe('published');
    if (outcome.status !== 'published') return;
    expect(started.slice(0, 2)).toEqual(['discover', 'select']);
    expect(oracle.callsFor('discover')).toHaveLength(1);
    expect(outcome.session.topic).toEqual({ ...TOPICS[0], id: 'topic-1' });
    expect(publisher.requests[0].metadata.topicTitle).toBe(TOPICS[0].title);
  });

  it('fails without a quarantine when discovery fails', async () => {
    const oracle = new ScriptedOracle(happyScripts());

    const error = await runFailure(orchestrator(oracle).run(BRIEF, { date: DATE }));

    expect(error.code).toBe('ORACLE_FATAL');
    expect(error.message).toBe('discover failed: No script for discover');
    expect(error.lastCompletedStage).toBeNull();
    expect(error.quarantine).toBeUndefined();
    expect(oracle.callsFor('vote')).toEqual([]);
    expect(await sessionStore.load('session-1')).toBeNull();
    expect(await readdir(join(dir, 'quarantine')).catch(() => [])).toEqual([]);
  });

  it('fails without a quarantine when the board cannot vote', async () => {
    const oracle = new ScriptedOracle(happyScripts());

    const error = await runFailure(orchestrator(oracle).run({ topics: [TOPICS[0], TOPICS[0]] }, { date: DATE }));

    expect(error.code).toBe('INPUT_INVALID');
    expect(error.message).toBe('select failed: Duplicate topic id: topic-a');
    expect(error.lastCompletedStage).toBeNull();
    expect(error.quarantine).toBeUndefined();
    expect(oracle.calls).toEqual([]);
    expect(await sessionStore.load('session-1')).toBeNull();
  });

  it('names discovery as the last completed stage when the vote fails', async () => {
    const oracle = new ScriptedOracle({ discover: sequence(reply(discoveredTopics)) });

    const error = await runFailure(orchestrator(oracle).run(BRIEF, { date: DATE }));

    expect(error.code).toBe('ORACLE_FATAL');
    expect(error.message.startsWith('select failed: ')).toBe(true);
    expect(error.lastCompletedStage).toBe('discover');
    expect(error.quarantine).toBeUndefined();
    expect(await sessionStore.load('session-1')).toBeNull();
  });

  it('quarantines the session when publishing fails', async () => {
    publisher = new RecordingPublisher(new PublishError('CMS rejected the article'));
    const oracle = new ScriptedOracle(happyScripts());

    const error = await runFailure(orchestrator(oracle).run(INPUT, { date: DATE }));

    expect(error.code).toBe('PUBLISH_FAILED');
    expect(error.message).toBe('publish failed: CMS rejected the article');
    expect(error.lastCompletedStage).toBe('visual-qa');
    expect(publisher.requests).toEqual([]);

    const saved = await sessionStore.load('session-1');
    expect(saved?.status).toBe('failed');
    expect(saved?.annotations.map((annotation) => [annotation.kind, annotation.stage])).toEqual([
      ['fatal-error', 'publish'],
    ]);

    const record = JSON.parse(await readFile(error.quarantine?.recordPath ?? '', 'utf8'));
    expect(record.failureReport).toMatchObject({
      kind: 'fatal-error',
      stage: 'publish',
      lastCompletedStage: 'visual-qa',
      message: 'CMS rejected the article',
      failedGate: null,
    });
  });

  it('retries transient research failures with exponential backoff', async () => {
    const rateLimited = failWith(new TransientOracleError('rate limited'));
    const oracle = new ScriptedOracle(
      happyScripts({ research: sequence(rateLimited, rateLimited, reply(researchResponse())) })
    );

    const outcome = await orchestrator(oracle).run(INPUT, { date: DATE });

    expect(outcome.status).toBe('published');
    expect(oracle.callsFor('research')).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('quarantines the partial session when a stage exhausts its retries', async () => {
    const oracle = new ScriptedOracle(
      happyScripts({ write: () => failWith(new TransientOracleError('rate limited')) })
    );

    const error = await runFailure(orchestrator(oracle).run(INPUT, { date: DATE }));

    expect(error.code).toBe('ORACLE_FATAL');
    expect(error.message).toBe('write failed: Article draft failed after 3 attempts: rate limited');
    expect(error.lastCompletedStage).toBe('research');
    expect(error.quarantine?.sessionId).toBe('session-1');

    const saved = await sessionStore.load('session-1');
    expect(saved?.status).toBe('failed');
    expect(saved?.annotations.map((annotation) => [annotation.kind, annotation.stage])).toEqual([
      ['fatal-error', 'write'],
    ]);

    const recordPath = error.quarantine?.recordPath ?? '';
    const record = JSON.parse(await readFile(recordPath, 'utf8'));
    expect(record.failureReport).toMatchObject({ kind: 'fatal-error', stage: 'write', failedGate: null });
  });

  it('quarantines a chart whose title cannot fit', async () => {
    const chartTitle = 'Flaky tests '.repeat(10).trim();
    const oracle = new ScriptedOracle(happyScripts({ research: () => reply(researchResponse({ chartTitle })) }));

    const outcome = await orchestrator(oracle).run(INPUT, { date: DATE });

    expect(outcome.status).toBe('quarantined');
    if (outcome.status !== 'quarantined') return;
    expect(outcome.failedGate.gateName).toBe('chart-layout');
    expect(outcome.failedGate.checks[0].rationale).toMatch(/^TITLE_OVERFLOW: /);
    expect(outcome.session.annotations).toMatchObject([{ kind: 'layout-error', stage: 'chart' }]);
    expect(outcome.session.lastCompletedStage).toBe('write');
    expect(oracle.callsFor('edit')).toEqual([]);
  });

  it('quarantines a chart export that fails visual QA', async () => {
    const oracle = new ScriptedOracle(happyScripts());

    const outcome = await orchestrator(oracle, fakeExportChart({ width: 400, height: 275 })).run(INPUT, {
      date: DATE,
    });

    expect(outcome.status).toBe('quarantined');
    if (outcome.status !== 'quarantined') return;
    expect(outcome.failedGate.gateName).toBe('visual');
    const exportCheck = outcome.failedGate.checks.find((check) => check.name === 'Export-quality');
    expect(exportCheck).toMatchObject({ passed: false, rationale: 'Image is 400px wide, below 800px' });
    expect(outcome.session.lastCompletedStage).toBe('edit');
    expect(publisher.requests).toEqual([]);
  });

  it('stops between stages once cancelled', async () => {
    const oracle = new ScriptedOracle(happyScripts());
    const controller = new AbortController();

    const error = await runFailure(
      orchestrator(oracle).run(INPUT, {
        date: DATE,
        signal: controller.signal,
        onProgress: (stage, progress) => {
          if (stage === 'research' && progress === 100) controller.abort();
        },
      })
    );

    expect(error.code).toBe('CANCELLED');
    expect(error.lastCompletedStage).toBe('research');
    expect(error.quarantine).toBeUndefined();
    expect(oracle.callsFor('write')).toEqual([]);
  });
});
