/**
 * Stage Orchestrator
 *
 * Runs one topic through the pipeline:
 *
 *   Discover → Select → Research → Write → Chart → Edit → VisualQA → Publish
 *
 * A failed gate at Edit or VisualQA, or a layout error at Chart, quarantines
 * the session and ends the run. Fatal errors from Research onward quarantine
 * the partial session before the run rejects with PipelineRunError.
 *
 * Stages never touch the session directly. Each one gets a frozen view and a
 * write-once slot; the orchestrator commits the slot and persists the session
 * after every stage.
 *
 * @example
 * const orchestrator = new StageOrchestrator({
 *   oracle,
 *   config,
 *   sessionStore: new FileSessionStore(config.paths.sessionsDir),
 *   quarantineStore: new FileQuarantineStore(config.paths.quarantineDir),
 *   publisher: new FilePublisher({ postsDir: config.paths.postsDir }),
 * });
 *
 * const outcome = await orchestrator.run({ brief: 'Developer productivity' }, {
 *   onProgress: (stage, progress, message) => console.log(`[${stage}] ${progress}%: ${message}`),
 * });
 */

import { createStructuredLogger, type StructuredLogger } from '../../utils/logger';
import { isOracleError, type GenerationOracle } from '../oracle/types';
import { buildChartSpec, runEditor, runResearcher, runTopicScout, runWriter } from './agents';
import type { EditorDeps } from './agents/editor';
import { exportChart as exportChartToDisk, type ChartImageRef, type ExportChartOptions } from './chart/chart-exporter';
import { ChartLayoutEngine } from './chart/layout-engine';
import { isLayoutError, type ChartSpec, type LayoutError, type LayoutResult } from './chart/types';
import { ConfigValidationError, DEFAULT_PIPELINE_CONFIG, type OracleSettings, type PipelineConfig } from './config';
import { ConsensusSelector, formatConsensusReport, loadEditorialBoard } from './consensus';
import {
  createEditorialGate,
  createVisualGate,
  getFailedChecks,
  type EditorialArtifact,
  type EditorialRules,
  type QualityGate,
  type VisualArtifact,
} from './gates';
import { PhaseTimer, type StageDurations } from './phase-timer';
import { ProgressTracker } from './progress-tracker';
import { retryOptionsFromPolicy, sleep, type RetryOptions } from './retry';
import type { ArticlePublisher, PublishReceipt } from './services/publishers';
import type { QuarantineStore } from './services/quarantine-store';
import type { SessionStore } from './services/session-store';
import {
  commitStage,
  createSession,
  createSessionId,
  sessionView,
  StageContractError,
  StageSlot,
  updateSession,
  type StageOutputs,
} from './session';
import {
  isInputError,
  isPipelineRunError,
  PipelineRunError,
  PublishError,
  systemClock,
  type Clock,
  type ConsensusResult,
  type EditorialReview,
  type GateResult,
  type OracleAgentDeps,
  type PipelineProgressCallback,
  type PipelineRunErrorCode,
  type PipelineSession,
  type PipelineStage,
  type QuarantineRef,
  type ResearchFindings,
  type SessionAnnotationKind,
  type SessionStage,
  type Topic,
  type VoterSpec,
} from './types';

// ============================================================================
// Types
// ============================================================================

export type ChartExportFn = (
  spec: ChartSpec,
  layout: LayoutResult,
  options: ExportChartOptions
) => Promise<ChartImageRef>;

export interface StageOrchestratorDeps {
  readonly oracle: GenerationOracle;
  readonly sessionStore: SessionStore;
  readonly quarantineStore: QuarantineStore;
  readonly publisher: ArticlePublisher;
  /** Defaults to DEFAULT_PIPELINE_CONFIG */
  readonly config?: PipelineConfig;
  /** Editorial board; defaults to the bundled board */
  readonly voters?: readonly VoterSpec[];
  readonly editorialRules?: EditorialRules;
  readonly exportChart?: ChartExportFn;
  readonly clock?: Clock;
  /** Wait between oracle retries */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly createSessionId?: (topic: Topic, createdAt: Date) => string;
  readonly logger?: StructuredLogger;
}

/**
 * Either candidate topics to vote on, or a brief to discover them from.
 */
export type PipelineInput = { readonly topics: readonly Topic[] } | { readonly brief: string };

export interface RunOptions {
  /** Checked between stages */
  readonly signal?: AbortSignal;
  readonly onProgress?: PipelineProgressCallback;
  /** Publication date (YYYY-MM-DD); defaults to the clock's date */
  readonly date?: string;
}

interface OutcomeSummary {
  /** Markdown board decision, null when no vote took place */
  readonly consensusReport: string | null;
  readonly durations: StageDurations;
}

export interface PublishedOutcome extends OutcomeSummary {
  readonly status: 'published';
  readonly session: PipelineSession;
  readonly receipt: PublishReceipt;
}

export interface QuarantinedOutcome extends OutcomeSummary {
  readonly status: 'quarantined';
  readonly session: PipelineSession;
  readonly quarantine: QuarantineRef;
  readonly failedGate: GateResult;
}

export type PipelineOutcome = PublishedOutcome | QuarantinedOutcome;

interface RunContext {
  readonly signal: AbortSignal | undefined;
  readonly tracker: ProgressTracker;
  readonly timer: PhaseTimer;
  readonly date: string;
  /** Stage in progress, for failure reports */
  currentStage: PipelineStage;
}

type TemperatureTask = keyof OracleSettings['temperatures'];

// ============================================================================
// Helpers
// ============================================================================

export const CHART_LAYOUT_GATE_NAME = 'chart-layout';

/**
 * Gate result standing in for a layout error, so it is quarantined like any
 * other gate failure.
 */
export function layoutErrorGateResult(error: LayoutError): GateResult {
  return {
    gateName: CHART_LAYOUT_GATE_NAME,
    checks: [
      {
        name: 'Chart-layout',
        passed: false,
        notApplicable: false,
        rationale: `${error.code}: ${error.message}`,
      },
    ],
    overallPassed: false,
  };
}

/**
 * Error code a fatal failure is reported under.
 */
export function runErrorCodeFor(error: unknown): PipelineRunErrorCode {
  if (error instanceof PublishError) return 'PUBLISH_FAILED';
  if (isOracleError(error)) return 'ORACLE_FATAL';
  if (isInputError(error) || error instanceof ConfigValidationError) return 'INPUT_INVALID';
  return 'STAGE_FAILED';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function required<T>(value: T | null, stage: SessionStage, field: keyof PipelineSession): T {
  if (value === null) {
    throw new StageContractError(stage, `${field} is missing from the session`);
  }
  return value;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class StageOrchestrator {
  private readonly config: PipelineConfig;
  private readonly clock: Clock;
  private readonly log: StructuredLogger;
  private readonly voters: readonly VoterSpec[];
  private readonly retry: RetryOptions;
  private readonly engine: ChartLayoutEngine;
  private readonly exportChart: ChartExportFn;
  private readonly editorialGate: QualityGate<EditorialArtifact>;
  private readonly visualGate: QualityGate<VisualArtifact>;

  constructor(private readonly deps: StageOrchestratorDeps) {
    this.config = deps.config ?? DEFAULT_PIPELINE_CONFIG;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createStructuredLogger('[Orchestrator]');
    this.voters = deps.voters ?? loadEditorialBoard();
    this.retry = { ...retryOptionsFromPolicy(this.config.retry), sleep: deps.sleep ?? sleep };
    this.engine = new ChartLayoutEngine(this.config.layout);
    this.exportChart = deps.exportChart ?? exportChartToDisk;
    this.editorialGate = createEditorialGate(deps.editorialRules);
    this.visualGate = createVisualGate();
  }

  /**
   * Runs the pipeline to a publish or quarantine outcome.
   *
   * @throws PipelineRunError for fatal failures and cancellation. From
   *   Research onward a fatal failure carries the quarantine it wrote.
   */
  async run(input: PipelineInput, options: RunOptions = {}): Promise<PipelineOutcome> {
    const run: RunContext = {
      signal: options.signal,
      tracker: new ProgressTracker(options.onProgress),
      timer: new PhaseTimer(this.clock),
      date: options.date ?? this.now().slice(0, 10),
      currentStage: 'discover',
    };

    const consensus = await this.chooseTopic(input, run);
    const createdAt = this.now();
    const session = createSession({
      id: (this.deps.createSessionId ?? createSessionId)(consensus.winningTopic, new Date(createdAt)),
      topic: consensus.winningTopic,
      consensus,
      createdAt,
    });

    this.log.structured('info', {
      event: 'session_created',
      sessionId: session.id,
      topic: session.topic.title,
    });
    await this.persist(session);

    return this.runSessionStages(session, run);
  }

  // ==========================================================================
  // Discover & Select
  // ==========================================================================

  /**
   * Nothing is persisted before a topic is chosen, so failures here surface
   * without a quarantine.
   */
  private async chooseTopic(input: PipelineInput, run: RunContext): Promise<ConsensusResult> {
    let lastCompleted: PipelineStage | null = null;

    try {
      let topics: readonly Topic[];
      if ('topics' in input) {
        topics = input.topics;
      } else {
        this.assertNotCancelled(run, lastCompleted);
        run.currentStage = 'discover';
        topics = await this.timed(
          run,
          'discover',
          () =>
            runTopicScout(input.brief, {
              ...this.agentDeps('discover'),
              topicCount: this.config.discovery.topicCount,
              currentDate: run.date,
            }),
          (found) => `Found ${found.length} topics`
        );
        lastCompleted = 'discover';
      }

      this.assertNotCancelled(run, lastCompleted);
      run.currentStage = 'select';
      const selector = new ConsensusSelector({
        ...this.agentDeps('vote'),
        settings: this.config.consensus,
        onVoteProgress: (settled, total) => run.tracker.reportVoteProgress(settled, total),
      });
      return await this.timed(
        run,
        'select',
        () => selector.select(topics, this.voters),
        (result) => `Board picked "${result.winningTopic.title}"`
      );
    } catch (error) {
      if (isPipelineRunError(error)) throw error;

      const code = runErrorCodeFor(error);
      this.log.structured('error', {
        event: 'run_failed',
        stage: run.currentStage,
        code,
        message: describeError(error),
      });
      throw new PipelineRunError(
        code,
        `${run.currentStage} failed: ${describeError(error)}`,
        lastCompleted,
        undefined,
        error
      );
    }
  }

  // ==========================================================================
  // Session Stages
  // ==========================================================================

  private async runSessionStages(initial: PipelineSession, run: RunContext): Promise<PipelineOutcome> {
    let session = initial;
    const chartStem = session.id;

    try {
      // ===== RESEARCH =====
      const researchFindings = await this.runStage<ResearchFindings>(
        session,
        run,
        'research',
        async (view, slot) => {
          slot.set(await runResearcher(view.topic, this.agentDeps('research')));
        },
        (findings) => `${findings.dataPoints.length} data points${findings.chartData ? ', chart data found' : ''}`
      );
      session = commitStage(session, 'research', { researchFindings }, this.now());
      await this.persist(session);

      // ===== WRITE =====
      const written = await this.runStage<StageOutputs['write']>(
        session,
        run,
        'write',
        async (view, slot) => {
          const findings = required(view.researchFindings, 'write', 'researchFindings');
          const chartSpec = findings.chartData ? buildChartSpec(findings.chartData) : null;
          const articleDraft = await runWriter(
            {
              topic: view.topic,
              findings,
              chart: chartSpec ? { alt: chartSpec.title, path: this.chartPublicPath(chartStem) } : null,
              date: run.date,
            },
            { ...this.agentDeps('write'), editorialRules: this.deps.editorialRules }
          );
          slot.set({ articleDraft, chartSpec });
        },
        ({ articleDraft }) => `Drafted "${articleDraft?.title ?? ''}"`
      );
      session = commitStage(session, 'write', written, this.now());
      await this.persist(session);

      // ===== CHART =====
      let charted: StageOutputs['chart'];
      try {
        charted = await this.runStage<StageOutputs['chart']>(
          session,
          run,
          'chart',
          async (view, slot) => {
            if (view.chartSpec === null) {
              slot.set({ chartLayout: null, chartImageRef: null });
              return;
            }
            const chartLayout = this.engine.layout(view.chartSpec);
            const chartImageRef = await this.exportChart(view.chartSpec, chartLayout, {
              slug: chartStem,
              chartsDir: this.config.paths.chartsDir,
              publicPathPrefix: this.config.paths.chartPublicPath,
              scale: this.config.export.scale,
              logger: this.deps.logger,
            });
            slot.set({ chartLayout, chartImageRef });
          },
          ({ chartImageRef }) => (chartImageRef ? `Exported ${chartImageRef.fileName}` : 'No chart for this article')
        );
      } catch (error) {
        if (!isLayoutError(error)) throw error;
        const gate = layoutErrorGateResult(error);
        session = updateSession(session, { gateResults: [...session.gateResults, gate] }, this.now());
        return await this.quarantineGateFailure(session, run, gate, 'layout-error');
      }
      session = commitStage(session, 'chart', charted, this.now());
      await this.persist(session);

      // ===== EDIT (gate) =====
      const editorialReview = await this.runStage<EditorialReview>(
        session,
        run,
        'edit',
        async (view, slot) => {
          const draft = required(view.articleDraft, 'edit', 'articleDraft');
          const findings = required(view.researchFindings, 'edit', 'researchFindings');
          slot.set(
            await runEditor(
              { draft, findings, chartFileName: view.chartImageRef?.fileName ?? null },
              this.editorDeps()
            )
          );
        },
        (review) => `${review.fixesApplied.length} fixes applied`
      );
      const editorialGate = this.editorialGate.evaluate({
        markdown: editorialReview.editedMarkdown,
        verdicts: editorialReview.verdicts,
        chartFileName: session.chartImageRef?.fileName ?? null,
      });
      session = updateSession(
        session,
        { editorialReview, gateResults: [...session.gateResults, editorialGate] },
        this.now()
      );
      this.logGate(session, editorialGate);
      if (!editorialGate.overallPassed) {
        return await this.quarantineGateFailure(session, run, editorialGate, 'gate-failure');
      }
      session = updateSession(session, { lastCompletedStage: 'edit' }, this.now());
      await this.persist(session);

      // ===== VISUAL QA (gate) =====
      const visualGate = await this.runStage<GateResult>(
        session,
        run,
        'visual-qa',
        async (view, slot) => {
          slot.set(this.visualGate.evaluate(this.visualArtifact(view)));
        },
        (gate) => (gate.overallPassed ? 'Chart passed' : `Chart failed: ${getFailedChecks(gate).length} checks`)
      );
      session = updateSession(session, { gateResults: [...session.gateResults, visualGate] }, this.now());
      this.logGate(session, visualGate);
      if (!visualGate.overallPassed) {
        return await this.quarantineGateFailure(session, run, visualGate, 'gate-failure');
      }
      session = updateSession(session, { lastCompletedStage: 'visual-qa' }, this.now());
      await this.persist(session);

      // ===== PUBLISH =====
      const receipt = await this.runStage<PublishReceipt>(
        session,
        run,
        'publish',
        async (view, slot) => {
          const review = required(view.editorialReview, 'publish', 'editorialReview');
          const draft = required(view.articleDraft, 'publish', 'articleDraft');
          slot.set(
            await this.deps.publisher.publish({
              articleMarkdown: review.editedMarkdown,
              chartImagePath: view.chartImageRef?.imagePath ?? null,
              metadata: {
                sessionId: view.id,
                title: draft.title,
                slug: draft.slug,
                date: run.date,
                topicTitle: view.topic.title,
                boardScore: view.consensus?.weightedScore ?? null,
              },
            })
          );
        },
        (published) => `Published to ${published.location}`
      );
      session = updateSession(session, { status: 'published', lastCompletedStage: 'publish' }, this.now());
      await this.persist(session);

      this.log.structured('info', {
        event: 'session_published',
        sessionId: session.id,
        location: receipt.location,
        totalMs: run.timer.getTotalDuration(),
      });
      return { status: 'published', session, receipt, ...this.summarize(session, run) };
    } catch (error) {
      if (isPipelineRunError(error)) throw error;
      throw await this.quarantineFatal(session, run, error);
    }
  }

  /**
   * Runs one session stage against a frozen view and returns what it wrote
   * to its slot.
   */
  private async runStage<T>(
    session: PipelineSession,
    run: RunContext,
    stage: SessionStage,
    work: (view: PipelineSession, slot: StageSlot<T>) => Promise<void>,
    describe: (output: T) => string
  ): Promise<T> {
    this.assertNotCancelled(run, session.lastCompletedStage);
    run.currentStage = stage;
    const slot = new StageSlot<T>(stage);
    return this.timed(
      run,
      stage,
      async () => {
        await work(sessionView(session), slot);
        return slot.take();
      },
      describe
    );
  }

  private async timed<T>(
    run: RunContext,
    stage: PipelineStage,
    work: () => Promise<T>,
    describe: (output: T) => string
  ): Promise<T> {
    run.tracker.startStage(stage);
    run.timer.start(stage);
    try {
      const output = await work();
      run.tracker.completeStage(stage, describe(output));
      return output;
    } finally {
      const durationMs = run.timer.end(stage);
      this.log.structured('debug', { event: 'stage_finished', stage, durationMs });
    }
  }

  // ==========================================================================
  // Failure Paths
  // ==========================================================================

  private async quarantineGateFailure(
    session: PipelineSession,
    run: RunContext,
    gate: GateResult,
    kind: SessionAnnotationKind
  ): Promise<QuarantinedOutcome> {
    const stage = run.currentStage;
    const failedChecks = getFailedChecks(gate).map((check) => check.name);
    const message = `Gate ${gate.gateName} failed: ${failedChecks.join(', ')}`;
    const at = this.now();
    const quarantined = updateSession(
      session,
      { status: 'quarantined', annotations: [...session.annotations, { kind, stage, message, at }] },
      at
    );

    let quarantine: QuarantineRef;
    try {
      await this.deps.sessionStore.save(quarantined);
      quarantine = await this.deps.quarantineStore.write({
        sessionSnapshot: quarantined,
        failureReport: {
          kind,
          stage,
          lastCompletedStage: quarantined.lastCompletedStage,
          message,
          failedGate: gate,
          quarantinedAt: at,
        },
      });
    } catch (error) {
      throw new PipelineRunError(
        'PERSISTENCE_FAILED',
        `Could not quarantine session ${session.id}: ${describeError(error)}`,
        quarantined.lastCompletedStage,
        undefined,
        error
      );
    }

    run.tracker.report(stage, 100, `Quarantined: ${message}`);
    this.log.structured('warn', {
      event: 'session_quarantined',
      sessionId: session.id,
      stage,
      gate: gate.gateName,
      failedChecks,
      recordPath: quarantine.recordPath,
    });
    return { status: 'quarantined', session: quarantined, quarantine, failedGate: gate, ...this.summarize(quarantined, run) };
  }

  /**
   * Quarantines the partial session and builds the error the run rejects
   * with. If the quarantine itself cannot be written the error carries no
   * reference.
   */
  private async quarantineFatal(session: PipelineSession, run: RunContext, error: unknown): Promise<PipelineRunError> {
    const stage = run.currentStage;
    const code = runErrorCodeFor(error);
    const message = describeError(error);
    const at = this.now();
    const failed = updateSession(
      session,
      {
        status: 'failed',
        annotations: [...session.annotations, { kind: 'fatal-error', stage, message, at }],
      },
      at
    );

    this.log.structured('error', { event: 'run_failed', sessionId: session.id, stage, code, message });

    let quarantine: QuarantineRef | undefined;
    try {
      await this.deps.sessionStore.save(failed);
      quarantine = await this.deps.quarantineStore.write({
        sessionSnapshot: failed,
        failureReport: {
          kind: 'fatal-error',
          stage,
          lastCompletedStage: failed.lastCompletedStage,
          message,
          failedGate: null,
          quarantinedAt: at,
        },
      });
    } catch (writeError) {
      this.log.error(`Could not quarantine session ${session.id}: ${describeError(writeError)}`);
    }

    return new PipelineRunError(code, `${stage} failed: ${message}`, failed.lastCompletedStage, quarantine, error);
  }

  private assertNotCancelled(run: RunContext, lastCompleted: PipelineStage | null): void {
    if (run.signal?.aborted) {
      throw new PipelineRunError('CANCELLED', 'Pipeline run was cancelled', lastCompleted);
    }
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  private async persist(session: PipelineSession): Promise<void> {
    try {
      await this.deps.sessionStore.save(session);
    } catch (error) {
      throw new PipelineRunError(
        'PERSISTENCE_FAILED',
        `Could not save session ${session.id}: ${describeError(error)}`,
        session.lastCompletedStage,
        undefined,
        error
      );
    }
  }

  private agentDeps(task: TemperatureTask): OracleAgentDeps {
    return {
      oracle: this.deps.oracle,
      retry: this.retry,
      temperature: this.config.oracle.temperatures[task],
      maxOutputTokens: this.config.oracle.maxOutputTokens,
      logger: this.deps.logger,
    };
  }

  private editorDeps(): EditorDeps {
    return {
      oracle: this.deps.oracle,
      retry: this.retry,
      maxOutputTokens: this.config.oracle.maxOutputTokens,
      logger: this.deps.logger,
    };
  }

  private visualArtifact(view: PipelineSession): VisualArtifact {
    const { chartSpec, chartLayout, chartImageRef } = view;
    return {
      chart:
        chartSpec && chartLayout && chartImageRef
          ? { spec: chartSpec, layout: chartLayout, image: chartImageRef }
          : null,
      layoutSettings: this.config.layout,
      exportSettings: this.config.export,
    };
  }

  private chartPublicPath(stem: string): string {
    return `${this.config.paths.chartPublicPath.replace(/\/$/, '')}/${stem}.png`;
  }

  private logGate(session: PipelineSession, gate: GateResult): void {
    this.log.structured(gate.overallPassed ? 'info' : 'warn', {
      event: 'gate_evaluated',
      sessionId: session.id,
      gate: gate.gateName,
      passed: gate.overallPassed,
      checks: gate.checks.map((check) => `${check.name}:${check.notApplicable ? 'n/a' : check.passed ? 'pass' : 'fail'}`),
    });
  }

  private summarize(session: PipelineSession, run: RunContext): OutcomeSummary {
    return {
      consensusReport: session.consensus ? formatConsensusReport(session.consensus, this.voters) : null,
      durations: run.timer.getDurations(),
    };
  }

  private now(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
