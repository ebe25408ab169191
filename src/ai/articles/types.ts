/**
 * Article Pipeline Types
 *
 * Shared types for the pipeline stages, the session threaded through them
 * and the errors the pipeline surfaces to callers.
 */

import type { Logger } from '../../utils/logger';
import type { GenerationOracle } from '../oracle/types';
import type { ChartImageRef } from './chart/chart-exporter';
import type { ChartSpec, ChartType, LayoutResult } from './chart/types';
import type { RetryOptions } from './retry';

// ============================================================================
// Stages
// ============================================================================

/**
 * Pipeline stages in execution order.
 */
export const PIPELINE_STAGES = [
  'discover',
  'select',
  'research',
  'write',
  'chart',
  'edit',
  'visual-qa',
  'publish',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/**
 * Stages that run after the session exists. Failures here quarantine the
 * session instead of surfacing bare.
 */
export type SessionStage = Exclude<PipelineStage, 'discover' | 'select'>;

export type SessionStatus = 'running' | 'published' | 'quarantined' | 'failed';

/**
 * Progress callback for pipeline runs.
 *
 * @param stage - Current stage
 * @param progress - Progress percentage within the stage (0-100)
 * @param message - Optional status message
 */
export type PipelineProgressCallback = (stage: PipelineStage, progress: number, message?: string) => void;

// ============================================================================
// Topics & Consensus
// ============================================================================

export interface Topic {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  /** Relevance assigned at discovery; breaks ties between equal weighted scores */
  readonly relevanceScore: number;
}

export interface VoterSpec {
  readonly id: string;
  readonly name: string;
  /** Defaults to 1 */
  readonly weight?: number;
  /** Perspective the voter scores from */
  readonly persona: string;
}

export interface Vote {
  readonly voterId: string;
  readonly topicId: string;
  /** Integer in [0, 10] */
  readonly score: number;
  readonly rationale: string;
}

export interface TopicRanking {
  readonly rank: number;
  readonly topic: Topic;
  readonly weightedScore: number;
}

export interface ConsensusResult {
  readonly winningTopic: Topic;
  readonly weightedScore: number;
  /** Each voter's score for the winning topic, keyed by voter id */
  readonly perVoterScores: Readonly<Record<string, number>>;
  /** Every topic, best first */
  readonly rankings: readonly TopicRanking[];
  /** Every voter's own top pick is the winner */
  readonly unanimous: boolean;
  /** Votes for the winner below the dissent threshold */
  readonly dissentingVotes: readonly Vote[];
  readonly voterCount: number;
  readonly votes: readonly Vote[];
}

// ============================================================================
// Research
// ============================================================================

export interface DataPoint {
  readonly stat: string;
  readonly source: string;
  readonly year: number | null;
  readonly url: string | null;
  readonly verified: boolean;
}

export interface ResearchChartSeries {
  readonly name: string;
  readonly values: readonly number[];
}

/**
 * Chart data proposed by research. The Write stage turns it into a ChartSpec.
 */
export interface ResearchChartData {
  readonly title: string;
  readonly subtitle: string;
  readonly type: ChartType;
  readonly yLabel: string | null;
  readonly categories: readonly string[];
  readonly series: readonly ResearchChartSeries[];
  readonly sourceLine: string;
}

export interface ResearchFindings {
  readonly headlineStat: string;
  readonly dataPoints: readonly DataPoint[];
  readonly trendNarrative: string;
  readonly contrarianAngle: string;
  readonly unverifiedClaims: readonly string[];
  readonly chartData: ResearchChartData | null;
}

// ============================================================================
// Articles
// ============================================================================

export interface ArticleDraft {
  readonly title: string;
  readonly slug: string;
  /** Full article including front matter */
  readonly markdown: string;
  /** True when the first draft failed the self-check and was written again */
  readonly regenerated: boolean;
  /** Self-check findings on the returned draft, critical ones first */
  readonly selfCheckIssues: readonly string[];
}

export type EditorialGateName = 'opening' | 'evidence' | 'voice' | 'structure' | 'chart';
export type EditorVerdict = 'pass' | 'fail' | 'n/a';

export interface EditorGateVerdict {
  readonly verdict: EditorVerdict;
  readonly rationale: string;
}

export interface EditorialReview {
  /** Article after the editor's fixes; this is what gets published */
  readonly editedMarkdown: string;
  readonly verdicts: Readonly<Record<EditorialGateName, EditorGateVerdict>>;
  readonly fixesApplied: readonly string[];
}

// ============================================================================
// Gates
// ============================================================================

export interface CheckResult {
  readonly name: string;
  readonly passed: boolean;
  readonly notApplicable: boolean;
  readonly rationale: string;
}

export interface GateResult {
  readonly gateName: string;
  readonly checks: readonly CheckResult[];
  readonly overallPassed: boolean;
}

// ============================================================================
// Session
// ============================================================================

export type SessionAnnotationKind = 'fatal-error' | 'gate-failure' | 'layout-error';

export interface SessionAnnotation {
  readonly kind: SessionAnnotationKind;
  readonly stage: PipelineStage;
  readonly message: string;
  readonly at: string;
}

/**
 * The artifact threaded through the stages. Each stage contributes one
 * field; the orchestrator is the only writer.
 */
export interface PipelineSession {
  readonly id: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly status: SessionStatus;
  readonly lastCompletedStage: PipelineStage | null;
  readonly topic: Topic;
  readonly consensus: ConsensusResult | null;
  readonly researchFindings: ResearchFindings | null;
  readonly chartSpec: ChartSpec | null;
  readonly articleDraft: ArticleDraft | null;
  readonly chartLayout: LayoutResult | null;
  readonly chartImageRef: ChartImageRef | null;
  readonly editorialReview: EditorialReview | null;
  readonly gateResults: readonly GateResult[];
  readonly annotations: readonly SessionAnnotation[];
}

// ============================================================================
// Agent Dependencies
// ============================================================================

/**
 * Dependencies shared by every oracle-backed agent.
 */
export interface OracleAgentDeps {
  readonly oracle: GenerationOracle;
  /** Retry behaviour for the agent's oracle call(s) */
  readonly retry?: RetryOptions;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly logger?: Logger;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for pipeline runs that end without a publish or quarantine outcome.
 */
export type PipelineRunErrorCode =
  | 'ORACLE_FATAL'
  | 'PUBLISH_FAILED'
  | 'INPUT_INVALID'
  | 'CANCELLED'
  | 'PERSISTENCE_FAILED'
  | 'STAGE_FAILED';

/**
 * Where a quarantined session was written.
 */
export interface QuarantineRef {
  readonly sessionId: string;
  readonly recordPath: string;
  readonly reportPath: string;
}

/**
 * Fatal outcome of a pipeline run.
 *
 * @example
 * try {
 *   await orchestrator.run({ topics });
 * } catch (error) {
 *   if (isPipelineRunError(error) && error.quarantine) {
 *     console.log(`Partial session kept at ${error.quarantine.recordPath}`);
 *   }
 * }
 */
export class PipelineRunError extends Error {
  readonly name = 'PipelineRunError';

  constructor(
    readonly code: PipelineRunErrorCode,
    message: string,
    /** Last stage that finished successfully, null if none did */
    readonly lastCompletedStage: PipelineStage | null,
    readonly quarantine?: QuarantineRef,
    readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineRunError);
    }
  }
}

export function isPipelineRunError(error: unknown): error is PipelineRunError {
  return error instanceof PipelineRunError;
}

/**
 * Input errors. These fail fast and are never retried.
 */
export class EmptyTopicSetError extends Error {
  readonly name = 'EmptyTopicSetError';

  constructor() {
    super('Cannot select a topic from an empty topic set');
  }
}

export class NoQuorumError extends Error {
  readonly name = 'NoQuorumError';

  constructor(
    readonly qualifiedVoters: number,
    readonly requiredVoters: number,
    readonly totalVoters: number
  ) {
    super(
      totalVoters === 0
        ? 'No voters configured'
        : `Only ${qualifiedVoters} of ${totalVoters} voters returned valid votes (${requiredVoters} required)`
    );
  }
}

export class VoteOutOfRangeError extends Error {
  readonly name = 'VoteOutOfRangeError';

  constructor(readonly vote: Vote) {
    super(`Vote from ${vote.voterId} for ${vote.topicId} is ${vote.score}; scores must be integers from 0 to 10`);
  }
}

/**
 * A vote for a topic outside the set, or a second vote for the same pair.
 */
export class InvalidVoteError extends Error {
  readonly name = 'InvalidVoteError';

  constructor(
    readonly vote: Vote,
    readonly reason: 'unknown-topic' | 'duplicate'
  ) {
    super(
      reason === 'duplicate'
        ? `Voter ${vote.voterId} voted more than once for ${vote.topicId}`
        : `Voter ${vote.voterId} voted for unknown topic ${vote.topicId}`
    );
  }
}

/**
 * Topics or voters that cannot be voted on: repeated ids, or a relevance
 * score that cannot break ties.
 */
export class InvalidBoardInputError extends Error {
  readonly name = 'InvalidBoardInputError';
}

export type InputError =
  | EmptyTopicSetError
  | NoQuorumError
  | VoteOutOfRangeError
  | InvalidVoteError
  | InvalidBoardInputError;

export function isInputError(error: unknown): error is InputError {
  return (
    error instanceof EmptyTopicSetError ||
    error instanceof InvalidBoardInputError ||
    error instanceof NoQuorumError ||
    error instanceof VoteOutOfRangeError ||
    error instanceof InvalidVoteError
  );
}

/**
 * A publisher could not deliver the article.
 */
export class PublishError extends Error {
  readonly name = 'PublishError';

  constructor(
    message: string,
    readonly cause?: unknown
  ) {
    super(message);
  }
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-related operations.
 * Enables deterministic testing by allowing time to be mocked.
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for testing.
 *
 * @example
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}
