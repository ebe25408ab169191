/**
 * Pipeline Session
 *
 * Helpers for the session the orchestrator threads through the stages.
 * Stages only ever see a frozen copy and hand their output back through a
 * write-once slot; committing that output is the orchestrator's job.
 */

import { randomUUID } from 'node:crypto';

import { toFileSlug } from '../../utils/slug';
import type { ConsensusResult, PipelineSession, PipelineStage, Topic } from './types';

// ============================================================================
// Errors
// ============================================================================

/**
 * A stage broke its contract with the orchestrator: it wrote its slot twice
 * or finished without writing it.
 */
export class StageContractError extends Error {
  readonly name = 'StageContractError';

  constructor(
    readonly stage: PipelineStage,
    message: string
  ) {
    super(`Stage ${stage}: ${message}`);
  }
}

// ============================================================================
// Stage Slot
// ============================================================================

/**
 * The one place a stage may put its output.
 *
 * @example
 * const slot = new StageSlot<ResearchFindings>('research');
 * await researchStage(view, slot);
 * session = commitStage(session, 'research', { researchFindings: slot.take() }, now);
 */
export class StageSlot<T> {
  private value: T | undefined;
  private filled = false;

  constructor(readonly stage: PipelineStage) {}

  set(value: T): void {
    if (this.filled) {
      throw new StageContractError(this.stage, 'output was already written');
    }
    this.value = value;
    this.filled = true;
  }

  take(): T {
    if (!this.filled || this.value === undefined) {
      throw new StageContractError(this.stage, 'finished without writing its output');
    }
    return this.value;
  }
}

// ============================================================================
// Freezing
// ============================================================================

/**
 * Freezes a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  Object.freeze(value);
  return value;
}

/**
 * Frozen copy of the session for a stage to read.
 */
export function sessionView(session: PipelineSession): PipelineSession {
  return deepFreeze(structuredClone(session));
}

// ============================================================================
// Session Lifecycle
// ============================================================================

/**
 * Session ids sort by creation time and carry the topic for humans.
 * e.g. 20261019T091500Z-flaky-tests-cost-more-3f9a1c2e
 */
export function createSessionId(topic: Topic, createdAt: Date): string {
  const stamp = createdAt.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
  return `${stamp}-${toFileSlug(topic.title, 40, 'session')}-${randomUUID().slice(0, 8)}`;
}

export interface NewSessionInput {
  readonly id: string;
  readonly topic: Topic;
  readonly consensus: ConsensusResult | null;
  readonly createdAt: string;
}

export function createSession(input: NewSessionInput): PipelineSession {
  const session: PipelineSession = {
    id: input.id,
    createdAt: input.createdAt,
    updatedAt: input.createdAt,
    status: 'running',
    lastCompletedStage: input.consensus ? 'select' : null,
    topic: input.topic,
    consensus: input.consensus,
    researchFindings: null,
    chartSpec: null,
    articleDraft: null,
    chartLayout: null,
    chartImageRef: null,
    editorialReview: null,
    gateResults: [],
    annotations: [],
  };
  return deepFreeze(session);
}

/**
 * Fields each stage owns. A stage's commit may only touch these.
 */
export type StageOutputs = {
  readonly research: Pick<PipelineSession, 'researchFindings'>;
  readonly write: Pick<PipelineSession, 'articleDraft' | 'chartSpec'>;
  readonly chart: Pick<PipelineSession, 'chartLayout' | 'chartImageRef'>;
};

export type CommittableStage = keyof StageOutputs;

/**
 * New session with one stage's output applied.
 */
export function commitStage<S extends CommittableStage>(
  session: PipelineSession,
  stage: S,
  output: StageOutputs[S],
  at: string
): PipelineSession {
  return deepFreeze({ ...session, ...output, lastCompletedStage: stage, updatedAt: at });
}

/**
 * New session with extra fields, for gate results and terminal states.
 */
export function updateSession(
  session: PipelineSession,
  patch: Partial<Omit<PipelineSession, 'id' | 'createdAt' | 'topic' | 'consensus'>>,
  at: string
): PipelineSession {
  return deepFreeze({ ...session, ...patch, updatedAt: at });
}
