/**
 * Phase Timer
 *
 * Tracks how long each pipeline stage took. Stages that never ran report 0.
 */

import type { Clock, PipelineStage } from './types';
import { PIPELINE_STAGES, systemClock } from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Milliseconds spent in each stage.
 */
export type StageDurations = Readonly<Record<PipelineStage, number>>;

// ============================================================================
// PhaseTimer Class
// ============================================================================

/**
 * Tracks timing for pipeline stages.
 *
 * @example
 * const timer = new PhaseTimer(clock);
 *
 * timer.start('research');
 * // ... run research ...
 * timer.end('research');
 *
 * timer.getDurations();
 * // { discover: 0, select: 0, research: 1500, write: 0, ... }
 */
export class PhaseTimer {
  private readonly clock: Clock;
  private readonly startTimes = new Map<PipelineStage, number>();
  private readonly durations = new Map<PipelineStage, number>();

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Starts timing a stage. Starting a running stage restarts its timer.
   */
  start(stage: PipelineStage): void {
    this.startTimes.set(stage, this.clock.now());
  }

  /**
   * Ends timing for a stage and records the duration.
   * A stage that was never started records 0.
   *
   * @returns The duration in milliseconds
   */
  end(stage: PipelineStage): number {
    const startTime = this.startTimes.get(stage);
    // Use !== undefined instead of truthy check because startTime of 0 is valid
    const duration = startTime !== undefined ? this.clock.now() - startTime : 0;
    this.durations.set(stage, duration);
    this.startTimes.delete(stage);
    return duration;
  }

  getDuration(stage: PipelineStage): number {
    return this.durations.get(stage) ?? 0;
  }

  /**
   * Durations for every stage, in pipeline order.
   */
  getDurations(): StageDurations {
    const durations: Record<PipelineStage, number> = {
      discover: 0,
      select: 0,
      research: 0,
      write: 0,
      chart: 0,
      edit: 0,
      'visual-qa': 0,
      publish: 0,
    };
    for (const stage of PIPELINE_STAGES) {
      durations[stage] = this.getDuration(stage);
    }
    return durations;
  }

  /**
   * Total duration across all recorded stages, in milliseconds.
   */
  getTotalDuration(): number {
    let total = 0;
    for (const duration of this.durations.values()) {
      total += duration;
    }
    return total;
  }
}

export function createPhaseTimer(clock?: Clock): PhaseTimer {
  return new PhaseTimer(clock);
}
