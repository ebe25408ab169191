/**
 * Progress Tracker
 *
 * Centralized utility for reporting pipeline progress. Keeps the percentage
 * arithmetic in one place so every stage reports the same way.
 */

import { PROGRESS_CONFIG } from './config';
import type { PipelineProgressCallback, PipelineStage } from './types';

// ============================================================================
// Types
// ============================================================================

interface ProgressTrackerConfig {
  /** Start percentage for vote collection within Select (default: 10) */
  readonly voteProgressStart: number;
  /** End percentage for vote collection within Select (default: 90) */
  readonly voteProgressEnd: number;
}

// ============================================================================
// ProgressTracker Class
// ============================================================================

/**
 * Tracks and reports progress for a pipeline run.
 *
 * @example
 * const tracker = new ProgressTracker(onProgress);
 *
 * tracker.startStage('select');
 * tracker.reportVoteProgress(6, 12);
 * tracker.completeStage('select', 'Board picked "Flaky tests cost more"');
 */
export class ProgressTracker {
  private readonly config: ProgressTrackerConfig;

  constructor(
    private readonly onProgress?: PipelineProgressCallback,
    config?: Partial<ProgressTrackerConfig>
  ) {
    this.config = {
      voteProgressStart: config?.voteProgressStart ?? PROGRESS_CONFIG.VOTE_PROGRESS_START,
      voteProgressEnd: config?.voteProgressEnd ?? PROGRESS_CONFIG.VOTE_PROGRESS_END,
    };
  }

  /**
   * Reports the start of a stage (0% progress).
   */
  startStage(stage: PipelineStage, message?: string): void {
    this.onProgress?.(stage, 0, message ?? this.getDefaultStartMessage(stage));
  }

  /**
   * Reports the completion of a stage (100% progress).
   */
  completeStage(stage: PipelineStage, message: string): void {
    this.onProgress?.(stage, 100, message);
  }

  /**
   * Reports vote collection during Select, scaled between
   * voteProgressStart and voteProgressEnd.
   */
  reportVoteProgress(settled: number, total: number): void {
    const { voteProgressStart, voteProgressEnd } = this.config;
    const fraction = total > 0 ? settled / total : 1;
    const progress = Math.round(voteProgressStart + fraction * (voteProgressEnd - voteProgressStart));
    this.onProgress?.('select', progress, `Collected ${settled}/${total} votes`);
  }

  report(stage: PipelineStage, progress: number, message?: string): void {
    this.onProgress?.(stage, progress, message);
  }

  get hasCallback(): boolean {
    return this.onProgress !== undefined;
  }

  private getDefaultStartMessage(stage: PipelineStage): string {
    switch (stage) {
      case 'discover':
        return 'Discovering candidate topics';
      case 'select':
        return 'Collecting editorial board votes';
      case 'research':
        return 'Researching topic';
      case 'write':
        return 'Writing article draft';
      case 'chart':
        return 'Laying out chart';
      case 'edit':
        return 'Editing article';
      case 'visual-qa':
        return 'Checking chart';
      case 'publish':
        return 'Publishing article';
    }
  }
}

/**
 * Tracker for runs without a progress callback. All methods are safe to call.
 */
export function createNoOpProgressTracker(): ProgressTracker {
  return new ProgressTracker(undefined);
}
