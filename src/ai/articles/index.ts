/**
 * Article Pipeline Module
 *
 * Quality-gated article pipeline: an editorial board votes on a topic, the
 * topic is researched, written, charted and edited, and the result is either
 * published or quarantined.
 *
 * @example
 * import { StageOrchestrator, loadPipelineConfigFromEnv } from './ai/articles';
 *
 * const outcome = await new StageOrchestrator({ oracle, config, sessionStore, quarantineStore, publisher })
 *   .run({ brief: 'Testing practice in 2026' });
 */

// Orchestrator
export {
  CHART_LAYOUT_GATE_NAME,
  layoutErrorGateResult,
  runErrorCodeFor,
  StageOrchestrator,
  type ChartExportFn,
  type PipelineInput,
  type PipelineOutcome,
  type PublishedOutcome,
  type QuarantinedOutcome,
  type RunOptions,
  type StageOrchestratorDeps,
} from './orchestrator';

// Types
export * from './types';

// Configuration
export {
  ConfigValidationError,
  createPipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfigFromEnv,
  pathsUnder,
  validatePipelineConfig,
  type PipelineConfig,
  type PipelineConfigOverrides,
} from './config';

// Consensus
export * from './consensus';

// Agents
export * from './agents';

// Gates
export * from './gates';

// Chart layout
export { ChartLayoutEngine, layoutChart } from './chart/layout-engine';
export { exportChart, type ChartImageRef, type ExportChartOptions } from './chart/chart-exporter';
export { renderChartSvg } from './chart/svg-renderer';
export {
  InvalidChartSpecError,
  isLayoutError,
  LabelPlacementExhaustedError,
  LayoutError,
  TitleOverflowError,
  ZoneViolationError,
  type ChartSpec,
  type LayoutResult,
} from './chart/types';

// Session & persistence
export { createSession, createSessionId, sessionView, StageContractError, StageSlot } from './session';
export { CorruptSessionError, FileSessionStore, type SessionStore } from './services/session-store';
export {
  describeQuarantineRef,
  FileQuarantineStore,
  formatQuarantineReport,
  type FailureReport,
  type QuarantineRecord,
  type QuarantineStore,
} from './services/quarantine-store';
export {
  CmsPublisher,
  FilePublisher,
  type ArticlePublisher,
  type PublishReceipt,
  type PublishRequest,
} from './services/publishers';

// Utilities
export { PhaseTimer, type StageDurations } from './phase-timer';
export { ProgressTracker } from './progress-tracker';
export { withRetry, type RetryOptions } from './retry';
