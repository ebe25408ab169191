/**
 * Article Pipeline Configuration
 *
 * Centralized configuration for the pipeline stages, consensus board, chart
 * layout and persistence. All magic numbers and tuning parameters live here.
 *
 * The `*_CONFIG` constants are the defaults. Callers receive an explicit
 * {@link PipelineConfig} built by {@link createPipelineConfig} or
 * {@link loadPipelineConfigFromEnv}; nothing downstream reads the
 * environment.
 */

import { join } from 'node:path';
import { z } from 'zod';

import type { ZoneName } from './chart/types';

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time for the defaults, and by createPipelineConfig
 * for caller overrides.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Pipeline config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates that a MIN value is less than or equal to MAX value.
 */
function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(`${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`);
  }
}

/**
 * Validates that a value is positive.
 */
function validatePositive(value: number, name: string): void {
  if (!(value > 0)) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

/**
 * Validates that a value is a positive integer.
 */
function validatePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * Validates that a value is non-negative.
 */
function validateNonNegative(value: number, name: string): void {
  if (!(value >= 0)) {
    throw new ConfigValidationError(`${name} cannot be negative (got ${value})`);
  }
}

/**
 * Validates that a value lies in [0, 1].
 */
function validateFraction(value: number, name: string): void {
  if (!(value >= 0 && value <= 1)) {
    throw new ConfigValidationError(`${name} must be between 0 and 1 (got ${value})`);
  }
}

/**
 * Validates temperature is in valid range (0-2).
 */
function validateTemperature(value: number, name: string): void {
  if (!(value >= 0 && value <= 2)) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Retry policy for oracle-backed stages.
 * Delay before retry n (0-based) is min(BASE_DELAY_MS * 2^n, MAX_DELAY_MS).
 */
export const RETRY_CONFIG = {
  /** Total attempts per oracle call, including the first */
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 1000,
  MAX_DELAY_MS: 10000,
  BACKOFF_MULTIPLIER: 2,
  /** Random spread applied to each delay (0.25 = ±25%). 0 keeps delays exact. */
  JITTER_RATIO: 0,
} as const;

// ============================================================================
// Oracle Configuration
// ============================================================================

export const ORACLE_CONFIG = {
  /** Per-call timeout; a timed-out call is a transient failure */
  TIMEOUT_MS: 90000,
  MAX_OUTPUT_TOKENS: 4000,
  DISCOVER_TEMPERATURE: 0.7,
  VOTE_TEMPERATURE: 0.3,
  RESEARCH_TEMPERATURE: 0.2,
  WRITE_TEMPERATURE: 0.7,
  /** Gate evaluations must be repeatable, so the editor is not configurable */
  EDIT_TEMPERATURE: 0,
} as const;

// ============================================================================
// Discovery & Consensus Configuration
// ============================================================================

export const DISCOVERY_CONFIG = {
  /** Topics requested from the scout */
  TOPIC_COUNT: 5,
} as const;

export const CONSENSUS_CONFIG = {
  MIN_SCORE: 0,
  MAX_SCORE: 10,
  /** Fraction of voters that must return every vote (1 = all voters) */
  MIN_QUORUM_FRACTION: 1,
  /** Oracle calls issued in parallel while collecting votes */
  MAX_CONCURRENT_VOTES: 6,
  /** A vote below this for the winning topic is reported as dissent */
  DISSENT_THRESHOLD: 5,
  /** Weighted scores closer than this are a tie */
  TIE_EPSILON: 1e-9,
} as const;

// ============================================================================
// Chart Layout Configuration
// ============================================================================

/**
 * Vertical zones as fractions of canvas height measured from the bottom.
 * Ranges are half-open [yMin, yMax).
 */
export const LAYOUT_ZONES = [
  { name: 'RedBar', yMin: 0.96, yMax: 1.0 },
  { name: 'Title', yMin: 0.85, yMax: 0.94 },
  { name: 'PlotArea', yMin: 0.15, yMax: 0.78 },
  { name: 'XAxis', yMin: 0.08, yMax: 0.14 },
  { name: 'Source', yMin: 0.01, yMax: 0.06 },
] as const satisfies readonly { name: ZoneName; yMin: number; yMax: number }[];

export const LAYOUT_CONFIG = {
  CANVAS_WIDTH: 800,
  CANVAS_HEIGHT: 550,
  /** Plot frame horizontal extent as fractions of canvas width */
  PLOT_LEFT_FRACTION: 0.08,
  PLOT_RIGHT_FRACTION: 0.88,
  /** Left edge of title, subtitle and source text */
  TEXT_INSET_PX: 24,
  /** Space kept clear at the right canvas edge */
  RIGHT_PADDING_PX: 8,
  /** Plotted data stays this far inside the PlotArea band */
  PLOT_INSET_TOP_PX: 14,
  PLOT_INSET_BOTTOM_PX: 8,
  /** Horizontal padding between the frame and the first/last category */
  PLOT_INSET_X_PX: 10,
  Y_TICK_TARGET_COUNT: 5,
  Y_TICK_LABEL_GAP_PX: 6,
  /** Share of a category band taken by a bar group */
  BAR_GROUP_FRACTION: 0.7,
  MARKER_SIZE_PX: 6,
  X_TICK_LENGTH_PX: 4,
  X_LABEL_MIN_GAP_PX: 4,
} as const;

export const TYPOGRAPHY_CONFIG = {
  TITLE_FONT_SIZE: 16,
  TITLE_MIN_FONT_SIZE: 12,
  SUBTITLE_FONT_SIZE: 11,
  SUBTITLE_MIN_FONT_SIZE: 9,
  LABEL_FONT_SIZE: 10,
  LABEL_MIN_FONT_SIZE: 9,
  AXIS_FONT_SIZE: 9,
  SOURCE_FONT_SIZE: 8,
  /** Average glyph advance as a fraction of font size */
  CHAR_WIDTH_RATIO: 0.55,
  BOLD_CHAR_WIDTH_RATIO: 0.6,
  LINE_HEIGHT: 1.2,
} as const;

/**
 * Inline label placement. Step sizes are in pixels.
 */
export const LABEL_PLACEMENT_CONFIG = {
  /** Distance between anchor point and label box */
  GAP_PX: 6,
  NUDGE_STEP_PX: 6,
  MAX_NUDGES: 8,
  /** Clearance required around a label when testing for collisions */
  PADDING_PX: 2,
  /** Series whose anchor sits in the bottom share of the scale are labelled above */
  LOW_SERIES_FRACTION: 0.25,
} as const;

export const STYLE_CONFIG = {
  RED_BAR_COLOR: '#e3120b',
  BACKGROUND_COLOR: '#f1f0e9',
  GRID_COLOR: '#cccccc',
  TEXT_COLOR: '#333333',
  SUBTITLE_COLOR: '#666666',
  SOURCE_COLOR: '#888888',
  SERIES_PALETTE: ['#17648d', '#843844', '#51bec7', '#d6ab63'],
} as const;

export const EXPORT_CONFIG = {
  /** Raster scale relative to the layout canvas */
  SCALE: 2,
  /** Export-quality minimum PNG width */
  MIN_WIDTH_PX: 800,
  /** Allowed relative difference between PNG and canvas aspect ratios */
  ASPECT_TOLERANCE: 0.02,
} as const;

// ============================================================================
// Progress Reporting
// ============================================================================

export const PROGRESS_CONFIG = {
  /** Share of the Select stage's progress range spent collecting votes */
  VOTE_PROGRESS_START: 10,
  VOTE_PROGRESS_END: 90,
} as const;

// ============================================================================
// Paths
// ============================================================================

export const PATHS_CONFIG = {
  OUTPUT_DIR: 'output',
  CHART_PUBLIC_PATH: '/assets/charts',
} as const;

// ============================================================================
// Pipeline Config Shape
// ============================================================================

export interface ZoneSpec {
  readonly name: ZoneName;
  readonly yMin: number;
  readonly yMax: number;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterRatio: number;
}

export interface OracleSettings {
  readonly timeoutMs: number;
  readonly maxOutputTokens: number;
  readonly temperatures: {
    readonly discover: number;
    readonly vote: number;
    readonly research: number;
    readonly write: number;
  };
}

export interface ConsensusSettings {
  readonly minQuorumFraction: number;
  readonly maxConcurrentVotes: number;
  /** Per-voter weight overrides keyed by voter id; missing voters weigh 1 */
  readonly voterWeights: Readonly<Record<string, number>>;
}

export interface TypographySettings {
  readonly titleFontSize: number;
  readonly titleMinFontSize: number;
  readonly subtitleFontSize: number;
  readonly subtitleMinFontSize: number;
  readonly labelFontSize: number;
  readonly labelMinFontSize: number;
  readonly axisFontSize: number;
  readonly sourceFontSize: number;
  readonly charWidthRatio: number;
  readonly boldCharWidthRatio: number;
  readonly lineHeight: number;
}

export interface LabelPlacementSettings {
  readonly gapPx: number;
  readonly nudgeStepPx: number;
  readonly maxNudges: number;
  readonly paddingPx: number;
  readonly lowSeriesFraction: number;
}

export type LabelFailureMode = 'record' | 'throw';

export interface LayoutSettings {
  readonly canvasWidth: number;
  readonly canvasHeight: number;
  readonly zones: readonly ZoneSpec[];
  readonly plotLeftFraction: number;
  readonly plotRightFraction: number;
  readonly textInsetPx: number;
  readonly rightPaddingPx: number;
  readonly typography: TypographySettings;
  readonly labels: LabelPlacementSettings;
  /** 'record' lists unplaced labels on the result, 'throw' raises LabelPlacementExhaustedError */
  readonly labelFailureMode: LabelFailureMode;
}

export interface ExportSettings {
  readonly scale: number;
  readonly minWidthPx: number;
  readonly aspectTolerance: number;
}

export interface PathSettings {
  readonly postsDir: string;
  readonly chartsDir: string;
  /** URL prefix under which published charts are served */
  readonly chartPublicPath: string;
  readonly quarantineDir: string;
  readonly sessionsDir: string;
}

export interface PipelineConfig {
  readonly retry: RetryPolicy;
  readonly oracle: OracleSettings;
  readonly discovery: { readonly topicCount: number };
  readonly consensus: ConsensusSettings;
  readonly layout: LayoutSettings;
  readonly export: ExportSettings;
  readonly paths: PathSettings;
}

export interface PipelineConfigOverrides {
  readonly retry?: Partial<RetryPolicy>;
  readonly oracle?: Partial<Omit<OracleSettings, 'temperatures'>> & {
    readonly temperatures?: Partial<OracleSettings['temperatures']>;
  };
  readonly discovery?: { readonly topicCount?: number };
  readonly consensus?: Partial<ConsensusSettings>;
  readonly layout?: Partial<Omit<LayoutSettings, 'typography' | 'labels'>> & {
    readonly typography?: Partial<TypographySettings>;
    readonly labels?: Partial<LabelPlacementSettings>;
  };
  readonly export?: Partial<ExportSettings>;
  readonly paths?: Partial<PathSettings>;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Output directories rooted at `outputDir`.
 */
export function pathsUnder(outputDir: string): PathSettings {
  return {
    postsDir: join(outputDir, '_posts'),
    chartsDir: join(outputDir, 'assets', 'charts'),
    chartPublicPath: PATHS_CONFIG.CHART_PUBLIC_PATH,
    quarantineDir: join(outputDir, 'quarantine'),
    sessionsDir: join(outputDir, 'sessions'),
  };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  retry: {
    maxAttempts: RETRY_CONFIG.MAX_ATTEMPTS,
    baseDelayMs: RETRY_CONFIG.BASE_DELAY_MS,
    maxDelayMs: RETRY_CONFIG.MAX_DELAY_MS,
    jitterRatio: RETRY_CONFIG.JITTER_RATIO,
  },
  oracle: {
    timeoutMs: ORACLE_CONFIG.TIMEOUT_MS,
    maxOutputTokens: ORACLE_CONFIG.MAX_OUTPUT_TOKENS,
    temperatures: {
      discover: ORACLE_CONFIG.DISCOVER_TEMPERATURE,
      vote: ORACLE_CONFIG.VOTE_TEMPERATURE,
      research: ORACLE_CONFIG.RESEARCH_TEMPERATURE,
      write: ORACLE_CONFIG.WRITE_TEMPERATURE,
    },
  },
  discovery: { topicCount: DISCOVERY_CONFIG.TOPIC_COUNT },
  consensus: {
    minQuorumFraction: CONSENSUS_CONFIG.MIN_QUORUM_FRACTION,
    maxConcurrentVotes: CONSENSUS_CONFIG.MAX_CONCURRENT_VOTES,
    voterWeights: {},
  },
  layout: {
    canvasWidth: LAYOUT_CONFIG.CANVAS_WIDTH,
    canvasHeight: LAYOUT_CONFIG.CANVAS_HEIGHT,
    zones: LAYOUT_ZONES,
    plotLeftFraction: LAYOUT_CONFIG.PLOT_LEFT_FRACTION,
    plotRightFraction: LAYOUT_CONFIG.PLOT_RIGHT_FRACTION,
    textInsetPx: LAYOUT_CONFIG.TEXT_INSET_PX,
    rightPaddingPx: LAYOUT_CONFIG.RIGHT_PADDING_PX,
    typography: {
      titleFontSize: TYPOGRAPHY_CONFIG.TITLE_FONT_SIZE,
      titleMinFontSize: TYPOGRAPHY_CONFIG.TITLE_MIN_FONT_SIZE,
      subtitleFontSize: TYPOGRAPHY_CONFIG.SUBTITLE_FONT_SIZE,
      subtitleMinFontSize: TYPOGRAPHY_CONFIG.SUBTITLE_MIN_FONT_SIZE,
      labelFontSize: TYPOGRAPHY_CONFIG.LABEL_FONT_SIZE,
      labelMinFontSize: TYPOGRAPHY_CONFIG.LABEL_MIN_FONT_SIZE,
      axisFontSize: TYPOGRAPHY_CONFIG.AXIS_FONT_SIZE,
      sourceFontSize: TYPOGRAPHY_CONFIG.SOURCE_FONT_SIZE,
      charWidthRatio: TYPOGRAPHY_CONFIG.CHAR_WIDTH_RATIO,
      boldCharWidthRatio: TYPOGRAPHY_CONFIG.BOLD_CHAR_WIDTH_RATIO,
      lineHeight: TYPOGRAPHY_CONFIG.LINE_HEIGHT,
    },
    labels: {
      gapPx: LABEL_PLACEMENT_CONFIG.GAP_PX,
      nudgeStepPx: LABEL_PLACEMENT_CONFIG.NUDGE_STEP_PX,
      maxNudges: LABEL_PLACEMENT_CONFIG.MAX_NUDGES,
      paddingPx: LABEL_PLACEMENT_CONFIG.PADDING_PX,
      lowSeriesFraction: LABEL_PLACEMENT_CONFIG.LOW_SERIES_FRACTION,
    },
    labelFailureMode: 'record',
  },
  export: {
    scale: EXPORT_CONFIG.SCALE,
    minWidthPx: EXPORT_CONFIG.MIN_WIDTH_PX,
    aspectTolerance: EXPORT_CONFIG.ASPECT_TOLERANCE,
  },
  paths: pathsUnder(PATHS_CONFIG.OUTPUT_DIR),
};

// ============================================================================
// Validation
// ============================================================================

const REQUIRED_ZONES: readonly ZoneName[] = ['RedBar', 'Title', 'PlotArea', 'XAxis', 'Source'];

/**
 * Zones must each appear once, lie within [0, 1] and not overlap.
 */
export function validateZones(zones: readonly ZoneSpec[]): void {
  for (const name of REQUIRED_ZONES) {
    const count = zones.filter((zone) => zone.name === name).length;
    if (count !== 1) {
      throw new ConfigValidationError(`zone ${name} must be declared exactly once (found ${count})`);
    }
  }
  if (zones.length !== REQUIRED_ZONES.length) {
    throw new ConfigValidationError(`expected ${REQUIRED_ZONES.length} zones (got ${zones.length})`);
  }

  for (const zone of zones) {
    validateFraction(zone.yMin, `zone ${zone.name}.yMin`);
    validateFraction(zone.yMax, `zone ${zone.name}.yMax`);
    if (zone.yMin >= zone.yMax) {
      throw new ConfigValidationError(`zone ${zone.name} is empty ([${zone.yMin}, ${zone.yMax}))`);
    }
  }

  const sorted = [...zones].sort((a, b) => a.yMin - b.yMin);
  for (let i = 1; i < sorted.length; i++) {
    const below = sorted[i - 1];
    const above = sorted[i];
    if (below.yMax > above.yMin) {
      throw new ConfigValidationError(
        `zones ${below.name} [${below.yMin}, ${below.yMax}) and ${above.name} [${above.yMin}, ${above.yMax}) overlap`
      );
    }
  }
}

/**
 * Validates a complete pipeline configuration.
 * Throws ConfigValidationError if any values are inconsistent.
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const { retry, oracle, consensus, layout } = config;

  validatePositiveInteger(retry.maxAttempts, 'retry.maxAttempts');
  validateNonNegative(retry.baseDelayMs, 'retry.baseDelayMs');
  validateNonNegative(retry.maxDelayMs, 'retry.maxDelayMs');
  validateMinMax(retry.baseDelayMs, retry.maxDelayMs, 'retry.baseDelayMs', 'retry.maxDelayMs');
  validateFraction(retry.jitterRatio, 'retry.jitterRatio');

  validatePositive(oracle.timeoutMs, 'oracle.timeoutMs');
  validatePositiveInteger(oracle.maxOutputTokens, 'oracle.maxOutputTokens');
  for (const [task, temperature] of Object.entries(oracle.temperatures)) {
    validateTemperature(temperature, `oracle.temperatures.${task}`);
  }

  validatePositiveInteger(config.discovery.topicCount, 'discovery.topicCount');

  validateFraction(consensus.minQuorumFraction, 'consensus.minQuorumFraction');
  validatePositiveInteger(consensus.maxConcurrentVotes, 'consensus.maxConcurrentVotes');
  for (const [voterId, weight] of Object.entries(consensus.voterWeights)) {
    validatePositive(weight, `consensus.voterWeights.${voterId}`);
  }

  validatePositive(layout.canvasWidth, 'layout.canvasWidth');
  validatePositive(layout.canvasHeight, 'layout.canvasHeight');
  validateZones(layout.zones);
  validateFraction(layout.plotLeftFraction, 'layout.plotLeftFraction');
  validateFraction(layout.plotRightFraction, 'layout.plotRightFraction');
  if (layout.plotLeftFraction >= layout.plotRightFraction) {
    throw new ConfigValidationError('layout.plotLeftFraction must be less than layout.plotRightFraction');
  }
  validateNonNegative(layout.textInsetPx, 'layout.textInsetPx');
  validateNonNegative(layout.rightPaddingPx, 'layout.rightPaddingPx');

  const { typography, labels } = layout;
  validatePositive(typography.titleMinFontSize, 'layout.typography.titleMinFontSize');
  validateMinMax(typography.titleMinFontSize, typography.titleFontSize, 'titleMinFontSize', 'titleFontSize');
  validatePositive(typography.subtitleMinFontSize, 'layout.typography.subtitleMinFontSize');
  validateMinMax(typography.subtitleMinFontSize, typography.subtitleFontSize, 'subtitleMinFontSize', 'subtitleFontSize');
  validateMinMax(typography.labelMinFontSize, typography.labelFontSize, 'labelMinFontSize', 'labelFontSize');
  validatePositive(typography.axisFontSize, 'layout.typography.axisFontSize');
  validatePositive(typography.sourceFontSize, 'layout.typography.sourceFontSize');
  validatePositive(typography.charWidthRatio, 'layout.typography.charWidthRatio');
  validatePositive(typography.boldCharWidthRatio, 'layout.typography.boldCharWidthRatio');
  validatePositive(typography.lineHeight, 'layout.typography.lineHeight');

  validateNonNegative(labels.gapPx, 'layout.labels.gapPx');
  validatePositive(labels.nudgeStepPx, 'layout.labels.nudgeStepPx');
  validateNonNegative(labels.maxNudges, 'layout.labels.maxNudges');
  validateNonNegative(labels.paddingPx, 'layout.labels.paddingPx');
  validateFraction(labels.lowSeriesFraction, 'layout.labels.lowSeriesFraction');

  validatePositive(config.export.scale, 'export.scale');
  validatePositive(config.export.minWidthPx, 'export.minWidthPx');
  validateFraction(config.export.aspectTolerance, 'export.aspectTolerance');
}

// Run validation at module load time
validatePipelineConfig(DEFAULT_PIPELINE_CONFIG);

// ============================================================================
// Construction
// ============================================================================

/**
 * Shallow merge that ignores keys whose override value is undefined.
 */
function mergeDefined<T extends object>(base: T, override?: Partial<T>): T {
  const result: T = { ...base };
  if (!override) return result;
  for (const key in override) {
    const value = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Builds a validated configuration from the defaults plus overrides.
 *
 * @example
 * const config = createPipelineConfig({
 *   retry: { maxAttempts: 5 },
 *   consensus: { voterWeights: { economist_editor: 1.3 } },
 * });
 */
export function createPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): PipelineConfig {
  const config: PipelineConfig = {
    retry: mergeDefined(base.retry, overrides.retry),
    oracle: {
      ...mergeDefined<Omit<OracleSettings, 'temperatures'>>(base.oracle, overrides.oracle),
      temperatures: mergeDefined(base.oracle.temperatures, overrides.oracle?.temperatures),
    },
    discovery: mergeDefined(base.discovery, overrides.discovery),
    consensus: mergeDefined(base.consensus, overrides.consensus),
    layout: {
      ...mergeDefined<Omit<LayoutSettings, 'typography' | 'labels'>>(base.layout, overrides.layout),
      typography: mergeDefined(base.layout.typography, overrides.layout?.typography),
      labels: mergeDefined(base.layout.labels, overrides.layout?.labels),
    },
    export: mergeDefined(base.export, overrides.export),
    paths: mergeDefined(base.paths, overrides.paths),
  };

  validatePipelineConfig(config);
  return config;
}

// ============================================================================
// Environment
// ============================================================================

const optionalNumber = z.coerce.number().finite().optional();

/**
 * Environment variables understood by {@link loadPipelineConfigFromEnv}.
 */
const PipelineEnvSchema = z.object({
  PIPELINE_OUTPUT_DIR: z.string().min(1).optional(),
  PIPELINE_MAX_ATTEMPTS: optionalNumber,
  PIPELINE_BASE_DELAY_MS: optionalNumber,
  PIPELINE_MAX_DELAY_MS: optionalNumber,
  PIPELINE_ORACLE_TIMEOUT_MS: optionalNumber,
  PIPELINE_MIN_QUORUM: optionalNumber,
  PIPELINE_VOTE_CONCURRENCY: optionalNumber,
  PIPELINE_TOPIC_COUNT: optionalNumber,
  PIPELINE_LABEL_FAILURE_MODE: z.enum(['record', 'throw']).optional(),
});

/**
 * Reads overrides from the environment. Only entry points call this;
 * library code receives the resulting config explicitly.
 */
export function loadPipelineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = PipelineEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigValidationError(`invalid environment (${details})`);
  }
  const vars = parsed.data;

  return createPipelineConfig({
    retry: {
      maxAttempts: vars.PIPELINE_MAX_ATTEMPTS,
      baseDelayMs: vars.PIPELINE_BASE_DELAY_MS,
      maxDelayMs: vars.PIPELINE_MAX_DELAY_MS,
    },
    oracle: { timeoutMs: vars.PIPELINE_ORACLE_TIMEOUT_MS },
    discovery: { topicCount: vars.PIPELINE_TOPIC_COUNT },
    consensus: {
      minQuorumFraction: vars.PIPELINE_MIN_QUORUM,
      maxConcurrentVotes: vars.PIPELINE_VOTE_CONCURRENCY,
    },
    layout: { labelFailureMode: vars.PIPELINE_LABEL_FAILURE_MODE },
    paths: vars.PIPELINE_OUTPUT_DIR ? pathsUnder(vars.PIPELINE_OUTPUT_DIR) : undefined,
  });
}
