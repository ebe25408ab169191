/**
 * Chart Types
 *
 * Chart specifications, layout geometry and layout errors. Layout geometry is
 * in canvas pixels with the origin at the top-left and y growing downward.
 */

// ============================================================================
// Chart Specification
// ============================================================================

export type ChartType = 'line' | 'bar' | 'scatter';

export interface ChartSeries {
  readonly name: string;
  /** One value per category */
  readonly values: readonly number[];
  /** Inline label text; defaults to the series name */
  readonly label?: string;
  /** Whether the series is labelled inline. Defaults to true when the chart has more than one series. */
  readonly inlineLabel?: boolean;
}

/**
 * Immutable description of a chart, produced by the Write stage.
 */
export interface ChartSpec {
  readonly title: string;
  readonly subtitle: string;
  readonly type: ChartType;
  /** X-axis categories, in display order */
  readonly categories: readonly string[];
  readonly series: readonly ChartSeries[];
  readonly sourceLine: string;
}

// ============================================================================
// Geometry
// ============================================================================

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface Segment {
  readonly from: Point;
  readonly to: Point;
}

// ============================================================================
// Zones
// ============================================================================

export type ZoneName = 'RedBar' | 'Title' | 'PlotArea' | 'XAxis' | 'Source';

/**
 * A zone resolved to pixels. `top` and `bottom` are canvas y coordinates.
 */
export interface ZoneBand {
  readonly name: ZoneName;
  /** Configured fractions of canvas height, measured from the bottom */
  readonly yMin: number;
  readonly yMax: number;
  readonly top: number;
  readonly bottom: number;
}

// ============================================================================
// Layout Result
// ============================================================================

export type LayoutElementKind =
  | 'red-bar'
  | 'title'
  | 'subtitle'
  | 'gridline'
  | 'baseline'
  | 'y-tick-label'
  | 'series-line'
  | 'series-bar'
  | 'series-marker'
  | 'inline-label'
  | 'x-tick'
  | 'x-tick-label'
  | 'source';

export type TextAnchor = 'start' | 'middle' | 'end';

export interface LayoutElement {
  readonly id: string;
  readonly kind: LayoutElementKind;
  readonly zone: ZoneName;
  /** Bounding box; text boxes cover the full line height */
  readonly box: Rect;
  readonly text?: string;
  readonly fontSize?: number;
  readonly fontWeight?: 'normal' | 'bold';
  readonly textAnchor?: TextAnchor;
  readonly color?: string;
  readonly seriesIndex?: number;
}

export interface SeriesGeometry {
  readonly name: string;
  readonly index: number;
  readonly color: string;
  /** Plotted data points (top-centre of each bar for bar charts) */
  readonly points: readonly Point[];
  /** Line segments drawn for the series; empty for bar and scatter */
  readonly segments: readonly Segment[];
  /** Filled shapes drawn for the series (bars or markers) */
  readonly shapes: readonly Rect[];
  readonly labelled: boolean;
}

export type LabelDirection = 'end' | 'above';
export type AnchorKind = 'primary' | 'secondary';

export interface LabelOffset {
  readonly dx: number;
  readonly dy: number;
}

export interface LabelPlacement {
  readonly seriesName: string;
  readonly seriesIndex: number;
  readonly text: string;
  readonly anchorPoint: Point;
  readonly anchorKind: AnchorKind;
  readonly direction: LabelDirection;
  /** Box origin relative to the anchor point */
  readonly offset: LabelOffset;
  readonly finalBox: Rect;
  readonly fontSize: number;
  /** Candidate boxes tried, including the accepted one */
  readonly attempts: number;
}

export interface UnplacedLabel {
  readonly seriesName: string;
  readonly seriesIndex: number;
  readonly text: string;
  readonly reason: string;
  readonly attempts: number;
}

export interface YScale {
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly ticks: readonly number[];
}

export interface LayoutResult {
  readonly canvas: { readonly width: number; readonly height: number };
  readonly zones: readonly ZoneBand[];
  /** Plot frame in pixels */
  readonly plotFrame: Rect;
  readonly elements: readonly LayoutElement[];
  readonly labels: readonly LabelPlacement[];
  readonly unplacedLabels: readonly UnplacedLabel[];
  readonly series: readonly SeriesGeometry[];
  readonly yScale: YScale;
  /** Pixel x of each category */
  readonly categoryX: readonly number[];
  readonly titleFontSize: number;
  readonly subtitleFontSize: number;
}

// ============================================================================
// Errors
// ============================================================================

export type LayoutErrorCode = 'TITLE_OVERFLOW' | 'ZONE_VIOLATION' | 'LABEL_PLACEMENT_EXHAUSTED' | 'INVALID_SPEC';

/**
 * Base class for chart layout failures. The pipeline treats every layout
 * error as a failed gate.
 */
export abstract class LayoutError extends Error {
  abstract readonly code: LayoutErrorCode;
}

export class TitleOverflowError extends LayoutError {
  readonly name = 'TitleOverflowError';
  readonly code = 'TITLE_OVERFLOW';

  constructor(
    readonly text: string,
    readonly requiredWidth: number,
    readonly availableWidth: number,
    readonly fontSize: number
  ) {
    super(
      `"${text}" needs ${requiredWidth.toFixed(1)}px at the ${fontSize}px floor size ` +
        `but the Title zone is ${availableWidth.toFixed(1)}px wide`
    );
  }
}

export class ZoneViolationError extends LayoutError {
  readonly name = 'ZoneViolationError';
  readonly code = 'ZONE_VIOLATION';

  constructor(
    readonly elementId: string,
    readonly zone: ZoneName,
    readonly box: Rect,
    detail: string
  ) {
    super(`${elementId} lies outside zone ${zone}: ${detail}`);
  }
}

export class LabelPlacementExhaustedError extends LayoutError {
  readonly name = 'LabelPlacementExhaustedError';
  readonly code = 'LABEL_PLACEMENT_EXHAUSTED';

  constructor(
    readonly seriesName: string,
    readonly attempts: number,
    readonly reason: string
  ) {
    super(`No collision-free position for the "${seriesName}" label after ${attempts} attempts: ${reason}`);
  }
}

/**
 * The chart spec itself cannot be laid out (no categories, ragged series,
 * non-finite values).
 */
export class InvalidChartSpecError extends LayoutError {
  readonly name = 'InvalidChartSpecError';
  readonly code = 'INVALID_SPEC';
}

export function isLayoutError(error: unknown): error is LayoutError {
  return error instanceof LayoutError;
}
