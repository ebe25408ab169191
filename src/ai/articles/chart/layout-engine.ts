/**
 * Chart Layout Engine
 *
 * Computes pixel positions for every chart element inside five fixed
 * vertical zones:
 *
 *   RedBar    brand bar across the top
 *   Title     title and subtitle
 *   PlotArea  gridlines, y tick labels, plotted series, inline labels
 *   XAxis     category ticks and labels only
 *   Source    source attribution only
 *
 * Every element is checked against its zone as it is placed; a breach is a
 * ZoneViolationError. Titles shrink towards a floor size and overflow past it
 * with TitleOverflowError. The engine is stateless between calls.
 */

import { DEFAULT_PIPELINE_CONFIG, STYLE_CONFIG, LAYOUT_CONFIG, type LayoutSettings } from '../config';
import { rect, right, roundPx, segmentsFromPoints } from './geometry';
import { placeLabels, type LabelRequest } from './label-placement';
import { buildYScale, formatTick, normalizeValue, scaleY } from './scales';
import { fitText, measureText, type FontWeight } from './text-metrics';
import {
  InvalidChartSpecError,
  LabelPlacementExhaustedError,
  TitleOverflowError,
  type ChartSpec,
  type LayoutElement,
  type LayoutResult,
  type Point,
  type Rect,
  type SeriesGeometry,
  type ZoneBand,
} from './types';
import { assertInZone, getZone, resolveZones } from './zones';

const LABEL_FONT_WEIGHT: FontWeight = 'bold';

// ============================================================================
// Validation
// ============================================================================

function validateSpec(spec: ChartSpec): void {
  if (spec.categories.length === 0) {
    throw new InvalidChartSpecError('Chart has no categories');
  }
  if (spec.series.length === 0) {
    throw new InvalidChartSpecError('Chart has no series');
  }
  for (const series of spec.series) {
    if (series.values.length !== spec.categories.length) {
      throw new InvalidChartSpecError(
        `Series "${series.name}" has ${series.values.length} values for ${spec.categories.length} categories`
      );
    }
    if (series.values.some((value) => !Number.isFinite(value))) {
      throw new InvalidChartSpecError(`Series "${series.name}" contains a non-finite value`);
    }
  }
}

// ============================================================================
// Element Collector
// ============================================================================

class ElementCollector {
  readonly elements: LayoutElement[] = [];

  constructor(
    private readonly zones: readonly ZoneBand[],
    private readonly canvasWidth: number
  ) {}

  add(element: LayoutElement): void {
    assertInZone(element, this.zones, this.canvasWidth);
    this.elements.push(element);
  }
}

// ============================================================================
// Layout Steps
// ============================================================================

function layoutTitle(
  spec: ChartSpec,
  settings: LayoutSettings,
  titleBand: ZoneBand,
  collector: ElementCollector
): { titleFontSize: number; subtitleFontSize: number } {
  const { typography } = settings;
  const available = settings.canvasWidth - settings.textInsetPx * 2;

  const title = fitText(
    spec.title,
    available,
    typography.titleFontSize,
    typography.titleMinFontSize,
    typography,
    'bold'
  );
  if (!title.fits) {
    throw new TitleOverflowError(spec.title, title.width, available, typography.titleMinFontSize);
  }

  const titleTop = titleBand.top + 4;
  collector.add({
    id: 'title',
    kind: 'title',
    zone: 'Title',
    box: rect(settings.textInsetPx, titleTop, title.width, title.height),
    text: spec.title,
    fontSize: title.fontSize,
    fontWeight: 'bold',
    textAnchor: 'start',
    color: STYLE_CONFIG.TEXT_COLOR,
  });

  if (spec.subtitle.trim().length === 0) {
    return { titleFontSize: title.fontSize, subtitleFontSize: typography.subtitleFontSize };
  }

  const subtitle = fitText(
    spec.subtitle,
    available,
    typography.subtitleFontSize,
    typography.subtitleMinFontSize,
    typography
  );
  if (!subtitle.fits) {
    throw new TitleOverflowError(spec.subtitle, subtitle.width, available, typography.subtitleMinFontSize);
  }

  collector.add({
    id: 'subtitle',
    kind: 'subtitle',
    zone: 'Title',
    box: rect(settings.textInsetPx, titleTop + title.height + 4, subtitle.width, subtitle.height),
    text: spec.subtitle,
    fontSize: subtitle.fontSize,
    fontWeight: 'normal',
    textAnchor: 'start',
    color: STYLE_CONFIG.SUBTITLE_COLOR,
  });

  return { titleFontSize: title.fontSize, subtitleFontSize: subtitle.fontSize };
}

/**
 * Pixel x of each category. Bars sit in the middle of equal bands; lines and
 * scatter points span the frame minus a small inset.
 */
function computeCategoryX(spec: ChartSpec, frame: Rect): number[] {
  const count = spec.categories.length;
  if (spec.type === 'bar') {
    const band = frame.width / count;
    return spec.categories.map((_, i) => roundPx(frame.x + (i + 0.5) * band));
  }
  if (count === 1) {
    return [roundPx(frame.x + frame.width / 2)];
  }
  const left = frame.x + LAYOUT_CONFIG.PLOT_INSET_X_PX;
  const span = frame.width - LAYOUT_CONFIG.PLOT_INSET_X_PX * 2;
  return spec.categories.map((_, i) => roundPx(left + (i * span) / (count - 1)));
}

function buildSeriesGeometry(
  spec: ChartSpec,
  categoryX: readonly number[],
  frame: Rect,
  toPixelY: (value: number) => number
): SeriesGeometry[] {
  const seriesCount = spec.series.length;
  const band = frame.width / spec.categories.length;
  const groupWidth = band * LAYOUT_CONFIG.BAR_GROUP_FRACTION;
  const barWidth = groupWidth / seriesCount;
  const half = LAYOUT_CONFIG.MARKER_SIZE_PX / 2;
  const palette = STYLE_CONFIG.SERIES_PALETTE;

  return spec.series.map((series, index) => {
    const color = palette[index % palette.length];
    const labelled = series.inlineLabel ?? seriesCount > 1;

    if (spec.type === 'bar') {
      const baseline = toPixelY(0);
      const shapes: Rect[] = [];
      const points: Point[] = [];
      series.values.forEach((value, i) => {
        const x = roundPx(categoryX[i] - groupWidth / 2 + index * barWidth);
        const valueY = roundPx(toPixelY(value));
        const top = Math.min(valueY, baseline);
        shapes.push(rect(x, top, roundPx(barWidth), roundPx(Math.abs(baseline - valueY))));
        points.push({ x: roundPx(x + barWidth / 2), y: top });
      });
      return { name: series.name, index, color, points, segments: [], shapes, labelled };
    }

    const points: Point[] = series.values.map((value, i) => ({ x: categoryX[i], y: roundPx(toPixelY(value)) }));

    if (spec.type === 'scatter') {
      const shapes = points.map((point) => rect(point.x - half, point.y - half, half * 2, half * 2));
      return { name: series.name, index, color, points, segments: [], shapes, labelled };
    }

    return { name: series.name, index, color, points, segments: segmentsFromPoints(points), shapes: [], labelled };
  });
}

function boundsOf(points: readonly Point[]): Rect {
  const xs = points.map((point) => point.x);
  const ys = points.map((point) => point.y);
  const minX = Math.min(...xs);
  const minY = Math.min(...ys);
  return rect(minX, minY, Math.max(...xs) - minX, Math.max(...ys) - minY);
}

function addSeriesElements(spec: ChartSpec, geometry: readonly SeriesGeometry[], collector: ElementCollector): void {
  for (const series of geometry) {
    if (spec.type === 'line') {
      collector.add({
        id: `series-${series.index}-line`,
        kind: 'series-line',
        zone: 'PlotArea',
        box: boundsOf(series.points),
        color: series.color,
        seriesIndex: series.index,
      });
      continue;
    }

    series.shapes.forEach((shape, i) => {
      collector.add({
        id: `series-${series.index}-${spec.type === 'bar' ? 'bar' : 'marker'}-${i}`,
        kind: spec.type === 'bar' ? 'series-bar' : 'series-marker',
        zone: 'PlotArea',
        box: shape,
        color: series.color,
        seriesIndex: series.index,
      });
    });
  }
}

/**
 * Which labelled series count as "low": anchored in the bottom share of the
 * scale, or strictly the lowest of several labelled series.
 */
function buildLabelRequests(
  spec: ChartSpec,
  geometry: readonly SeriesGeometry[],
  isLow: (value: number) => boolean
): LabelRequest[] {
  const labelled = geometry.filter((series) => series.labelled);
  const lastValues = labelled.map((series) => {
    const values = spec.series[series.index].values;
    return values[values.length - 1];
  });
  const lowest = Math.min(...lastValues);
  const lowestCount = lastValues.filter((value) => value === lowest).length;

  return labelled.map((series, i) => {
    const source = spec.series[series.index];
    const lastIndex = series.points.length - 1;
    const midIndex = Math.floor(lastIndex / 2);
    const strictlyLowest = labelled.length > 1 && lastValues[i] === lowest && lowestCount === 1;

    return {
      seriesIndex: series.index,
      seriesName: series.name,
      text: source.label ?? source.name,
      primary: series.points[lastIndex],
      secondary: midIndex < lastIndex ? series.points[midIndex] : null,
      preferAbove: spec.type === 'bar' || isLow(lastValues[i]) || strictlyLowest,
    };
  });
}

function layoutXAxis(
  spec: ChartSpec,
  settings: LayoutSettings,
  categoryX: readonly number[],
  xBand: ZoneBand,
  collector: ElementCollector
): void {
  const { typography } = settings;
  const fontSize = typography.axisFontSize;
  const tickLength = LAYOUT_CONFIG.X_TICK_LENGTH_PX;

  categoryX.forEach((x, i) => {
    collector.add({
      id: `x-tick-${i}`,
      kind: 'x-tick',
      zone: 'XAxis',
      box: rect(x, xBand.top, 0, tickLength),
      color: STYLE_CONFIG.TEXT_COLOR,
    });
  });

  const labelTop = xBand.top + tickLength + 2;
  const boxes = spec.categories.map((category, i) => {
    const size = measureText(category, fontSize, typography);
    const x = Math.min(Math.max(categoryX[i] - size.width / 2, 0), settings.canvasWidth - size.width);
    return rect(x, labelTop, size.width, size.height);
  });

  // Keep every stride-th label so neighbours never touch
  let stride = 1;
  const overlaps = (k: number): boolean => {
    for (let i = k; i < boxes.length; i += k) {
      if (right(boxes[i - k]) + LAYOUT_CONFIG.X_LABEL_MIN_GAP_PX > boxes[i].x) return true;
    }
    return false;
  };
  while (stride < boxes.length && overlaps(stride)) {
    stride++;
  }

  boxes.forEach((box, i) => {
    if (i % stride !== 0) return;
    collector.add({
      id: `x-label-${i}`,
      kind: 'x-tick-label',
      zone: 'XAxis',
      box,
      text: spec.categories[i],
      fontSize,
      fontWeight: 'normal',
      textAnchor: 'middle',
      color: STYLE_CONFIG.TEXT_COLOR,
    });
  });
}

// ============================================================================
// Main Entry
// ============================================================================

/**
 * Lays out a chart.
 *
 * @throws TitleOverflowError when the title or subtitle does not fit at the floor size
 * @throws ZoneViolationError when any element falls outside its zone
 * @throws LabelPlacementExhaustedError when a label cannot be placed and
 *   `labelFailureMode` is 'throw'
 * @throws InvalidChartSpecError for specs with no categories, ragged series or non-finite values
 */
export function layoutChart(spec: ChartSpec, settings: LayoutSettings = DEFAULT_PIPELINE_CONFIG.layout): LayoutResult {
  validateSpec(spec);

  const width = settings.canvasWidth;
  const zones = resolveZones(settings.zones, settings.canvasHeight);
  const collector = new ElementCollector(zones, width);

  // Red bar
  const redBand = getZone(zones, 'RedBar');
  collector.add({
    id: 'red-bar',
    kind: 'red-bar',
    zone: 'RedBar',
    box: rect(0, redBand.top, width, redBand.bottom - redBand.top),
    color: STYLE_CONFIG.RED_BAR_COLOR,
  });

  // Title
  const fonts = layoutTitle(spec, settings, getZone(zones, 'Title'), collector);

  // Plot frame and scale
  const plotBand = getZone(zones, 'PlotArea');
  const plotLeft = roundPx(width * settings.plotLeftFraction);
  const plotRight = roundPx(width * settings.plotRightFraction);
  const plotFrame = rect(plotLeft, plotBand.top, plotRight - plotLeft, plotBand.bottom - plotBand.top);
  const innerTop = plotBand.top + LAYOUT_CONFIG.PLOT_INSET_TOP_PX;
  const innerBottom = plotBand.bottom - LAYOUT_CONFIG.PLOT_INSET_BOTTOM_PX;

  const yScale = buildYScale(
    spec.series.flatMap((series) => series.values),
    LAYOUT_CONFIG.Y_TICK_TARGET_COUNT
  );
  const toPixelY = (value: number): number => scaleY(value, yScale, innerTop, innerBottom);

  // Gridlines and y tick labels
  const { typography } = settings;
  for (const tick of yScale.ticks) {
    const y = roundPx(toPixelY(tick));
    collector.add({
      id: `grid-${tick}`,
      kind: tick === 0 ? 'baseline' : 'gridline',
      zone: 'PlotArea',
      box: rect(plotLeft, y, plotRight - plotLeft, 0),
      color: tick === 0 ? STYLE_CONFIG.TEXT_COLOR : STYLE_CONFIG.GRID_COLOR,
    });

    const text = formatTick(tick);
    const size = measureText(text, typography.axisFontSize, typography);
    collector.add({
      id: `y-label-${tick}`,
      kind: 'y-tick-label',
      zone: 'PlotArea',
      box: rect(plotLeft - LAYOUT_CONFIG.Y_TICK_LABEL_GAP_PX - size.width, y - size.height / 2, size.width, size.height),
      text,
      fontSize: typography.axisFontSize,
      fontWeight: 'normal',
      textAnchor: 'end',
      color: STYLE_CONFIG.SUBTITLE_COLOR,
    });
  }

  // Series
  const categoryX = computeCategoryX(spec, plotFrame);
  const geometry = buildSeriesGeometry(spec, categoryX, plotFrame, toPixelY);
  addSeriesElements(spec, geometry, collector);

  // Inline labels
  const lowFraction = settings.labels.lowSeriesFraction;
  const requests = buildLabelRequests(spec, geometry, (value) => normalizeValue(value, yScale) < lowFraction);
  const { placed, unplaced } = placeLabels(requests, {
    plotBand,
    xMin: plotLeft,
    xMax: width - settings.rightPaddingPx,
    series: geometry,
    settings: settings.labels,
    typography,
    fontSize: typography.labelFontSize,
    fontWeight: LABEL_FONT_WEIGHT,
  });

  if (unplaced.length > 0 && settings.labelFailureMode === 'throw') {
    const [first] = unplaced;
    throw new LabelPlacementExhaustedError(first.seriesName, first.attempts, first.reason);
  }

  for (const label of placed) {
    collector.add({
      id: `label-${label.seriesIndex}`,
      kind: 'inline-label',
      zone: 'PlotArea',
      box: label.finalBox,
      text: label.text,
      fontSize: label.fontSize,
      fontWeight: LABEL_FONT_WEIGHT,
      textAnchor: 'start',
      color: geometry[label.seriesIndex].color,
      seriesIndex: label.seriesIndex,
    });
  }

  // X axis
  layoutXAxis(spec, settings, categoryX, getZone(zones, 'XAxis'), collector);

  // Source
  if (spec.sourceLine.trim().length > 0) {
    const sourceBand = getZone(zones, 'Source');
    const size = measureText(spec.sourceLine, typography.sourceFontSize, typography);
    collector.add({
      id: 'source',
      kind: 'source',
      zone: 'Source',
      box: rect(settings.textInsetPx, sourceBand.top + 4, size.width, size.height),
      text: spec.sourceLine,
      fontSize: typography.sourceFontSize,
      fontWeight: 'normal',
      textAnchor: 'start',
      color: STYLE_CONFIG.SOURCE_COLOR,
    });
  }

  return {
    canvas: { width, height: settings.canvasHeight },
    zones,
    plotFrame,
    elements: collector.elements,
    labels: placed,
    unplacedLabels: unplaced,
    series: geometry,
    yScale,
    categoryX,
    titleFontSize: fonts.titleFontSize,
    subtitleFontSize: fonts.subtitleFontSize,
  };
}

/**
 * Stateless engine bound to one set of layout settings.
 */
export class ChartLayoutEngine {
  constructor(private readonly settings: LayoutSettings = DEFAULT_PIPELINE_CONFIG.layout) {}

  layout(spec: ChartSpec): LayoutResult {
    return layoutChart(spec, this.settings);
  }
}

