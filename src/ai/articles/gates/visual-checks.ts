/**
 * Visual Checks
 *
 * The visual gate, in order: Layout-integrity, Typography, Style-compliance,
 * Data-integrity, Export-quality. Every check reads the computed layout and
 * the exported image reference; none of them calls the oracle. All of them
 * are not applicable when the session has no chart.
 */

import { STYLE_CONFIG, type ExportSettings, type LayoutSettings } from '../config';
import type { ChartImageRef } from '../chart/chart-exporter';
import { rectsIntersect, segmentIntersectsRect } from '../chart/geometry';
import type { ChartSpec, LayoutResult } from '../chart/types';
import { describeZoneBreach } from '../chart/zones';
import { fromIssues, notApplicable, QualityGate, type CheckOutcome, type CheckSpec } from './quality-gate';

// ============================================================================
// Types
// ============================================================================

export interface ChartArtifacts {
  readonly spec: ChartSpec;
  readonly layout: LayoutResult;
  readonly image: ChartImageRef;
}

export interface VisualArtifact {
  /** Null when the article has no chart */
  readonly chart: ChartArtifacts | null;
  readonly layoutSettings: LayoutSettings;
  readonly exportSettings: ExportSettings;
}

export const VISUAL_GATE_NAME = 'visual';

export const VISUAL_CHECK_NAMES = [
  'Layout-integrity',
  'Typography',
  'Style-compliance',
  'Data-integrity',
  'Export-quality',
] as const;

const NO_CHART = 'Article has no chart';

function withChart(
  artifact: VisualArtifact,
  evaluate: (chart: ChartArtifacts) => CheckOutcome
): CheckOutcome {
  return artifact.chart === null ? notApplicable(NO_CHART) : evaluate(artifact.chart);
}

// ============================================================================
// Checks
// ============================================================================

function layoutIntegrity(chart: ChartArtifacts): CheckOutcome {
  const { layout } = chart;
  const issues: string[] = [];

  for (const element of layout.elements) {
    const zone = layout.zones.find((band) => band.name === element.zone);
    const breach = zone
      ? describeZoneBreach(element.box, zone, layout.canvas.width)
      : `zone ${element.zone} is not defined`;
    if (breach) {
      issues.push(`${element.id} outside ${element.zone}: ${breach}`);
    }
  }

  layout.labels.forEach((label, i) => {
    for (const other of layout.labels.slice(i + 1)) {
      if (rectsIntersect(label.finalBox, other.finalBox)) {
        issues.push(`Labels "${label.text}" and "${other.text}" overlap`);
      }
    }
    for (const series of layout.series) {
      if (series.index === label.seriesIndex) continue;
      const crossesPath =
        series.segments.some((segment) => segmentIntersectsRect(segment, label.finalBox)) ||
        series.shapes.some((shape) => rectsIntersect(shape, label.finalBox));
      if (crossesPath) {
        issues.push(`Label "${label.text}" crosses series "${series.name}"`);
      }
    }
  });

  for (const unplaced of layout.unplacedLabels) {
    issues.push(`Label "${unplaced.text}" could not be placed: ${unplaced.reason}`);
  }

  return fromIssues(
    issues,
    `${layout.elements.length} elements inside their zones; ${layout.labels.length} labels clear of each other and of other series`
  );
}

function typography(chart: ChartArtifacts, settings: LayoutSettings): CheckOutcome {
  const { layout } = chart;
  const type = settings.typography;
  const issues: string[] = [];

  if (layout.titleFontSize < type.titleMinFontSize) {
    issues.push(`Title ${layout.titleFontSize}px is below the ${type.titleMinFontSize}px floor`);
  }
  const hasSubtitle = layout.elements.some((element) => element.kind === 'subtitle');
  if (hasSubtitle && layout.titleFontSize <= layout.subtitleFontSize) {
    issues.push(`Title ${layout.titleFontSize}px is not larger than subtitle ${layout.subtitleFontSize}px`);
  }

  const axisLabels = layout.elements.filter((element) => element.kind === 'x-tick-label');
  axisLabels.forEach((label, i) => {
    const next = axisLabels[i + 1];
    if (next && rectsIntersect(label.box, next.box)) {
      issues.push(`Axis labels "${label.text ?? ''}" and "${next.text ?? ''}" overlap`);
    }
  });

  for (const label of layout.labels) {
    if (label.fontSize < type.labelMinFontSize) {
      issues.push(`Label "${label.text}" is ${label.fontSize}px, below the ${type.labelMinFontSize}px floor`);
    }
  }

  return fromIssues(issues, `Title ${layout.titleFontSize}px; axis and inline labels legible`);
}

function styleCompliance(chart: ChartArtifacts): CheckOutcome {
  const { layout } = chart;
  const issues: string[] = [];
  const palette: readonly string[] = STYLE_CONFIG.SERIES_PALETTE;

  const redBar = layout.elements.find((element) => element.kind === 'red-bar');
  if (!redBar) {
    issues.push('Red bar is missing');
  } else if (redBar.color !== STYLE_CONFIG.RED_BAR_COLOR) {
    issues.push(`Red bar colour ${redBar.color ?? 'unset'} is not ${STYLE_CONFIG.RED_BAR_COLOR}`);
  }

  for (const series of layout.series) {
    if (!palette.includes(series.color)) {
      issues.push(`Series "${series.name}" uses off-palette colour ${series.color}`);
    }
  }

  if (layout.series.length > 1) {
    const unlabelled = layout.series.filter((series) => !series.labelled).map((series) => series.name);
    if (unlabelled.length > 0) {
      issues.push(`Series without inline labels: ${unlabelled.join(', ')}`);
    }
  }

  return fromIssues(issues, 'Red bar and house palette present; series labelled inline');
}

function dataIntegrity(chart: ChartArtifacts): CheckOutcome {
  const { spec, layout } = chart;
  const issues: string[] = [];
  const values = spec.series.flatMap((series) => series.values);

  if (values.some((value) => !Number.isFinite(value))) {
    issues.push('Chart contains non-finite values');
  }
  for (const series of spec.series) {
    if (series.values.length !== spec.categories.length) {
      issues.push(`Series "${series.name}" has ${series.values.length} values for ${spec.categories.length} categories`);
    }
  }
  if (values.length > 0 && values.every((value) => value >= 0) && layout.yScale.min !== 0) {
    issues.push(`Y axis starts at ${layout.yScale.min} for non-negative data`);
  }

  const ticks = layout.elements.filter((element) => element.kind === 'x-tick').length;
  if (ticks !== spec.categories.length) {
    issues.push(`${ticks} axis ticks for ${spec.categories.length} categories`);
  }

  return fromIssues(issues, `${spec.series.length} series over ${spec.categories.length} categories plotted from zero`);
}

function exportQuality(chart: ChartArtifacts, settings: ExportSettings): CheckOutcome {
  const { image, layout } = chart;
  const issues: string[] = [];

  if (image.format !== 'png') {
    issues.push(`Exported as ${image.format}, expected png`);
  }
  if (image.width < settings.minWidthPx) {
    issues.push(`Image is ${image.width}px wide, below ${settings.minWidthPx}px`);
  }

  const expected = layout.canvas.width / layout.canvas.height;
  const actual = image.height > 0 ? image.width / image.height : 0;
  if (Math.abs(actual - expected) / expected > settings.aspectTolerance) {
    issues.push(`Aspect ratio ${actual.toFixed(3)} differs from canvas ${expected.toFixed(3)}`);
  }

  return fromIssues(issues, `${image.fileName}: ${image.width}x${image.height} png`);
}

// ============================================================================
// Gate
// ============================================================================

export function createVisualChecks(): CheckSpec<VisualArtifact>[] {
  return [
    { name: 'Layout-integrity', evaluate: (artifact) => withChart(artifact, layoutIntegrity) },
    {
      name: 'Typography',
      evaluate: (artifact) => withChart(artifact, (chart) => typography(chart, artifact.layoutSettings)),
    },
    { name: 'Style-compliance', evaluate: (artifact) => withChart(artifact, styleCompliance) },
    { name: 'Data-integrity', evaluate: (artifact) => withChart(artifact, dataIntegrity) },
    {
      name: 'Export-quality',
      evaluate: (artifact) => withChart(artifact, (chart) => exportQuality(chart, artifact.exportSettings)),
    },
  ];
}

export function createVisualGate(): QualityGate<VisualArtifact> {
  return new QualityGate(VISUAL_GATE_NAME, createVisualChecks());
}

