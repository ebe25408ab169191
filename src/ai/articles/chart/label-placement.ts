/**
 * Inline Label Placement
 *
 * Places one label per labelled series without overlapping other labels or
 * any plotted series. Each label tries its primary anchor (last point) in its
 * preferred direction, nudging away from the anchor a bounded number of
 * times, then the alternate direction, then the secondary anchor (middle
 * point). Labels never sit below their anchor, so they cannot drift into
 * the x-axis zone.
 */

import type { LabelPlacementSettings, TypographySettings } from '../config';
import { clamp, inflate, rect, rectsIntersect, bottom, right, segmentIntersectsRect } from './geometry';
import { measureText, type FontWeight } from './text-metrics';
import type {
  AnchorKind,
  LabelDirection,
  LabelPlacement,
  Point,
  Rect,
  SeriesGeometry,
  UnplacedLabel,
  ZoneBand,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface LabelRequest {
  readonly seriesIndex: number;
  readonly seriesName: string;
  readonly text: string;
  readonly primary: Point;
  /** Fallback anchor; null when the series is too short to have one */
  readonly secondary: Point | null;
  /** Low series try 'above' before 'end' */
  readonly preferAbove: boolean;
}

export interface LabelPlacementContext {
  readonly plotBand: ZoneBand;
  /** Horizontal bounds for label boxes */
  readonly xMin: number;
  readonly xMax: number;
  /** Every plotted series; all of them are obstacles */
  readonly series: readonly SeriesGeometry[];
  readonly settings: LabelPlacementSettings;
  readonly typography: TypographySettings;
  readonly fontSize: number;
  /** Weight the labels are drawn at; boxes are measured at the same weight */
  readonly fontWeight: FontWeight;
}

export interface LabelPlacementOutcome {
  readonly placed: LabelPlacement[];
  readonly unplaced: UnplacedLabel[];
}

interface CandidatePlan {
  readonly anchor: Point;
  readonly anchorKind: AnchorKind;
  readonly direction: LabelDirection;
}

type CandidateCheck = { readonly ok: true } | { readonly ok: false; readonly reason: string; readonly recoverable: boolean };

// ============================================================================
// Candidates
// ============================================================================

function buildPlans(request: LabelRequest): CandidatePlan[] {
  const directions: LabelDirection[] = request.preferAbove ? ['above', 'end'] : ['end', 'above'];
  const plans: CandidatePlan[] = directions.map((direction) => ({
    anchor: request.primary,
    anchorKind: 'primary',
    direction,
  }));

  // The series continues to the right of a mid-line anchor, so only 'above' can clear it
  if (request.secondary) {
    plans.push({ anchor: request.secondary, anchorKind: 'secondary', direction: 'above' });
  }
  return plans;
}

/**
 * Candidate box for the given nudge step. 'end' moves right, 'above' moves up.
 */
function candidateBox(
  plan: CandidatePlan,
  nudge: number,
  size: { width: number; height: number },
  context: LabelPlacementContext
): Rect {
  const { gapPx, nudgeStepPx } = context.settings;
  const { anchor } = plan;

  if (plan.direction === 'end') {
    const y = clamp(anchor.y - size.height / 2, context.plotBand.top, context.plotBand.bottom - size.height);
    return rect(anchor.x + gapPx + nudge * nudgeStepPx, y, size.width, size.height);
  }

  const x = clamp(anchor.x - size.width / 2, context.xMin, context.xMax - size.width);
  return rect(x, anchor.y - gapPx - size.height - nudge * nudgeStepPx, size.width, size.height);
}

function checkCandidate(box: Rect, placed: readonly LabelPlacement[], context: LabelPlacementContext): CandidateCheck {
  if (box.y < context.plotBand.top || bottom(box) > context.plotBand.bottom) {
    return { ok: false, reason: 'outside the plot area', recoverable: false };
  }
  if (box.x < context.xMin || right(box) > context.xMax) {
    return { ok: false, reason: 'past the canvas edge', recoverable: false };
  }

  const padded = inflate(box, context.settings.paddingPx);

  const label = placed.find((existing) => rectsIntersect(padded, existing.finalBox));
  if (label) {
    return { ok: false, reason: `overlaps the "${label.seriesName}" label`, recoverable: true };
  }

  for (const series of context.series) {
    const crossesLine = series.segments.some((segment) => segmentIntersectsRect(segment, padded));
    const coversShape = series.shapes.some((shape) => rectsIntersect(padded, shape));
    if (crossesLine || coversShape) {
      return { ok: false, reason: `crosses the "${series.name}" series`, recoverable: true };
    }
  }

  return { ok: true };
}

// ============================================================================
// Placement
// ============================================================================

/**
 * Places labels in request order. Earlier labels become obstacles for later ones.
 */
export function placeLabels(requests: readonly LabelRequest[], context: LabelPlacementContext): LabelPlacementOutcome {
  const placed: LabelPlacement[] = [];
  const unplaced: UnplacedLabel[] = [];

  for (const request of requests) {
    const size = measureText(request.text, context.fontSize, context.typography, context.fontWeight);
    let attempts = 0;
    let lastReason = 'no candidate positions';
    let placement: LabelPlacement | null = null;

    for (const plan of buildPlans(request)) {
      for (let nudge = 0; nudge <= context.settings.maxNudges; nudge++) {
        attempts++;
        const box = candidateBox(plan, nudge, size, context);
        const check = checkCandidate(box, placed, context);

        if (check.ok) {
          placement = {
            seriesName: request.seriesName,
            seriesIndex: request.seriesIndex,
            text: request.text,
            anchorPoint: plan.anchor,
            anchorKind: plan.anchorKind,
            direction: plan.direction,
            offset: { dx: box.x - plan.anchor.x, dy: box.y - plan.anchor.y },
            finalBox: box,
            fontSize: context.fontSize,
            attempts,
          };
          break;
        }

        lastReason = `${plan.anchorKind} anchor, ${plan.direction}: ${check.reason}`;
        // Further nudges only move the box further out of bounds
        if (!check.recoverable) break;
      }
      if (placement) break;
    }

    if (placement) {
      placed.push(placement);
    } else {
      unplaced.push({
        seriesName: request.seriesName,
        seriesIndex: request.seriesIndex,
        text: request.text,
        reason: lastReason,
        attempts,
      });
    }
  }

  return { placed, unplaced };
}
