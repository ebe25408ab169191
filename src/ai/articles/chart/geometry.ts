/**
 * Geometry helpers for chart layout.
 *
 * Intersections are strict: shapes that only share an edge or a corner do
 * not intersect.
 */

import type { Point, Rect, Segment } from './types';

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export function right(box: Rect): number {
  return box.x + box.width;
}

export function bottom(box: Rect): number {
  return box.y + box.height;
}

/**
 * Rounds to hundredths of a pixel so fractional zone maths stays stable.
 */
export function roundPx(value: number): number {
  return Math.round(value * 100) / 100;
}

export function inflate(box: Rect, padding: number): Rect {
  return rect(box.x - padding, box.y - padding, box.width + padding * 2, box.height + padding * 2);
}

export function rectsIntersect(a: Rect, b: Rect): boolean {
  return a.x < right(b) && b.x < right(a) && a.y < bottom(b) && b.y < bottom(a);
}

function strictlyInside(box: Rect, point: Point): boolean {
  return point.x > box.x && point.x < right(box) && point.y > box.y && point.y < bottom(box);
}

/**
 * Clips a segment to a rectangle (Liang-Barsky) and reports whether any part
 * of it passes through the rectangle's interior.
 */
export function segmentIntersectsRect(segment: Segment, box: Rect): boolean {
  const { from, to } = segment;
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const p = [-dx, dx, -dy, dy];
  const q = [from.x - box.x, right(box) - from.x, from.y - box.y, bottom(box) - from.y];

  let t0 = 0;
  let t1 = 1;
  for (let i = 0; i < 4; i++) {
    if (p[i] === 0) {
      if (q[i] < 0) return false;
      continue;
    }
    const r = q[i] / p[i];
    if (p[i] < 0) {
      if (r > t1) return false;
      if (r > t0) t0 = r;
    } else {
      if (r < t0) return false;
      if (r < t1) t1 = r;
    }
  }

  const mid = (t0 + t1) / 2;
  return strictlyInside(box, { x: from.x + dx * mid, y: from.y + dy * mid });
}

export function segmentsFromPoints(points: readonly Point[]): Segment[] {
  const segments: Segment[] = [];
  for (let i = 1; i < points.length; i++) {
    segments.push({ from: points[i - 1], to: points[i] });
  }
  return segments;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
