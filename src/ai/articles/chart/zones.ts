/**
 * Zone resolution and containment checks.
 */

import type { ZoneSpec } from '../config';
import { bottom, right, roundPx } from './geometry';
import { ZoneViolationError, type LayoutElement, type Rect, type ZoneBand, type ZoneName } from './types';

/**
 * Converts fractional zones (measured from the bottom) to pixel bands.
 */
export function resolveZones(zones: readonly ZoneSpec[], canvasHeight: number): ZoneBand[] {
  return zones.map((zone) => ({
    name: zone.name,
    yMin: zone.yMin,
    yMax: zone.yMax,
    top: roundPx((1 - zone.yMax) * canvasHeight),
    bottom: roundPx((1 - zone.yMin) * canvasHeight),
  }));
}

export function getZone(zones: readonly ZoneBand[], name: ZoneName): ZoneBand {
  const zone = zones.find((candidate) => candidate.name === name);
  if (!zone) {
    throw new ZoneViolationError(name, name, { x: 0, y: 0, width: 0, height: 0 }, 'zone is not configured');
  }
  return zone;
}

/**
 * Describes why `box` is not inside the zone band and canvas width, or
 * returns null when it is.
 */
export function describeZoneBreach(box: Rect, zone: ZoneBand, canvasWidth: number): string | null {
  const problems: string[] = [];
  if (box.y < zone.top) problems.push(`top ${roundPx(box.y)} < ${zone.top}`);
  if (bottom(box) > zone.bottom) problems.push(`bottom ${roundPx(bottom(box))} > ${zone.bottom}`);
  if (box.x < 0) problems.push(`left ${roundPx(box.x)} < 0`);
  if (right(box) > canvasWidth) problems.push(`right ${roundPx(right(box))} > ${canvasWidth}`);
  return problems.length > 0 ? problems.join(', ') : null;
}

/**
 * Throws ZoneViolationError unless the element lies inside its zone.
 */
export function assertInZone(element: LayoutElement, zones: readonly ZoneBand[], canvasWidth: number): void {
  const zone = getZone(zones, element.zone);
  const breach = describeZoneBreach(element.box, zone, canvasWidth);
  if (breach) {
    throw new ZoneViolationError(element.id, element.zone, element.box, breach);
  }
}
