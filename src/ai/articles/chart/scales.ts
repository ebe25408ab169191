/**
 * Axis scales.
 */

import type { YScale } from './types';

const NICE_STEPS = [1, 2, 2.5, 5, 10];

/**
 * Removes float noise such as 0.30000000000000004.
 */
function tidy(value: number): number {
  return Number.parseFloat(value.toPrecision(12));
}

/**
 * Smallest "nice" step (1, 2, 2.5 or 5 times a power of ten) that covers
 * `range` in roughly `targetCount` intervals.
 */
export function niceStep(range: number, targetCount: number): number {
  const raw = range / targetCount;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const residual = raw / magnitude;
  const multiplier = NICE_STEPS.find((step) => step >= residual) ?? 10;
  return tidy(multiplier * magnitude);
}

/**
 * Value scale for the y axis. The scale always includes zero, so
 * non-negative data starts at a zero baseline.
 *
 * @example
 * buildYScale([12, 81]);
 * // { min: 0, max: 100, step: 20, ticks: [0, 20, 40, 60, 80, 100] }
 */
export function buildYScale(values: readonly number[], targetCount = 5): YScale {
  const dataMin = Math.min(0, ...values);
  let dataMax = Math.max(0, ...values);
  if (dataMax === dataMin) {
    dataMax = dataMin + 1;
  }

  const step = niceStep(dataMax - dataMin, targetCount);
  const min = tidy(Math.floor(dataMin / step) * step);
  const max = tidy(Math.ceil(dataMax / step) * step);

  const ticks: number[] = [];
  const count = Math.round((max - min) / step);
  for (let i = 0; i <= count; i++) {
    ticks.push(tidy(min + i * step));
  }

  return { min, max, step, ticks };
}

/**
 * Maps a value to a pixel y between `pixelBottom` (scale min) and
 * `pixelTop` (scale max).
 */
export function scaleY(value: number, scale: YScale, pixelTop: number, pixelBottom: number): number {
  const ratio = (value - scale.min) / (scale.max - scale.min);
  return pixelBottom - ratio * (pixelBottom - pixelTop);
}

/**
 * Position of a value within the scale, 0 at the minimum and 1 at the maximum.
 */
export function normalizeValue(value: number, scale: YScale): number {
  return (value - scale.min) / (scale.max - scale.min);
}

const tickFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });
const compactTickFormatter = new Intl.NumberFormat('en-US', { notation: 'compact', maximumFractionDigits: 2 });

/** Ticks at or above this magnitude are abbreviated (12.5K, 2.5B) */
const COMPACT_TICK_THRESHOLD = 10000;

/**
 * Tick label text. Ticks are multiples of a nice step, so two fraction
 * digits keep neighbouring compact labels distinct.
 */
export function formatTick(value: number): string {
  return Math.abs(value) >= COMPACT_TICK_THRESHOLD ? compactTickFormatter.format(value) : tickFormatter.format(value);
}
