/**
 * SVG Renderer
 *
 * Draws a computed layout. The renderer adds nothing that is not already
 * in the layout, so the visual checks over the layout describe the image.
 */

import { STYLE_CONFIG } from '../config';
import type { LayoutElement, LayoutResult, SeriesGeometry } from './types';

const FONT_FAMILY = 'Helvetica, Arial, sans-serif';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(value: number): string {
  return Number(value.toFixed(2)).toString();
}

function renderText(element: LayoutElement): string {
  const fontSize = element.fontSize ?? 10;
  const anchor = element.textAnchor ?? 'start';
  const x =
    anchor === 'middle'
      ? element.box.x + element.box.width / 2
      : anchor === 'end'
        ? element.box.x + element.box.width
        : element.box.x;
  // Baseline sits at roughly 80% of the line box
  const y = element.box.y + element.box.height * 0.8;

  return (
    `<text x="${fmt(x)}" y="${fmt(y)}" font-family="${FONT_FAMILY}" font-size="${fontSize}" ` +
    `font-weight="${element.fontWeight ?? 'normal'}" fill="${element.color ?? STYLE_CONFIG.TEXT_COLOR}" ` +
    `text-anchor="${anchor}">${escapeXml(element.text ?? '')}</text>`
  );
}

function renderElement(element: LayoutElement): string | null {
  const { box } = element;
  switch (element.kind) {
    case 'red-bar':
      return `<rect x="${fmt(box.x)}" y="${fmt(box.y)}" width="${fmt(box.width)}" height="${fmt(box.height)}" fill="${element.color ?? STYLE_CONFIG.RED_BAR_COLOR}"/>`;
    case 'gridline':
    case 'baseline':
      return (
        `<line x1="${fmt(box.x)}" y1="${fmt(box.y)}" x2="${fmt(box.x + box.width)}" y2="${fmt(box.y)}" ` +
        `stroke="${element.color ?? STYLE_CONFIG.GRID_COLOR}" stroke-width="${element.kind === 'baseline' ? 1.2 : 0.6}"/>`
      );
    case 'x-tick':
      return `<line x1="${fmt(box.x)}" y1="${fmt(box.y)}" x2="${fmt(box.x)}" y2="${fmt(box.y + box.height)}" stroke="${element.color ?? STYLE_CONFIG.TEXT_COLOR}" stroke-width="0.8"/>`;
    case 'title':
    case 'subtitle':
    case 'y-tick-label':
    case 'inline-label':
    case 'x-tick-label':
    case 'source':
      return renderText(element);
    case 'series-line':
    case 'series-bar':
    case 'series-marker':
      // Drawn from series geometry
      return null;
  }
}

function renderSeries(series: SeriesGeometry): string[] {
  if (series.segments.length > 0) {
    const points = series.points.map((point) => `${fmt(point.x)},${fmt(point.y)}`).join(' ');
    return [
      `<polyline points="${points}" fill="none" stroke="${series.color}" stroke-width="2.2" stroke-linejoin="round"/>`,
    ];
  }
  return series.shapes.map(
    (shape) =>
      `<rect x="${fmt(shape.x)}" y="${fmt(shape.y)}" width="${fmt(shape.width)}" height="${fmt(shape.height)}" fill="${series.color}"/>`
  );
}

/**
 * Renders the layout as a standalone SVG document.
 */
export function renderChartSvg(layout: LayoutResult): string {
  const { width, height } = layout.canvas;
  const gridAndText = layout.elements.map(renderElement).filter((part): part is string => part !== null);
  const series = layout.series.flatMap(renderSeries);

  // Series go above gridlines and below labels
  const grid = gridAndText.filter((part) => part.startsWith('<line') || part.startsWith('<rect'));
  const text = gridAndText.filter((part) => part.startsWith('<text'));

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect x="0" y="0" width="${width}" height="${height}" fill="${STYLE_CONFIG.BACKGROUND_COLOR}"/>`,
    ...grid,
    ...series,
    ...text,
    '</svg>',
  ].join('\n');
}
