/**
 * Chart Exporter
 *
 * Rasterises a laid-out chart to PNG with sharp and persists it next to the
 * ChartSpec it was drawn from (`<slug>.png` + `<slug>.json`).
 */

import { join } from 'node:path';
import sharp from 'sharp';

import type { Logger } from '../../../utils/logger';
import { writeFileAtomic } from '../services/atomic-write';
import { renderChartSvg } from './svg-renderer';
import type { ChartSpec, LayoutResult } from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Reference to an exported chart. `publicPath` is what the article embeds.
 */
export interface ChartImageRef {
  readonly fileName: string;
  readonly imagePath: string;
  readonly specPath: string;
  readonly publicPath: string;
  readonly format: string;
  readonly width: number;
  readonly height: number;
  readonly bytes: number;
}

export interface ExportChartOptions {
  /** File stem, already slugified */
  readonly slug: string;
  readonly chartsDir: string;
  /** URL prefix the charts directory is served under */
  readonly publicPathPrefix: string;
  /** Raster scale relative to the layout canvas */
  readonly scale: number;
  readonly logger?: Logger;
}

/** sharp renders SVG at 72 DPI by default */
const SVG_BASE_DENSITY = 72;

// ============================================================================
// Export
// ============================================================================

export async function exportChart(
  spec: ChartSpec,
  layout: LayoutResult,
  options: ExportChartOptions
): Promise<ChartImageRef> {
  const { slug, chartsDir, publicPathPrefix, scale, logger } = options;
  const svg = renderChartSvg(layout);

  const png = await sharp(Buffer.from(svg), { density: SVG_BASE_DENSITY * scale }).png().toBuffer();
  const metadata = await sharp(png).metadata();

  const fileName = `${slug}.png`;
  const imagePath = join(chartsDir, fileName);
  const specPath = join(chartsDir, `${slug}.json`);

  await writeFileAtomic(imagePath, png);
  await writeFileAtomic(specPath, `${JSON.stringify(spec, null, 2)}\n`);

  logger?.info(
    `[ChartExporter] Wrote ${fileName} (${metadata.width ?? '?'}x${metadata.height ?? '?'}, ${png.length} bytes)`
  );

  return {
    fileName,
    imagePath,
    specPath,
    publicPath: `${publicPathPrefix.replace(/\/$/, '')}/${fileName}`,
    format: metadata.format ?? 'unknown',
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    bytes: png.length,
  };
}
