import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const sharpMock = vi.hoisted(() => vi.fn());

vi.mock('sharp', () => ({ default: sharpMock }));

import { exportChart } from '../../../src/ai/articles/chart/chart-exporter';
import { layoutChart } from '../../../src/ai/articles/chart/layout-engine';
import type { ChartSpec } from '../../../src/ai/articles/chart/types';

const spec: ChartSpec = {
  title: 'Share of CI runs hit by flaky tests',
  subtitle: '% of runs',
  type: 'line',
  categories: ['2023', '2024'],
  series: [{ name: 'Flaky runs', values: [20, 35] }],
  sourceLine: 'Source: Example CI survey, 2025',
};

const PNG_BYTES = Buffer.from('fake-png');

describe('exportChart', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chart-export-'));
    sharpMock.mockReset();
    sharpMock.mockImplementation(() => ({
      png: () => ({ toBuffer: () => Promise.resolve(PNG_BYTES) }),
      metadata: () => Promise.resolve({ format: 'png', width: 1600, height: 1100 }),
    }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the PNG and its spec side by side', async () => {
    const ref = await exportChart(spec, layoutChart(spec), {
      slug: 'session-1',
      chartsDir: dir,
      publicPathPrefix: '/assets/charts/',
      scale: 2,
    });

    expect(ref).toEqual({
      fileName: 'session-1.png',
      imagePath: join(dir, 'session-1.png'),
      specPath: join(dir, 'session-1.json'),
      publicPath: '/assets/charts/session-1.png',
      format: 'png',
      width: 1600,
      height: 1100,
      bytes: PNG_BYTES.length,
    });
    expect(await readFile(ref.imagePath)).toEqual(PNG_BYTES);
    expect(JSON.parse(await readFile(ref.specPath, 'utf-8'))).toEqual(spec);
  });

  it('renders the SVG at the requested scale', async () => {
    await exportChart(spec, layoutChart(spec), {
      slug: 'chart',
      chartsDir: dir,
      publicPathPrefix: '/assets/charts',
      scale: 2,
    });

    const [input, options] = sharpMock.mock.calls[0];
    expect(String(input)).toMatch(/^<svg /);
    expect(options).toEqual({ density: 144 });
  });
});
