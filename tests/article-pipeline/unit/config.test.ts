import { describe, it, expect } from 'vitest';
import { join } from 'node:path';

import {
  ConfigValidationError,
  createPipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
  LAYOUT_ZONES,
  loadPipelineConfigFromEnv,
  pathsUnder,
  RETRY_CONFIG,
  validateZones,
} from '../../../src/ai/articles/config';

describe('DEFAULT_PIPELINE_CONFIG', () => {
  it('retries three times with a one second base delay', () => {
    expect(DEFAULT_PIPELINE_CONFIG.retry).toEqual({
      maxAttempts: RETRY_CONFIG.MAX_ATTEMPTS,
      baseDelayMs: 1000,
      maxDelayMs: 10000,
      jitterRatio: 0,
    });
  });

  it('requires every voter for quorum', () => {
    expect(DEFAULT_PIPELINE_CONFIG.consensus.minQuorumFraction).toBe(1);
  });

  it('declares the five zones top to bottom without overlap', () => {
    expect(LAYOUT_ZONES.map((zone) => zone.name)).toEqual(['RedBar', 'Title', 'PlotArea', 'XAxis', 'Source']);
    expect(() => validateZones(LAYOUT_ZONES)).not.toThrow();
  });
});

describe('validateZones', () => {
  it('rejects overlapping zones', () => {
    const zones = LAYOUT_ZONES.map((zone) => (zone.name === 'XAxis' ? { ...zone, yMax: 0.2 } : zone));
    expect(() => validateZones(zones)).toThrow('zones XAxis [0.08, 0.2) and PlotArea [0.15, 0.78) overlap');
  });

  it('rejects missing and duplicate zones', () => {
    expect(() => validateZones(LAYOUT_ZONES.filter((zone) => zone.name !== 'Source'))).toThrow(
      'zone Source must be declared exactly once (found 0)'
    );
    expect(() => validateZones([...LAYOUT_ZONES, LAYOUT_ZONES[0]])).toThrow(
      'zone RedBar must be declared exactly once (found 2)'
    );
  });

  it('rejects empty zones', () => {
    const zones = LAYOUT_ZONES.map((zone) => (zone.name === 'Title' ? { ...zone, yMin: 0.94 } : zone));
    expect(() => validateZones(zones)).toThrow('zone Title is empty ([0.94, 0.94))');
  });
});

describe('createPipelineConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(createPipelineConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('merges nested overrides and ignores undefined values', () => {
    const config = createPipelineConfig({
      retry: { maxAttempts: 5, baseDelayMs: undefined },
      oracle: { temperatures: { vote: 0 } },
      layout: { labels: { maxNudges: 2 } },
    });

    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.baseDelayMs).toBe(1000);
    expect(config.oracle.temperatures).toEqual({ discover: 0.7, vote: 0, research: 0.2, write: 0.7 });
    expect(config.layout.labels.maxNudges).toBe(2);
    expect(config.layout.labels.gapPx).toBe(6);
  });

  it('rejects invalid values', () => {
    expect(() => createPipelineConfig({ retry: { maxAttempts: 0 } })).toThrow(ConfigValidationError);
    expect(() => createPipelineConfig({ retry: { maxAttempts: 0 } })).toThrow(
      'Pipeline config error: retry.maxAttempts must be a positive integer (got 0)'
    );
    expect(() => createPipelineConfig({ retry: { baseDelayMs: 20000 } })).toThrow(
      'retry.baseDelayMs (20000) cannot be greater than retry.maxDelayMs (10000)'
    );
    expect(() => createPipelineConfig({ oracle: { temperatures: { write: 3 } } })).toThrow(
      'oracle.temperatures.write must be between 0 and 2 (got 3)'
    );
    expect(() => createPipelineConfig({ consensus: { voterWeights: { skeptic: 0 } } })).toThrow(
      'consensus.voterWeights.skeptic must be positive (got 0)'
    );
  });
});

describe('pathsUnder', () => {
  it('roots every output directory', () => {
    expect(pathsUnder('/tmp/out')).toEqual({
      postsDir: join('/tmp/out', '_posts'),
      chartsDir: join('/tmp/out', 'assets', 'charts'),
      chartPublicPath: '/assets/charts',
      quarantineDir: join('/tmp/out', 'quarantine'),
      sessionsDir: join('/tmp/out', 'sessions'),
    });
  });
});

describe('loadPipelineConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadPipelineConfigFromEnv({})).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('reads numeric overrides and the output directory', () => {
    const config = loadPipelineConfigFromEnv({
      PIPELINE_OUTPUT_DIR: '/srv/articles',
      PIPELINE_MAX_ATTEMPTS: '5',
      PIPELINE_MIN_QUORUM: '0.5',
      PIPELINE_LABEL_FAILURE_MODE: 'throw',
    });

    expect(config.retry.maxAttempts).toBe(5);
    expect(config.consensus.minQuorumFraction).toBe(0.5);
    expect(config.layout.labelFailureMode).toBe('throw');
    expect(config.paths.quarantineDir).toBe(join('/srv/articles', 'quarantine'));
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadPipelineConfigFromEnv({ PIPELINE_MAX_ATTEMPTS: 'three' })).toThrow(
      /^Pipeline config error: invalid environment \(PIPELINE_MAX_ATTEMPTS: /
    );
  });
});
