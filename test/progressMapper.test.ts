import { describe, expect, it } from 'vitest';

import { DEFAULT_STAGE_WEIGHTS, type StageWeights } from '../src/config.js';
import { isIngestError } from '../src/errors.js';
import { ProgressMapper } from '../src/progress/progressMapper.js';

describe('ProgressMapper', () => {
  it('interpolates stage-local percentages into the default bands', () => {
    expect(new ProgressMapper().mapProgress('initialize', 0)).toBe(0);
    expect(new ProgressMapper().mapProgress('initialize', 100)).toBe(5);
    expect(new ProgressMapper().mapProgress('fetch', 50)).toBe(23);
    expect(new ProgressMapper().mapProgress('process', 0)).toBe(40);
    expect(new ProgressMapper().mapProgress('extract', 50)).toBe(80);
    expect(new ProgressMapper().mapProgress('finalize', 100)).toBe(100);
  });

  it('never returns a value below the last one', () => {
    const mapper = new ProgressMapper();

    expect(mapper.mapProgress('fetch', 50)).toBe(23);
    expect(mapper.mapProgress('fetch', 10)).toBe(23);
    expect(mapper.mapProgress('initialize', 100)).toBe(23);
    expect(mapper.mapProgress('process', 0)).toBe(40);
    expect(mapper.getCurrentProgress()).toBe(40);
    expect(mapper.getCurrentStage()).toBe('process');
  });

  it('clamps out-of-range local values', () => {
    const mapper = new ProgressMapper();

    expect(mapper.mapProgress('fetch', -20)).toBe(5);
    expect(mapper.mapProgress('fetch', 150)).toBe(40);
    expect(new ProgressMapper().mapProgress('fetch', Number.NaN)).toBe(5);
  });

  it('maps completed to 100 and keeps the last value for other terminal states', () => {
    const failed = new ProgressMapper();
    failed.mapProgress('process', 50);
    expect(failed.mapProgress('failed', 0)).toBe(55);
    expect(failed.getCurrentStage()).toBe('failed');

    const cancelled = new ProgressMapper();
    cancelled.mapProgress('extract', 0);
    expect(cancelled.mapProgress('cancelled', 80)).toBe(70);

    const completed = new ProgressMapper();
    completed.mapProgress('fetch', 10);
    expect(completed.mapProgress('completed', 0)).toBe(100);
  });

  it('keeps the last value for statuses without a band', () => {
    const mapper = new ProgressMapper();
    mapper.mapProgress('fetch', 100);

    expect(mapper.mapProgress('pending', 100)).toBe(40);
  });

  it('accepts custom bands', () => {
    const weights: StageWeights = {
      initialize: [0, 10],
      fetch: [10, 20],
      process: [20, 60],
      extract: [60, 80],
      finalize: [80, 100],
    };
    const mapper = new ProgressMapper(weights);

    expect(mapper.mapProgress('process', 50)).toBe(40);
    expect(mapper.bandOf('extract')).toEqual([60, 80]);
  });

  it.each<[string, StageWeights, string]>([
    ['overlapping', { ...DEFAULT_STAGE_WEIGHTS, fetch: [4, 40] }, 'overlaps the previous stage'],
    ['inverted', { ...DEFAULT_STAGE_WEIGHTS, process: [60, 50] }, 'starts after it ends'],
    ['out of range', { ...DEFAULT_STAGE_WEIGHTS, finalize: [90, 120] }, 'must lie within 0-100'],
  ])('rejects %s bands', (_label, weights, fragment) => {
    let thrown: unknown;
    try {
      new ProgressMapper(weights);
    } catch (error) {
      thrown = error;
    }

    expect(isIngestError(thrown) && thrown.kind).toBe('config');
    expect(thrown instanceof Error ? thrown.message : '').toContain(fragment);
  });
});
