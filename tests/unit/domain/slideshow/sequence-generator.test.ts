import { describe, expect, it, vi } from 'vitest';

import {
  computeBaseDuration,
  createSeededRandom,
  EmptyPoolError,
  generate,
  InvalidConfigError,
  type GeneratorConfig,
  type Timeline,
} from '@domain/slideshow/index.js';

import { scriptedRandom } from '../../../support/scripted-random.js';

const baseConfig: GeneratorConfig = {
  totalFrames: 100,
  fps: 10,
  baseFrameDurationSeconds: 1,
  freezeProbability: 0,
  freezeMultiplierMin: 2,
  freezeMultiplierMax: 5,
};

const pool = ['a.jpg', 'b.jpg', 'c.jpg'];

function expectTiling<TImage>(timeline: Timeline<TImage>): void {
  const { segments, totalFrames } = timeline;
  expect(segments.length).toBeGreaterThan(0);
  expect(segments[0]?.startFrame).toBe(0);
  expect(segments.at(-1)?.endFrame).toBe(totalFrames);

  segments.forEach((segment, index) => {
    expect(segment.index).toBe(index);
    expect(segment.durationFrames).toBeGreaterThanOrEqual(1);
    expect(segment.endFrame - segment.startFrame).toBe(segment.durationFrames);
    const next = segments[index + 1];
    if (next) {
      expect(next.startFrame).toBe(segment.endFrame);
    }
  });
}

describe('computeBaseDuration', () => {
  it('floors seconds times fps', () => {
    expect(computeBaseDuration(1, 10)).toBe(10);
    expect(computeBaseDuration(0.55, 24)).toBe(13);
  });

  it('never goes below one frame', () => {
    expect(computeBaseDuration(0.01, 24)).toBe(1);
  });
});

describe('generate', () => {
  it('follows the draw order freeze, multiplier, image', () => {
    const random = scriptedRandom([0.9, 0, 0.1, 0.5, 0.99]);
    const timeline = generate(
      { ...baseConfig, totalFrames: 25, freezeProbability: 0.5, freezeMultiplierMin: 2, freezeMultiplierMax: 3 },
      pool,
      random,
    );

    expect(random.consumed).toBe(5);
    expect(timeline.baseDurationFrames).toBe(10);
    expect(timeline.segments).toEqual([
      {
        index: 0,
        startFrame: 0,
        endFrame: 10,
        durationFrames: 10,
        kind: 'normal',
        multiplier: 1,
        sourceImage: 'a.jpg',
        startTime: 0,
        endTime: 1,
      },
      {
        index: 1,
        startFrame: 10,
        endFrame: 25,
        durationFrames: 15,
        kind: 'freeze',
        multiplier: 2.5,
        sourceImage: 'c.jpg',
        startTime: 1,
        endTime: 2.5,
      },
    ]);
  });

  it('produces ten normal segments of ten frames for 100 frames at 10 fps', () => {
    const first = generate({ ...baseConfig, seed: 42 }, pool);
    const second = generate({ ...baseConfig, seed: 42 }, pool);

    expect(first.segments).toHaveLength(10);
    for (const segment of first.segments) {
      expect(segment.kind).toBe('normal');
      expect(segment.durationFrames).toBe(10);
      expect(pool).toContain(segment.sourceImage);
    }
    expect(second).toEqual(first);
  });

  it('matches an explicitly seeded random source', () => {
    const fromSeed = generate({ ...baseConfig, freezeProbability: 0.4, seed: 7 }, pool);
    const fromSource = generate({ ...baseConfig, freezeProbability: 0.4 }, pool, createSeededRandom(7));

    expect(fromSource).toEqual(fromSeed);
  });

  it('truncates the only segment when the budget is shorter than the base duration', () => {
    const timeline = generate({ ...baseConfig, totalFrames: 7, seed: 1 }, pool);

    expect(timeline.segments).toHaveLength(1);
    expect(timeline.segments[0]).toMatchObject({ startFrame: 0, endFrame: 7, durationFrames: 7, kind: 'normal' });
  });

  it('truncates a freeze segment at the end of the timeline', () => {
    const random = scriptedRandom([0.9, 0.2, 0.1, 1 - Number.EPSILON, 0.5]);
    const timeline = generate(
      { ...baseConfig, totalFrames: 30, freezeProbability: 0.5, freezeMultiplierMin: 4, freezeMultiplierMax: 5 },
      pool,
      random,
    );

    expect(timeline.segments.map((segment) => [segment.kind, segment.durationFrames])).toEqual([
      ['normal', 10],
      ['freeze', 20],
    ]);
    expect(timeline.segments[1]?.multiplier).toBeCloseTo(5, 10);
    expect(timeline.segments[1]?.sourceImage).toBe('b.jpg');
  });

  it('returns a single one-frame segment for a one-frame budget', () => {
    const timeline = generate({ ...baseConfig, totalFrames: 1, freezeProbability: 1, seed: 3 }, pool);

    expect(timeline.segments).toHaveLength(1);
    expect(timeline.segments[0]).toMatchObject({ startFrame: 0, endFrame: 1, durationFrames: 1 });
  });

  it('keeps base-length segments without freezes, except a truncated tail', () => {
    const timeline = generate({ ...baseConfig, totalFrames: 95, fps: 24, baseFrameDurationSeconds: 0.5, seed: 9 }, pool);

    const durations = timeline.segments.map((segment) => segment.durationFrames);
    expect(durations).toEqual([12, 12, 12, 12, 12, 12, 12, 11]);
    expect(timeline.segments.every((segment) => segment.kind === 'normal' && segment.multiplier === 1)).toBe(true);
  });

  it('uses one-frame segments when the base duration rounds down to zero', () => {
    const timeline = generate({ ...baseConfig, totalFrames: 5, fps: 24, baseFrameDurationSeconds: 0.01, seed: 2 }, pool);

    expect(timeline.baseDurationFrames).toBe(1);
    expect(timeline.segments.map((segment) => segment.durationFrames)).toEqual([1, 1, 1, 1, 1]);
  });

  it('marks every segment as freeze when the probability is one', () => {
    const timeline = generate(
      { ...baseConfig, totalFrames: 40, freezeProbability: 1, freezeMultiplierMin: 1, freezeMultiplierMax: 1, seed: 11 },
      pool,
    );

    expect(timeline.segments).toHaveLength(4);
    expect(timeline.segments.every((segment) => segment.kind === 'freeze' && segment.durationFrames === 10)).toBe(true);
  });

  it('allows the same image on consecutive segments', () => {
    const random = scriptedRandom([0.5, 0.1, 0.5, 0.2]);
    const timeline = generate({ ...baseConfig, totalFrames: 20 }, pool, random);

    expect(timeline.segments.map((segment) => segment.sourceImage)).toEqual(['a.jpg', 'a.jpg']);
  });

  it('tiles the timeline for a wide range of seeded configurations', () => {
    for (let seed = 1; seed <= 40; seed += 1) {
      const config: GeneratorConfig = {
        totalFrames: 37 + seed * 13,
        fps: 12 + (seed % 5) * 6,
        baseFrameDurationSeconds: 0.25 + (seed % 4) * 0.5,
        freezeProbability: (seed % 6) / 5,
        freezeMultiplierMin: 1 + (seed % 3),
        freezeMultiplierMax: 4 + (seed % 3),
        seed,
      };

      const timeline = generate(config, pool);
      expectTiling(timeline);
      expect(timeline).toEqual(generate(config, pool));
    }
  });

  it('accepts any image reference type', () => {
    const images = [{ id: 1 }, { id: 2 }];
    const timeline = generate({ ...baseConfig, totalFrames: 10 }, images, scriptedRandom([0.5, 0.7]));

    expect(timeline.segments[0]?.sourceImage).toBe(images[1]);
  });

  it('returns a frozen timeline', () => {
    const timeline = generate({ ...baseConfig, seed: 5 }, pool);

    expect(Object.isFrozen(timeline)).toBe(true);
    expect(Object.isFrozen(timeline.segments)).toBe(true);
    expect(Object.isFrozen(timeline.segments[0])).toBe(true);
  });

  const invalidCases: Array<[string, Partial<GeneratorConfig>, keyof GeneratorConfig]> = [
    ['zero frames', { totalFrames: 0 }, 'totalFrames'],
    ['negative frames', { totalFrames: -3 }, 'totalFrames'],
    ['fractional frames', { totalFrames: 12.5 }, 'totalFrames'],
    ['fps below one', { fps: 0 }, 'fps'],
    ['zero image duration', { baseFrameDurationSeconds: 0 }, 'baseFrameDurationSeconds'],
    ['probability above one', { freezeProbability: 1.2 }, 'freezeProbability'],
    ['negative probability', { freezeProbability: -0.1 }, 'freezeProbability'],
    ['NaN probability', { freezeProbability: Number.NaN }, 'freezeProbability'],
    ['multiplier below one', { freezeMultiplierMin: 0.5 }, 'freezeMultiplierMin'],
    ['inverted multiplier range', { freezeMultiplierMin: 4, freezeMultiplierMax: 3 }, 'freezeMultiplierMax'],
    ['fractional seed', { seed: 1.5 }, 'seed'],
  ];

  it.each(invalidCases)('rejects %s', (_label, override, field) => {
    const random = { next: vi.fn(() => 0.5) };

    let caught: unknown;
    try {
      generate({ ...baseConfig, ...override }, pool, random);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidConfigError);
    if (caught instanceof InvalidConfigError) {
      expect(caught.violations.map((violation) => violation.field)).toContain(field);
      expect(caught.code).toBe('sequence.invalid-config');
    }
    expect(random.next).not.toHaveBeenCalled();
  });

  it('rejects an empty pool without drawing', () => {
    const random = { next: vi.fn(() => 0.5) };

    expect(() => generate(baseConfig, [], random)).toThrow(EmptyPoolError);
    expect(random.next).not.toHaveBeenCalled();
  });

  it('reports configuration errors before an empty pool', () => {
    expect(() => generate({ ...baseConfig, totalFrames: 0 }, [])).toThrow(InvalidConfigError);
  });
});
