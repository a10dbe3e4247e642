import { EmptyPoolError, InvalidConfigError, type ConfigViolation } from '../errors/sequence-errors.js';
import type { GeneratorConfig } from '../value-objects/generator-config.js';
import type { Segment, SegmentKind, Timeline } from '../value-objects/timeline.js';

import { createRandomSource, pickIndex, uniform, type RandomSource } from './random-source.js';

export function computeBaseDuration(baseFrameDurationSeconds: number, fps: number): number {
  return Math.max(1, Math.floor(baseFrameDurationSeconds * fps));
}

export function validateGeneratorConfig(config: GeneratorConfig): ConfigViolation[] {
  const violations: ConfigViolation[] = [];

  if (!Number.isInteger(config.totalFrames) || config.totalFrames < 1) {
    violations.push({ field: 'totalFrames', reason: 'must be an integer >= 1' });
  }

  if (!Number.isFinite(config.fps) || config.fps < 1) {
    violations.push({ field: 'fps', reason: 'must be >= 1' });
  }

  if (!Number.isFinite(config.baseFrameDurationSeconds) || config.baseFrameDurationSeconds <= 0) {
    violations.push({ field: 'baseFrameDurationSeconds', reason: 'must be > 0' });
  }

  if (
    !Number.isFinite(config.freezeProbability)
    || config.freezeProbability < 0
    || config.freezeProbability > 1
  ) {
    violations.push({ field: 'freezeProbability', reason: 'must be within [0, 1]' });
  }

  if (!Number.isFinite(config.freezeMultiplierMin) || config.freezeMultiplierMin < 1) {
    violations.push({ field: 'freezeMultiplierMin', reason: 'must be >= 1' });
  }

  if (!Number.isFinite(config.freezeMultiplierMax) || config.freezeMultiplierMax < 1) {
    violations.push({ field: 'freezeMultiplierMax', reason: 'must be >= 1' });
  } else if (config.freezeMultiplierMax < config.freezeMultiplierMin) {
    violations.push({ field: 'freezeMultiplierMax', reason: 'must be >= freezeMultiplierMin' });
  }

  if (config.seed !== undefined && !Number.isInteger(config.seed)) {
    violations.push({ field: 'seed', reason: 'must be an integer' });
  }

  return violations;
}

/**
 * Plans which image is shown for how many frames.
 *
 * Per segment the random stream is consumed in a fixed order: the freeze draw,
 * the multiplier draw (freeze segments only), then the image draw. The last
 * segment is truncated so the timeline ends exactly at `totalFrames`.
 *
 * @param random overrides the source derived from `config.seed`
 */
export function generate<TImage>(
  config: GeneratorConfig,
  pool: readonly TImage[],
  random: RandomSource = createRandomSource(config.seed),
): Timeline<TImage> {
  const violations = validateGeneratorConfig(config);
  if (violations.length > 0) {
    throw new InvalidConfigError(violations);
  }

  if (pool.length === 0) {
    throw new EmptyPoolError();
  }

  const { totalFrames, fps, freezeProbability } = config;
  const baseDuration = computeBaseDuration(config.baseFrameDurationSeconds, fps);
  const segments: Segment<TImage>[] = [];
  let cursor = 0;

  while (cursor < totalFrames) {
    let kind: SegmentKind = 'normal';
    let multiplier = 1;
    let rawDuration = baseDuration;

    if (random.next() < freezeProbability) {
      kind = 'freeze';
      multiplier = uniform(random, config.freezeMultiplierMin, config.freezeMultiplierMax);
      rawDuration = Math.floor(baseDuration * multiplier);
    }

    const duration = Math.min(rawDuration, totalFrames - cursor);
    if (duration <= 0) {
      break;
    }

    const pickedIndex = pickIndex(random, pool.length);
    const sourceImage = pool[pickedIndex];
    if (sourceImage === undefined) {
      throw new EmptyPoolError({ pickedIndex, poolSize: pool.length });
    }

    const endFrame = cursor + duration;

    segments.push(
      Object.freeze({
        index: segments.length,
        startFrame: cursor,
        endFrame,
        durationFrames: duration,
        kind,
        multiplier,
        sourceImage,
        startTime: cursor / fps,
        endTime: endFrame / fps,
      }),
    );

    cursor = endFrame;
  }

  return Object.freeze({
    totalFrames,
    fps,
    baseDurationFrames: baseDuration,
    segments: Object.freeze(segments),
  });
}
