import { roundToPrecision } from '@/shared/media/numberUtils.js';

import type { GeneratorConfig } from '../value-objects/generator-config.js';
import type { Timeline } from '../value-objects/timeline.js';

import { computeBaseDuration } from './sequence-generator.js';

const MINIMUM_RECOMMENDED_POOL = 10;

/** Segment display lengths, in seconds. */
export interface SegmentLengthStats {
  readonly averageSeconds: number;
  readonly minSeconds: number;
  readonly maxSeconds: number;
  readonly stdDeviationSeconds: number;
}

export interface TimelineSummary {
  readonly segmentCount: number;
  readonly normalCount: number;
  readonly freezeCount: number;
  readonly normalFrames: number;
  readonly freezeFrames: number;
  readonly uniqueImages: number;
  readonly durationSeconds: number;
  readonly segmentLength: SegmentLengthStats;
}

export type ImageRequirements =
  | {
      readonly mode: 'simple';
      readonly baseDurationFrames: number;
      readonly imagesNeeded: number;
    }
  | {
      readonly mode: 'freeze';
      readonly baseDurationFrames: number;
      readonly averageFramesPerImage: number;
      readonly expectedImages: number;
      readonly expectedFreezes: number;
      readonly minimumImages: number;
    };

export function summarizeTimeline<TImage>(timeline: Timeline<TImage>): TimelineSummary {
  let normalCount = 0;
  let freezeCount = 0;
  let normalFrames = 0;
  let freezeFrames = 0;

  for (const segment of timeline.segments) {
    if (segment.kind === 'freeze') {
      freezeCount += 1;
      freezeFrames += segment.durationFrames;
    } else {
      normalCount += 1;
      normalFrames += segment.durationFrames;
    }
  }

  return {
    segmentCount: timeline.segments.length,
    normalCount,
    freezeCount,
    normalFrames,
    freezeFrames,
    uniqueImages: new Set(timeline.segments.map((segment) => segment.sourceImage)).size,
    durationSeconds: roundToPrecision(timeline.totalFrames / timeline.fps, 3),
    segmentLength: measureSegmentLengths(
      timeline.segments.map((segment) => segment.durationFrames),
      timeline.fps,
    ),
  };
}

function measureSegmentLengths(durations: readonly number[], fps: number): SegmentLengthStats {
  if (durations.length === 0) {
    return { averageSeconds: 0, minSeconds: 0, maxSeconds: 0, stdDeviationSeconds: 0 };
  }

  let total = 0;
  let shortest = Number.POSITIVE_INFINITY;
  let longest = 0;
  for (const frames of durations) {
    total += frames;
    shortest = Math.min(shortest, frames);
    longest = Math.max(longest, frames);
  }

  const mean = total / durations.length;
  let squaredDeviation = 0;
  for (const frames of durations) {
    squaredDeviation += (frames - mean) ** 2;
  }

  const seconds = (frames: number): number => roundToPrecision(frames / fps, 3);

  return {
    averageSeconds: seconds(mean),
    minSeconds: seconds(shortest),
    maxSeconds: seconds(longest),
    stdDeviationSeconds: seconds(Math.sqrt(squaredDeviation / durations.length)),
  };
}

/**
 * Rough pool size guidance. Freeze mode uses the expected segment length,
 * so the figures are estimates rather than guarantees.
 */
export function estimateImageRequirements(config: GeneratorConfig): ImageRequirements {
  const base = computeBaseDuration(config.baseFrameDurationSeconds, config.fps);

  if (config.freezeProbability <= 0) {
    return {
      mode: 'simple',
      baseDurationFrames: base,
      imagesNeeded: Math.ceil(config.totalFrames / base),
    };
  }

  const probability = config.freezeProbability;
  const averageMultiplier = (config.freezeMultiplierMin + config.freezeMultiplierMax) / 2;
  const averageFramesPerImage = base * (1 - probability) + base * averageMultiplier * probability;
  const expectedImages = Math.floor(config.totalFrames / averageFramesPerImage);

  return {
    mode: 'freeze',
    baseDurationFrames: base,
    averageFramesPerImage: roundToPrecision(averageFramesPerImage, 3),
    expectedImages,
    expectedFreezes: Math.floor(expectedImages * probability),
    minimumImages: Math.max(
      MINIMUM_RECOMMENDED_POOL,
      Math.floor(config.totalFrames / (base * config.freezeMultiplierMax)),
    ),
  };
}

export function isPoolSufficient(requirements: ImageRequirements, poolSize: number): boolean {
  return requirements.mode === 'simple'
    ? poolSize >= requirements.imagesNeeded
    : poolSize >= requirements.minimumImages;
}
