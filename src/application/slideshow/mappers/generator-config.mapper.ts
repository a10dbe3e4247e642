import { normalizeSeed, type GeneratorConfig } from '@domain/slideshow/index.js';

import { clamp } from '@/shared/media/numberUtils.js';

import type { TimingSettings } from '../dto/slideshow.dto.js';

/**
 * Turns user facing timing settings into a generator config. Out of range
 * freeze settings are clamped here because the generator rejects them.
 */
export function toGeneratorConfig(timing: TimingSettings): GeneratorConfig {
  const fps = Math.max(1, Math.floor(timing.fps));
  const freezeMultiplierMin = Math.max(1, timing.freezeMultiplierMin);
  const freezeMultiplierMax = Math.max(freezeMultiplierMin, timing.freezeMultiplierMax);
  const seed = timing.seed === undefined ? undefined : normalizeSeed(timing.seed);

  return {
    totalFrames: Math.max(1, Math.floor(timing.durationSeconds * fps)),
    fps,
    baseFrameDurationSeconds: timing.frameDurationSeconds,
    freezeProbability: timing.advancedTiming ? clamp(timing.freezeProbability, 0, 1) : 0,
    freezeMultiplierMin,
    freezeMultiplierMax,
    ...(seed === undefined ? {} : { seed }),
  };
}
