import { z } from 'zod';

import { env } from '@/shared/config/env.js';

export const timingSettingsSchema = z.object({
  durationSeconds: z.number().finite().positive().max(24 * 60 * 60).default(45),
  fps: z.number().int().min(1).max(240).default(24),
  frameDurationSeconds: z.number().finite().positive().default(1),
  advancedTiming: z.boolean().default(true),
  freezeProbability: z.number().finite().default(0.15),
  freezeMultiplierMin: z.number().finite().default(2),
  freezeMultiplierMax: z.number().finite().default(5),
  seed: z.union([z.number().int(), z.string()]).optional(),
});

export const outputSettingsSchema = z.object({
  style: z.enum(['color', 'bw']).default('color'),
  targetSize: z.number().int().min(16).max(4096).default(1080),
});

export const cacheSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  directory: z.string().min(1).default(env.REELSHUFFLE_CACHE_DIR),
});

export const planTimelineCommandSchema = z.object({
  inputDir: z.string().min(1),
  timing: timingSettingsSchema.default({}),
});

export const renderSlideshowCommandSchema = planTimelineCommandSchema.extend({
  outputPath: z.string().min(1).default('animation.mp4'),
  output: outputSettingsSchema.default({}),
  cache: cacheSettingsSchema.default({}),
});

export type TimingSettings = z.output<typeof timingSettingsSchema>;
export type PlanTimelineInput = z.input<typeof planTimelineCommandSchema>;
export type PlanTimelinePayload = z.output<typeof planTimelineCommandSchema>;
export type RenderSlideshowInput = z.input<typeof renderSlideshowCommandSchema>;
export type RenderSlideshowPayload = z.output<typeof renderSlideshowCommandSchema>;
