import type { PlanOutcome, RenderSlideshowOutcome } from '@/application/slideshow/index.js';
import { roundToPrecision } from '@/shared/media/numberUtils.js';

export function formatPlanReport(plan: PlanOutcome): string {
  const { config, requirements, summary, pool, poolSufficient } = plan;
  const poolSize = pool.files.length;
  const lines = [
    '=== VIDEO SPECIFICATIONS ===',
    `Duration: ${roundToPrecision(config.totalFrames / config.fps, 2)}s @ ${config.fps}fps`,
    `Total Frames: ${config.totalFrames}`,
    '',
    '=== IMAGE TIMING ===',
    `Image Duration: ${Math.max(config.baseFrameDurationSeconds, 1 / config.fps).toFixed(2)}s`,
    `Frames per Image: ${requirements.baseDurationFrames}`,
  ];

  if (requirements.mode === 'freeze') {
    lines.push(
      '',
      '=== FREEZE FRAMES ===',
      `Freeze Chance: ${Math.floor(config.freezeProbability * 100)}%`,
      `Expected Freezes: ~${requirements.expectedFreezes}`,
      `Duration Range: ${config.freezeMultiplierMin.toFixed(1)}x - ${config.freezeMultiplierMax.toFixed(1)}x`,
      '',
      '=== REQUIREMENTS ===',
      `Recommended: ${requirements.expectedImages}+ images`,
      `Minimum: ${requirements.minimumImages} images`,
      poolSufficient ? `Current: ${poolSize} images` : `Current: ${poolSize} images (low)`,
    );
  } else {
    lines.push(
      '',
      '=== REQUIREMENTS ===',
      `Images Needed: ${requirements.imagesNeeded}`,
      poolSufficient ? `Current: ${poolSize} images` : `Current: ${poolSize} images (will repeat)`,
    );
  }

  lines.push(
    '',
    '=== TIMELINE ===',
    `Images: ${summary.segmentCount} | Normal: ${summary.normalCount} (${summary.normalFrames}f) | Freeze: ${summary.freezeCount} (${summary.freezeFrames}f)`,
    `Unique images used: ${summary.uniqueImages} of ${poolSize}`,
  );

  return lines.join('\n');
}

export function formatPlanJson(plan: PlanOutcome): string {
  return JSON.stringify(
    {
      config: plan.config,
      requirements: plan.requirements,
      summary: plan.summary,
      segments: plan.timeline.segments,
    },
    null,
    2,
  );
}

export function formatRenderSummary(outcome: RenderSlideshowOutcome): string {
  const sizeMb = roundToPrecision(outcome.sizeBytes / 1024 / 1024, 1);
  const lines = [
    `Video written to ${outcome.outputPath}`,
    `Frames: ${outcome.frameCount} | Images: ${outcome.summary.segmentCount} | Freezes: ${outcome.summary.freezeCount}`,
    `Size: ${sizeMb} MB`,
  ];
  if (outcome.exceedsSizeLimit) {
    lines.push('Warning: the file exceeds the 100 MB upload limit of most social platforms');
  }
  return lines.join('\n');
}

export function formatProgressBar(percent: number, width = 30): string {
  const bounded = Math.max(0, Math.min(100, percent));
  const filled = Math.round((bounded / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${Math.floor(bounded)}%`;
}
