import {
  estimateImageRequirements,
  generate,
  isPoolSufficient,
  summarizeTimeline,
  type GeneratorConfig,
  type ImagePoolScan,
  type ImagePoolScanner,
  type ImageRequirements,
  type Timeline,
  type TimelineSummary,
} from '@domain/slideshow/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

import type { PlanTimelineCommand } from '../commands/plan-timeline.command.js';
import { planTimelineCommandSchema } from '../dto/slideshow.dto.js';
import { toGeneratorConfig } from '../mappers/generator-config.mapper.js';

import { parsePayload } from './validate-payload.js';

export interface PlanOutcome {
  readonly pool: ImagePoolScan;
  readonly config: GeneratorConfig;
  readonly timeline: Timeline<string>;
  readonly summary: TimelineSummary;
  readonly requirements: ImageRequirements;
  readonly poolSufficient: boolean;
}

export class PlanTimelineHandler {
  private readonly logger = createChildLogger({ module: 'PlanTimelineHandler' });

  public constructor(private readonly scanner: ImagePoolScanner) {}

  public async execute(command: PlanTimelineCommand): Promise<PlanOutcome> {
    const payload = parsePayload(planTimelineCommandSchema, command.payload, 'slideshow.invalid-plan-payload', this.logger);

    const pool = await this.scanner.scan(payload.inputDir);
    const config = toGeneratorConfig(payload.timing);
    const timeline = generate(config, pool.files);
    const summary = summarizeTimeline(timeline);
    const requirements = estimateImageRequirements(config);
    const poolSufficient = isPoolSufficient(requirements, pool.files.length);

    this.logger.info(
      {
        totalFrames: config.totalFrames,
        segments: summary.segmentCount,
        freezes: summary.freezeCount,
        poolSize: pool.files.length,
        poolSufficient,
      },
      'Timeline planned',
    );

    return { pool, config, timeline, summary, requirements, poolSufficient };
  }
}
