import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import {
  generate,
  RenderCancelledError,
  summarizeTimeline,
  type FrameMaterializerFactory,
  type ImagePoolScanner,
  type TimelineSummary,
  type VideoEncoder,
} from '@domain/slideshow/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { roundToPrecision } from '@/shared/media/numberUtils.js';

import type { RenderSlideshowCommand } from '../commands/render-slideshow.command.js';
import { renderSlideshowCommandSchema } from '../dto/slideshow.dto.js';
import { toGeneratorConfig } from '../mappers/generator-config.mapper.js';

import { parsePayload } from './validate-payload.js';

/** Progress bar boundaries: preparing up to 10 %, materializing up to 80 %, encoding the rest. */
const PREPARE_END = 10;
const MATERIALIZE_END = 80;

export type RenderPhase = 'preparing' | 'materializing' | 'encoding' | 'complete';

export interface RenderProgress {
  readonly phase: RenderPhase;
  readonly percent: number;
  readonly completedFrames: number;
  readonly totalFrames: number;
}

export interface RenderExecutionOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: RenderProgress) => void;
}

export interface RenderMetrics {
  readonly prepareTimeMs: number;
  readonly materializeTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
}

export interface RenderSlideshowOutcome {
  readonly outputPath: string;
  readonly sizeBytes: number;
  readonly exceedsSizeLimit: boolean;
  readonly frameCount: number;
  readonly summary: TimelineSummary;
  readonly metrics: RenderMetrics;
}

export interface RenderSlideshowDependencies {
  readonly scanner: ImagePoolScanner;
  readonly materializers: FrameMaterializerFactory;
  readonly encoder: VideoEncoder;
}

export class RenderSlideshowHandler {
  private readonly logger = createChildLogger({ module: 'RenderSlideshowHandler' });

  public constructor(private readonly dependencies: RenderSlideshowDependencies) {}

  public async execute(
    command: RenderSlideshowCommand,
    options: RenderExecutionOptions = {},
  ): Promise<RenderSlideshowOutcome> {
    const startedAt = performance.now();
    const { signal, onProgress } = options;
    const payload = parsePayload(
      renderSlideshowCommandSchema,
      command.payload,
      'slideshow.invalid-render-payload',
      this.logger,
    );

    const pool = await this.dependencies.scanner.scan(payload.inputDir);
    const config = toGeneratorConfig(payload.timing);
    const timeline = generate(config, pool.files);
    const summary = summarizeTimeline(timeline);
    const totalFrames = timeline.totalFrames;

    this.logger.info(
      {
        inputDir: pool.directory,
        outputPath: payload.outputPath,
        poolSize: pool.files.length,
        totalFrames,
        fps: config.fps,
        segments: summary.segmentCount,
        freezes: summary.freezeCount,
        seed: config.seed ?? null,
        style: payload.output.style,
        cache: payload.cache.enabled ? payload.cache.directory : false,
      },
      'Starting slideshow render',
    );

    const report = (phase: RenderPhase, percent: number, completedFrames: number): void => {
      onProgress?.({ phase, percent: roundToPrecision(percent, 1), completedFrames, totalFrames });
    };

    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reelshuffle-'));

    try {
      report('preparing', 0, 0);
      const prepareStarted = performance.now();
      const materializer = this.dependencies.materializers.create({
        useCache: payload.cache.enabled,
        cacheDir: payload.cache.directory,
        processing: { targetSize: payload.output.targetSize, style: payload.output.style },
      });
      await materializer.prepare(pool.files, {
        signal,
        onProgress: (progress) => {
          report('preparing', (progress.processed / progress.total) * PREPARE_END, 0);
        },
      });
      const prepareTimeMs = performance.now() - prepareStarted;

      const materializeStarted = performance.now();
      const frames = await materializer.materialize(timeline, {
        outputDir: workDir,
        signal,
        onProgress: (progress) => {
          report(
            'materializing',
            PREPARE_END + (progress.completedFrames / progress.totalFrames) * (MATERIALIZE_END - PREPARE_END),
            progress.completedFrames,
          );
        },
      });
      const materializeTimeMs = performance.now() - materializeStarted;

      const encodeStarted = performance.now();
      const encoded = await this.dependencies.encoder.encode({
        frameDir: frames.frameDir,
        framePattern: frames.framePattern,
        outputPath: payload.outputPath,
        fps: config.fps,
        frameCount: frames.frameCount,
        signal,
        onProgress: (progress) => {
          report(
            'encoding',
            MATERIALIZE_END + (progress.encodedFrames / progress.totalFrames) * (100 - MATERIALIZE_END),
            frames.frameCount,
          );
        },
      });
      const encodeTimeMs = performance.now() - encodeStarted;

      report('complete', 100, frames.frameCount);

      const outcome: RenderSlideshowOutcome = {
        outputPath: encoded.outputPath,
        sizeBytes: encoded.sizeBytes,
        exceedsSizeLimit: encoded.exceedsSizeLimit,
        frameCount: frames.frameCount,
        summary,
        metrics: {
          prepareTimeMs,
          materializeTimeMs,
          encodeTimeMs,
          totalTimeMs: performance.now() - startedAt,
        },
      };

      this.logger.info(
        {
          outputPath: outcome.outputPath,
          sizeBytes: outcome.sizeBytes,
          frames: outcome.frameCount,
          durationMs: outcome.metrics.totalTimeMs,
        },
        'Slideshow render completed',
      );

      return outcome;
    } catch (error) {
      if (error instanceof RenderCancelledError) {
        this.logger.warn({ metadata: error.metadata }, 'Slideshow render cancelled');
        throw error;
      }

      this.logger.error({ error }, 'Slideshow render failed');
      throw AppError.fromUnknown(error, 'slideshow.render-failed');
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}
