import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  RenderCancelledError,
  type FrameMaterializer,
  type ImageResolver,
  type MaterializeOptions,
  type MaterializeResult,
  type PrepareOptions,
  type Timeline,
} from '@domain/slideshow/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

export const FRAME_PATTERN = 'frame_%06d.jpg';

export function frameFileName(index: number): string {
  return `frame_${index.toString().padStart(6, '0')}.jpg`;
}

export class FrameSequenceMaterializer implements FrameMaterializer {
  private readonly logger = createChildLogger({ module: 'FrameSequenceMaterializer' });

  public constructor(private readonly resolver: ImageResolver) {}

  public async prepare(pool: readonly string[], options: PrepareOptions = {}): Promise<void> {
    if (this.resolver.prepare) {
      await this.resolver.prepare(pool, options);
      return;
    }
    if (options.signal?.aborted) {
      throw new RenderCancelledError({ phase: 'preparing' });
    }
  }

  public async materialize(
    timeline: Timeline<string>,
    options: MaterializeOptions,
  ): Promise<MaterializeResult> {
    const { outputDir, signal, onProgress } = options;
    await fs.mkdir(outputDir, { recursive: true });

    let frameIndex = 0;
    let resolvedImages = 0;
    let copiedFrames = 0;
    let previousImage: string | null = null;
    let previousFramePath: string | null = null;

    for (const segment of timeline.segments) {
      this.throwIfAborted(signal, frameIndex);

      let lastFramePath = path.join(outputDir, frameFileName(frameIndex));

      if (previousFramePath !== null && previousImage === segment.sourceImage) {
        await fs.copyFile(previousFramePath, lastFramePath);
        copiedFrames += 1;
      } else {
        const image = await this.resolver.resolve(segment.sourceImage);
        await fs.writeFile(lastFramePath, image);
        resolvedImages += 1;
      }

      frameIndex += 1;
      onProgress?.({ completedFrames: frameIndex, totalFrames: timeline.totalFrames, segmentIndex: segment.index });

      for (let repeat = 1; repeat < segment.durationFrames; repeat += 1) {
        this.throwIfAborted(signal, frameIndex);

        const framePath = path.join(outputDir, frameFileName(frameIndex));
        await fs.copyFile(lastFramePath, framePath);
        lastFramePath = framePath;
        copiedFrames += 1;
        frameIndex += 1;
        onProgress?.({ completedFrames: frameIndex, totalFrames: timeline.totalFrames, segmentIndex: segment.index });
      }

      previousImage = segment.sourceImage;
      previousFramePath = lastFramePath;

      this.logger.trace(
        {
          segment: segment.index,
          kind: segment.kind,
          durationFrames: segment.durationFrames,
          sourceImage: path.basename(segment.sourceImage),
        },
        'Segment materialized',
      );
    }

    this.logger.debug({ frameCount: frameIndex, resolvedImages, copiedFrames, outputDir }, 'Frame sequence ready');

    return {
      frameDir: outputDir,
      framePattern: FRAME_PATTERN,
      frameCount: frameIndex,
      resolvedImages,
      copiedFrames,
    };
  }

  private throwIfAborted(signal: AbortSignal | undefined, frameIndex: number): void {
    if (signal?.aborted) {
      throw new RenderCancelledError({ phase: 'materializing', frameIndex });
    }
  }
}
