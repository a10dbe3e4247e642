import { promises as fs } from 'node:fs';

import { createCanvas, loadImage } from '@napi-rs/canvas';

import type {
  ImageProcessingOptions,
  ImageProcessor,
  ProcessedImage,
} from '@domain/slideshow/index.js';

import { AppError } from '@/shared/errors/app-error.js';

import { applyGrayscale } from './pixel-operations.js';

export interface CanvasImageProcessorOptions {
  readonly jpegQuality?: number;
}

const DEFAULT_JPEG_QUALITY = 85;

export class CanvasImageProcessor implements ImageProcessor {
  private readonly jpegQuality: number;

  public constructor(options: CanvasImageProcessorOptions = {}) {
    this.jpegQuality = options.jpegQuality ?? DEFAULT_JPEG_QUALITY;
  }

  public async process(sourcePath: string, options: ImageProcessingOptions): Promise<ProcessedImage> {
    let source: Buffer;
    try {
      source = await fs.readFile(sourcePath);
    } catch (error) {
      throw AppError.fromUnknown(error, 'slideshow.image-unreadable');
    }

    const { targetSize } = options;
    const canvas = createCanvas(targetSize, targetSize);
    const ctx = canvas.getContext('2d');

    try {
      const image = await loadImage(source);
      ctx.drawImage(image, 0, 0, targetSize, targetSize);
    } catch (error) {
      throw AppError.fromError(
        error instanceof Error ? error : new Error(String(error)),
        'slideshow.image-decode-failed',
        { sourcePath },
      );
    }

    if (options.style === 'bw') {
      const imageData = ctx.getImageData(0, 0, targetSize, targetSize);
      imageData.data.set(applyGrayscale(imageData.data));
      ctx.putImageData(imageData, 0, 0);
    }

    const data = await canvas.encode('jpeg', this.jpegQuality);

    return { data, sourceSizeBytes: source.byteLength };
  }
}
