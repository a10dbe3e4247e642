import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  RenderCancelledError,
  type ImageProcessingOptions,
  type ImageProcessor,
  type ImageResolver,
  type PrepareOptions,
} from '@domain/slideshow/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { roundToPrecision } from '@/shared/media/numberUtils.js';

import { cacheFileName } from './cache-key.js';

export interface CacheWarmResult {
  readonly cachedFiles: readonly string[];
  readonly created: number;
  readonly reused: number;
}

interface EnsureResult {
  readonly cachePath: string;
  readonly created: boolean;
}

export class DiskCachedImageResolver implements ImageResolver {
  private readonly logger = createChildLogger({ module: 'DiskCachedImageResolver' });

  public constructor(
    private readonly cacheDir: string,
    private readonly processor: ImageProcessor,
    private readonly options: ImageProcessingOptions,
  ) {}

  public cachePathFor(sourcePath: string): string {
    return path.join(this.cacheDir, cacheFileName(sourcePath, this.options));
  }

  public async resolve(sourcePath: string): Promise<Buffer> {
    const { cachePath } = await this.ensure(sourcePath);
    return fs.readFile(cachePath);
  }

  public async prepare(pool: readonly string[], options: PrepareOptions = {}): Promise<void> {
    await this.warm(pool, options);
  }

  /**
   * Brings every pool image into the cache before rendering starts.
   * The signal is checked before each image.
   */
  public async warm(pool: readonly string[], options: PrepareOptions = {}): Promise<CacheWarmResult> {
    const { signal, onProgress } = options;
    const cachedFiles: string[] = [];
    let created = 0;
    let reused = 0;

    for (const [index, sourcePath] of pool.entries()) {
      if (signal?.aborted) {
        throw new RenderCancelledError({ phase: 'preparing', processed: index, total: pool.length });
      }

      const result = await this.ensure(sourcePath);
      cachedFiles.push(result.cachePath);
      if (result.created) {
        created += 1;
      } else {
        reused += 1;
      }
      onProgress?.({ processed: index + 1, total: pool.length });
    }

    this.logger.info({ cacheDir: this.cacheDir, created, reused }, 'Image cache ready');

    return { cachedFiles, created, reused };
  }

  private async ensure(sourcePath: string): Promise<EnsureResult> {
    const cachePath = this.cachePathFor(sourcePath);

    if (await this.isFresh(sourcePath, cachePath)) {
      return { cachePath, created: false };
    }

    const processed = await this.processor.process(sourcePath, this.options);
    await fs.mkdir(this.cacheDir, { recursive: true });
    await fs.writeFile(cachePath, processed.data);

    this.logger.debug(
      {
        sourcePath,
        cachePath,
        originalBytes: processed.sourceSizeBytes,
        cachedBytes: processed.data.byteLength,
        reductionPercent: processed.sourceSizeBytes > 0
          ? roundToPrecision((1 - processed.data.byteLength / processed.sourceSizeBytes) * 100, 1)
          : 0,
      },
      'Cached resized image',
    );

    return { cachePath, created: true };
  }

  private async isFresh(sourcePath: string, cachePath: string): Promise<boolean> {
    let cacheModified: number;
    try {
      cacheModified = (await fs.stat(cachePath)).mtimeMs;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw AppError.fromUnknown(error, 'slideshow.cache-unreadable');
    }

    const sourceModified = (await fs.stat(sourcePath)).mtimeMs;
    return cacheModified > sourceModified;
  }
}
