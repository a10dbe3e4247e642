import type {
  ImageProcessingOptions,
  ImageProcessor,
  ImageResolver,
} from '@domain/slideshow/index.js';

import { MemoryCache } from '../cache/memory-cache.js';

import { memoryCacheKey } from './cache-key.js';

export interface DirectImageResolverOptions {
  readonly maxCachedImages?: number;
}

const DEFAULT_MAX_CACHED_IMAGES = 64;

/**
 * Resizes on demand without touching the disk cache. Recently resized images
 * stay in memory so an image drawn twice is only encoded once.
 */
export class DirectImageResolver implements ImageResolver {
  private readonly cache: MemoryCache<Buffer>;

  private processedCount = 0;

  public constructor(
    private readonly processor: ImageProcessor,
    private readonly options: ImageProcessingOptions,
    resolverOptions: DirectImageResolverOptions = {},
  ) {
    this.cache = new MemoryCache<Buffer>({
      maxEntries: resolverOptions.maxCachedImages ?? DEFAULT_MAX_CACHED_IMAGES,
    });
  }

  public get processed(): number {
    return this.processedCount;
  }

  public async resolve(sourcePath: string): Promise<Buffer> {
    const key = memoryCacheKey(sourcePath, this.options);
    const cached = this.cache.get(key);
    if (cached) {
      return cached.value;
    }

    const { data } = await this.processor.process(sourcePath, this.options);
    this.processedCount += 1;
    this.cache.set(key, data);
    return data;
  }
}
