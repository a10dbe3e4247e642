import path from 'node:path';

import type {
  FrameMaterializer,
  FrameMaterializerFactory,
  ImageProcessor,
  MaterializerSettings,
} from '@domain/slideshow/index.js';

import { CanvasImageProcessor } from '../image-processing/canvas-image-processor.js';
import { DirectImageResolver } from '../resolvers/direct-image-resolver.js';
import { DiskCachedImageResolver } from '../resolvers/disk-cached-image-resolver.js';

import { FrameSequenceMaterializer } from './frame-sequence-materializer.js';

export class SlideshowMaterializerFactory implements FrameMaterializerFactory {
  public constructor(private readonly processor: ImageProcessor = new CanvasImageProcessor()) {}

  public create(settings: MaterializerSettings): FrameMaterializer {
    const resolver = settings.useCache
      ? new DiskCachedImageResolver(path.resolve(settings.cacheDir), this.processor, settings.processing)
      : new DirectImageResolver(this.processor, settings.processing);

    return new FrameSequenceMaterializer(resolver);
  }
}
