import path from 'node:path';

import type { ImageProcessingOptions } from '@domain/slideshow/index.js';

/**
 * File name of a resized image in the disk cache: `<stem>_<size>[_bw].jpg`.
 */
export function cacheFileName(sourcePath: string, options: ImageProcessingOptions): string {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const styleSuffix = options.style === 'bw' ? '_bw' : '';
  return `${stem}_${options.targetSize}${styleSuffix}.jpg`;
}

export function memoryCacheKey(sourcePath: string, options: ImageProcessingOptions): string {
  return `${path.resolve(sourcePath)}:${options.targetSize}:${options.style}`;
}
