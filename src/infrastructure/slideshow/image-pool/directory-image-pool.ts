import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { ImagePoolScan, ImagePoolScanner } from '@domain/slideshow/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

const JPG_EXTENSIONS = new Set(['.jpg', '.jpeg']);
const PNG_EXTENSIONS = new Set(['.png']);

export function classifyImageFile(fileName: string): 'jpg' | 'png' | null {
  const extension = path.extname(fileName).toLowerCase();
  if (JPG_EXTENSIONS.has(extension)) {
    return 'jpg';
  }
  if (PNG_EXTENSIONS.has(extension)) {
    return 'png';
  }
  return null;
}

export class DirectoryImagePool implements ImagePoolScanner {
  private readonly logger = createChildLogger({ module: 'DirectoryImagePool' });

  public async scan(directory: string): Promise<ImagePoolScan> {
    const resolved = path.resolve(directory);
    await this.assertDirectory(resolved);

    const entries = await fs.readdir(resolved, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const files: string[] = [];
    const skipped: string[] = [];
    let jpgCount = 0;
    let pngCount = 0;

    for (const name of names) {
      const type = classifyImageFile(name);
      if (type === null) {
        skipped.push(name);
        continue;
      }

      if (type === 'jpg') {
        jpgCount += 1;
      } else {
        pngCount += 1;
      }
      files.push(path.join(resolved, name));
    }

    this.logger.debug(
      { directory: resolved, images: files.length, jpgCount, pngCount, skipped: skipped.length },
      'Scanned image directory',
    );

    return { directory: resolved, files, jpgCount, pngCount, skipped };
  }

  private async assertDirectory(directory: string): Promise<void> {
    try {
      const stats = await fs.stat(directory);
      if (stats.isDirectory()) {
        return;
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw AppError.fromUnknown(error, 'slideshow.input-dir-unreadable');
      }
    }

    throw AppError.notFound('slideshow.input-dir-missing', `Input directory does not exist: ${directory}`, {
      directory,
    });
  }
}
