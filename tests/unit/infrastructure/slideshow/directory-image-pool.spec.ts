import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { classifyImageFile, DirectoryImagePool } from '@/infrastructure/slideshow/index.js';
import { AppError } from '@/shared/errors/app-error.js';

describe('classifyImageFile', () => {
  it('recognizes jpg and png extensions case-insensitively', () => {
    expect(classifyImageFile('a.jpg')).toBe('jpg');
    expect(classifyImageFile('a.JPEG')).toBe('jpg');
    expect(classifyImageFile('a.Png')).toBe('png');
    expect(classifyImageFile('a.gif')).toBeNull();
    expect(classifyImageFile('jpg')).toBeNull();
  });
});

describe('DirectoryImagePool', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'pool-spec-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists images sorted by name and skips other files', async () => {
    await fs.writeFile(path.join(root, 'b.jpg'), 'b');
    await fs.writeFile(path.join(root, 'a.PNG'), 'a');
    await fs.writeFile(path.join(root, 'c.jpeg'), 'c');
    await fs.writeFile(path.join(root, 'notes.txt'), 'n');
    await fs.mkdir(path.join(root, 'nested.jpg'));

    const scan = await new DirectoryImagePool().scan(root);

    expect(scan.directory).toBe(path.resolve(root));
    expect(scan.files).toEqual([
      path.join(path.resolve(root), 'a.PNG'),
      path.join(path.resolve(root), 'b.jpg'),
      path.join(path.resolve(root), 'c.jpeg'),
    ]);
    expect(scan.jpgCount).toBe(2);
    expect(scan.pngCount).toBe(1);
    expect(scan.skipped).toEqual(['notes.txt']);
  });

  it('returns an empty pool for a directory without images', async () => {
    await fs.writeFile(path.join(root, 'readme.md'), '#');

    const scan = await new DirectoryImagePool().scan(root);

    expect(scan.files).toEqual([]);
    expect(scan.skipped).toEqual(['readme.md']);
  });

  it('rejects a missing directory', async () => {
    const error = await new DirectoryImagePool().scan(path.join(root, 'missing')).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: 'slideshow.input-dir-missing' });
  });

  it('rejects a path that is a file', async () => {
    const file = path.join(root, 'photo.jpg');
    await fs.writeFile(file, 'x');

    await expect(new DirectoryImagePool().scan(file)).rejects.toMatchObject({ code: 'slideshow.input-dir-missing' });
  });
});
