import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  RenderCancelledError,
  type ImageProcessor,
  type ImageResolver,
  type MaterializeProgress,
  type Segment,
  type Timeline,
} from '@domain/slideshow/index.js';
import {
  FRAME_PATTERN,
  frameFileName,
  FrameSequenceMaterializer,
  SlideshowMaterializerFactory,
} from '@/infrastructure/slideshow/index.js';

const segment = (index: number, startFrame: number, endFrame: number, sourceImage: string): Segment<string> => ({
  index,
  startFrame,
  endFrame,
  durationFrames: endFrame - startFrame,
  kind: 'normal',
  multiplier: 1,
  sourceImage,
  startTime: startFrame / 10,
  endTime: endFrame / 10,
});

const timeline: Timeline<string> = {
  totalFrames: 6,
  fps: 10,
  baseDurationFrames: 2,
  segments: [segment(0, 0, 2, '/pool/a.jpg'), segment(1, 2, 5, '/pool/a.jpg'), segment(2, 5, 6, '/pool/b.jpg')],
};

const createResolver = (): ImageResolver => ({
  resolve: vi.fn(async (sourcePath: string) => Buffer.from(path.basename(sourcePath))),
});

describe('frameFileName', () => {
  it('zero pads the frame index', () => {
    expect(frameFileName(0)).toBe('frame_000000.jpg');
    expect(frameFileName(1234)).toBe('frame_001234.jpg');
    expect(FRAME_PATTERN).toBe('frame_%06d.jpg');
  });
});

describe('FrameSequenceMaterializer', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'frames-spec-')), 'frames');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(outputDir), { recursive: true, force: true });
  });

  it('writes one numbered file per frame', async () => {
    const resolver = createResolver();
    const progress: MaterializeProgress[] = [];

    const result = await new FrameSequenceMaterializer(resolver).materialize(timeline, {
      outputDir,
      onProgress: (event) => progress.push(event),
    });

    expect(result).toEqual({
      frameDir: outputDir,
      framePattern: 'frame_%06d.jpg',
      frameCount: 6,
      resolvedImages: 2,
      copiedFrames: 4,
    });

    const names = (await fs.readdir(outputDir)).sort();
    expect(names).toEqual([0, 1, 2, 3, 4, 5].map(frameFileName));

    const contents = await Promise.all(names.map((name) => fs.readFile(path.join(outputDir, name), 'utf8')));
    expect(contents).toEqual(['a.jpg', 'a.jpg', 'a.jpg', 'a.jpg', 'a.jpg', 'b.jpg']);

    expect(resolver.resolve).toHaveBeenCalledTimes(2);
    expect(progress).toHaveLength(6);
    expect(progress.at(-1)).toEqual({ completedFrames: 6, totalFrames: 6, segmentIndex: 2 });
  });

  it('delegates preparation to the resolver when it supports it', async () => {
    const prepare = vi.fn(async () => undefined);
    const materializer = new FrameSequenceMaterializer({ ...createResolver(), prepare });

    const onProgress = vi.fn();
    const signal = new AbortController().signal;

    await materializer.prepare(['/pool/a.jpg'], { signal, onProgress });

    expect(prepare).toHaveBeenCalledWith(['/pool/a.jpg'], { signal, onProgress });
    await expect(new FrameSequenceMaterializer(createResolver()).prepare(['/pool/a.jpg'])).resolves.toBeUndefined();
  });

  it('honours cancellation when the resolver has nothing to prepare', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new FrameSequenceMaterializer(createResolver()).prepare(['/pool/a.jpg'], { signal: controller.signal }),
    ).rejects.toBeInstanceOf(RenderCancelledError);
  });

  it('stops before the first frame when already aborted', async () => {
    const resolver = createResolver();
    const controller = new AbortController();
    controller.abort();

    const error = await new FrameSequenceMaterializer(resolver)
      .materialize(timeline, { outputDir, signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RenderCancelledError);
    expect(error).toMatchObject({ metadata: { phase: 'materializing', frameIndex: 0 } });
    expect(resolver.resolve).not.toHaveBeenCalled();
  });

  it('stops at the next frame when aborted mid-way', async () => {
    const controller = new AbortController();

    const error = await new FrameSequenceMaterializer(createResolver())
      .materialize(timeline, {
        outputDir,
        signal: controller.signal,
        onProgress: (event) => {
          if (event.completedFrames === 3) {
            controller.abort();
          }
        },
      })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RenderCancelledError);
    expect(error).toMatchObject({ metadata: { phase: 'materializing', frameIndex: 3 } });
    expect(await fs.readdir(outputDir)).toHaveLength(3);
  });
});

describe('SlideshowMaterializerFactory', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'factory-spec-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const createProcessor = (): ImageProcessor => ({
    process: vi.fn(async () => ({ data: Buffer.from('resized'), sourceSizeBytes: 10 })),
  });

  it('fills the disk cache during preparation when caching is on', async () => {
    const source = path.join(root, 'photo.jpg');
    await fs.writeFile(source, 'original');
    const past = new Date('2020-01-01T00:00:00Z');
    await fs.utimes(source, past, past);
    const processor = createProcessor();

    const materializer = new SlideshowMaterializerFactory(processor).create({
      useCache: true,
      cacheDir: path.join(root, 'cache'),
      processing: { targetSize: 32, style: 'bw' },
    });
    await materializer.prepare([source]);

    expect(await fs.readdir(path.join(root, 'cache'))).toEqual(['photo_32_bw.jpg']);
    expect(processor.process).toHaveBeenCalledTimes(1);
  });

  it('resizes on demand when caching is off', async () => {
    const processor = createProcessor();

    const materializer = new SlideshowMaterializerFactory(processor).create({
      useCache: false,
      cacheDir: path.join(root, 'cache'),
      processing: { targetSize: 32, style: 'color' },
    });
    await materializer.prepare(['/pool/a.jpg']);

    expect(processor.process).not.toHaveBeenCalled();
    await expect(fs.stat(path.join(root, 'cache'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
