import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  RenderCancelledError,
  type EncodeRequest,
  type EncodeResult,
  type VideoEncoder,
} from '@domain/slideshow/index.js';

import { env } from '@/shared/config/env.js';
import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

export interface FfmpegVideoEncoderOptions {
  readonly binary?: string;
  readonly outputSize?: number;
  readonly crf?: number;
  readonly maxBitrate?: string;
  readonly bufferSize?: string;
  readonly preset?: 'ultrafast' | 'veryfast' | 'fast' | 'medium' | 'slow';
  readonly sizeLimitBytes?: number;
}

type ResolvedEncoderOptions = Required<FfmpegVideoEncoderOptions>;

const DEFAULT_OPTIONS: Omit<ResolvedEncoderOptions, 'binary'> = {
  outputSize: 1080,
  crf: 21,
  maxBitrate: '8M',
  bufferSize: '16M',
  preset: 'medium',
  sizeLimitBytes: 100 * 1024 * 1024,
};

const STDERR_TAIL_LINES = 20;

export function buildEncoderArgs(
  request: Pick<EncodeRequest, 'frameDir' | 'framePattern' | 'outputPath' | 'fps'>,
  options: Omit<ResolvedEncoderOptions, 'binary' | 'sizeLimitBytes'> = DEFAULT_OPTIONS,
): string[] {
  const size = options.outputSize;

  return [
    '-y',
    '-framerate',
    `${request.fps}`,
    '-i',
    path.join(request.frameDir, request.framePattern),
    '-vf',
    `scale=${size}:${size}:force_original_aspect_ratio=decrease,pad=${size}:${size}:(ow-iw)/2:(oh-ih)/2`,
    '-c:v',
    'libx264',
    '-profile:v',
    'baseline',
    '-level',
    '3.1',
    '-pix_fmt',
    'yuv420p',
    '-crf',
    `${options.crf}`,
    '-maxrate',
    options.maxBitrate,
    '-bufsize',
    options.bufferSize,
    '-r',
    `${request.fps}`,
    '-g',
    `${Math.round(request.fps * 2)}`,
    '-an',
    '-movflags',
    '+faststart',
    '-preset',
    options.preset,
    request.outputPath,
  ];
}

/**
 * Returns the highest `frame=` counter found in a chunk of ffmpeg stderr.
 */
export function parseEncodedFrames(chunk: string): number | null {
  let latest: number | null = null;
  for (const match of chunk.matchAll(/frame=\s*(\d+)/g)) {
    const value = Number.parseInt(match[1] ?? '', 10);
    if (Number.isFinite(value)) {
      latest = value;
    }
  }
  return latest;
}

export class FfmpegVideoEncoder implements VideoEncoder {
  private readonly logger = createChildLogger({ module: 'FfmpegVideoEncoder' });

  private readonly options: ResolvedEncoderOptions;

  public constructor(options: FfmpegVideoEncoderOptions = {}) {
    this.options = { binary: env.FFMPEG_PATH, ...DEFAULT_OPTIONS, ...options };
  }

  public async encode(request: EncodeRequest): Promise<EncodeResult> {
    const outputPath = path.resolve(request.outputPath);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    const args = buildEncoderArgs({ ...request, outputPath }, this.options);
    this.logger.info(
      { frames: request.frameCount, fps: request.fps, outputPath, size: this.options.outputSize },
      'Encoding video',
    );
    this.logger.debug({ command: [this.options.binary, ...args].join(' ') }, 'ffmpeg command');

    await this.runFfmpeg(args, request);

    const { size } = await fs.stat(outputPath);
    const exceedsSizeLimit = size > this.options.sizeLimitBytes;
    if (exceedsSizeLimit) {
      this.logger.warn(
        { outputPath, sizeBytes: size, limitBytes: this.options.sizeLimitBytes },
        'Encoded video exceeds the size limit; reduce duration or raise CRF',
      );
    }

    return { outputPath, sizeBytes: size, exceedsSizeLimit };
  }

  private async runFfmpeg(args: string[], request: EncodeRequest): Promise<void> {
    const { binary } = this.options;
    const { signal, onProgress, frameCount } = request;

    if (signal?.aborted) {
      throw new RenderCancelledError({ phase: 'encoding' });
    }

    await new Promise<void>((resolve, reject) => {
      const proc = spawn(binary, args, { stdio: ['ignore', 'ignore', 'pipe'], signal });
      const stderrLines: string[] = [];

      proc.stderr?.setEncoding('utf8');
      proc.stderr?.on('data', (chunk: string) => {
        stderrLines.push(...chunk.split(/\r?\n|\r/).filter((line) => line.trim() !== ''));
        if (stderrLines.length > STDERR_TAIL_LINES) {
          stderrLines.splice(0, stderrLines.length - STDERR_TAIL_LINES);
        }

        const encodedFrames = parseEncodedFrames(chunk);
        if (encodedFrames !== null) {
          onProgress?.({ encodedFrames: Math.min(encodedFrames, frameCount), totalFrames: frameCount });
        }
      });

      proc.on('error', (error) => {
        if (error.name === 'AbortError') {
          reject(new RenderCancelledError({ phase: 'encoding' }));
          return;
        }
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
          reject(
            AppError.notFound(
              'slideshow.encoder-missing',
              'ffmpeg binary not found. Install ffmpeg or set FFMPEG_PATH.',
              { binary },
            ),
          );
          return;
        }
        reject(AppError.fromError(error, 'slideshow.encoder-failed'));
      });

      proc.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        if (signal?.aborted) {
          reject(new RenderCancelledError({ phase: 'encoding' }));
          return;
        }
        reject(
          AppError.fromError(new Error(`ffmpeg exited with code ${code}`), 'slideshow.encoder-failed', {
            exitCode: code,
            stderr: stderrLines.join('\n'),
          }),
        );
      });
    });
  }
}
