import type { Timeline } from '../value-objects/timeline.js';

import type { ImageProcessingOptions, PrepareOptions } from './image-resolver.js';

export interface MaterializeProgress {
  readonly completedFrames: number;
  readonly totalFrames: number;
  readonly segmentIndex: number;
}

export interface MaterializeOptions {
  readonly outputDir: string;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: MaterializeProgress) => void;
}

export interface MaterializeResult {
  readonly frameDir: string;
  readonly framePattern: string;
  readonly frameCount: number;
  readonly resolvedImages: number;
  readonly copiedFrames: number;
}

export interface FrameMaterializer {
  /** Runs once per render, before any timeline is materialized. */
  prepare(pool: readonly string[], options?: PrepareOptions): Promise<void>;
  materialize(timeline: Timeline<string>, options: MaterializeOptions): Promise<MaterializeResult>;
}

export interface MaterializerSettings {
  readonly useCache: boolean;
  readonly cacheDir: string;
  readonly processing: ImageProcessingOptions;
}

export interface FrameMaterializerFactory {
  create(settings: MaterializerSettings): FrameMaterializer;
}
