export type ImageStyle = 'color' | 'bw';

export interface ImageProcessingOptions {
  readonly targetSize: number;
  readonly style: ImageStyle;
}

export interface ProcessedImage {
  readonly data: Buffer;
  readonly sourceSizeBytes: number;
}

export interface ImageProcessor {
  process(sourcePath: string, options: ImageProcessingOptions): Promise<ProcessedImage>;
}

export interface PrepareProgress {
  readonly processed: number;
  readonly total: number;
}

export interface PrepareOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: PrepareProgress) => void;
}

export interface ImageResolver {
  resolve(sourcePath: string): Promise<Buffer>;
  /** Optional up-front work over the whole pool, such as filling a cache. */
  prepare?(pool: readonly string[], options?: PrepareOptions): Promise<void>;
}
