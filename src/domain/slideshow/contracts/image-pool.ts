export interface ImagePoolScan {
  readonly directory: string;
  /** Absolute paths, sorted by file name. */
  readonly files: readonly string[];
  readonly jpgCount: number;
  readonly pngCount: number;
  readonly skipped: readonly string[];
}

export interface ImagePoolScanner {
  scan(directory: string): Promise<ImagePoolScan>;
}
