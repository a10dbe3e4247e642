export interface EncodeProgress {
  readonly encodedFrames: number;
  readonly totalFrames: number;
}

export interface EncodeRequest {
  readonly frameDir: string;
  readonly framePattern: string;
  readonly outputPath: string;
  readonly fps: number;
  readonly frameCount: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (progress: EncodeProgress) => void;
}

export interface EncodeResult {
  readonly outputPath: string;
  readonly sizeBytes: number;
  readonly exceedsSizeLimit: boolean;
}

export interface VideoEncoder {
  encode(request: EncodeRequest): Promise<EncodeResult>;
}
