/**
 * Immutable input of the sequence generator. Callers are expected to clamp user input
 * before building one; the generator rejects anything out of range instead of fixing it.
 */
export interface GeneratorConfig {
  readonly totalFrames: number;
  readonly fps: number;
  readonly baseFrameDurationSeconds: number;
  readonly freezeProbability: number;
  readonly freezeMultiplierMin: number;
  readonly freezeMultiplierMax: number;
  readonly seed?: number;
}
