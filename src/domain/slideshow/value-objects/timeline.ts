export type SegmentKind = 'normal' | 'freeze';

export interface Segment<TImage> {
  readonly index: number;
  readonly startFrame: number;
  /** Exclusive. */
  readonly endFrame: number;
  readonly durationFrames: number;
  readonly kind: SegmentKind;
  /** Freeze multiplier drawn for this segment, 1 for normal segments. */
  readonly multiplier: number;
  readonly sourceImage: TImage;
  readonly startTime: number;
  readonly endTime: number;
}

/**
 * Ordered segments tiling `[0, totalFrames)` with no gap and no overshoot.
 */
export interface Timeline<TImage> {
  readonly totalFrames: number;
  readonly fps: number;
  readonly baseDurationFrames: number;
  readonly segments: readonly Segment<TImage>[];
}
