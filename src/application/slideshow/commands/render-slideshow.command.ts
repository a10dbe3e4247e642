import type { RenderSlideshowInput } from '../dto/slideshow.dto.js';

export class RenderSlideshowCommand {
  public readonly payload: RenderSlideshowInput;

  public constructor(payload: RenderSlideshowInput) {
    this.payload = payload;
  }
}
