import type { PlanTimelineInput } from '../dto/slideshow.dto.js';

export class PlanTimelineCommand {
  public readonly payload: PlanTimelineInput;

  public constructor(payload: PlanTimelineInput) {
    this.payload = payload;
  }
}
