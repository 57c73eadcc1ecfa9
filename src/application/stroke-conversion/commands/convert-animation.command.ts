import type { ConvertAnimationPayload } from '../dto/convert-animation.dto.js';

export class ConvertAnimationCommand {
  public readonly payload: ConvertAnimationPayload;

  public constructor(payload: ConvertAnimationPayload) {
    this.payload = payload;
  }
}
