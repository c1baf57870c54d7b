import type { CreateSlideshowInput } from '../dto/create-slideshow.dto.js';

export class CreateSlideshowCommand {
  public readonly payload: CreateSlideshowInput;

  public constructor(payload: CreateSlideshowInput) {
    this.payload = payload;
  }
}
