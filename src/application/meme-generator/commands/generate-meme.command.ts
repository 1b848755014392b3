import type { GenerateMemePayload } from '../dto/generate-meme.dto.js';

export class GenerateMemeCommand {
  public readonly payload: GenerateMemePayload;

  public constructor(payload: GenerateMemePayload) {
    this.payload = payload;
  }
}
