import type { ImageSize } from "../config/types.js";

export interface ModerationResult {
  readonly flagged: boolean;
  readonly categories: string[];
}

export interface GenerateImageParams {
  readonly prompt: string;
  readonly size: ImageSize;
  /** Forwarded to the provider as the end-user id for its abuse tracking. */
  readonly identity: number;
}

export interface GeneratedImage {
  readonly url: string;
}

/**
 * External moderation and image generation. Both calls reject with
 * ProviderRequestRejected when the provider refuses the request itself
 * (validation or rate limit); any other rejection is unexpected.
 */
export interface ImageProvider {
  checkModeration(text: string): Promise<ModerationResult>;
  generateImage(params: GenerateImageParams): Promise<GeneratedImage>;
}
