import OpenAI, { BadRequestError, RateLimitError } from "openai";
import type { ImageSize, ProviderConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { ProviderRequestRejected } from "./errors.js";
import type {
  GenerateImageParams,
  GeneratedImage,
  ImageProvider,
  ModerationResult,
} from "./types.js";

type SizeParam = "256x256" | "512x512" | "1024x1024";

const SIZE_PARAMS = {
  256: "256x256",
  512: "512x512",
  1024: "1024x1024",
} as const satisfies Record<ImageSize, SizeParam>;

/** The slice of the OpenAI SDK this provider calls. */
export interface OpenAIImagesClient {
  readonly moderations: {
    create(body: { input: string; model?: string }): Promise<{
      results: Array<{ flagged: boolean; categories: object }>;
    }>;
  };
  readonly images: {
    generate(body: {
      model?: string;
      prompt: string;
      n?: number;
      size?: SizeParam;
      user?: string;
    }): Promise<{ data?: Array<{ url?: string }> }>;
  };
}

export class OpenAIImageProvider implements ImageProvider {
  private readonly client: OpenAIImagesClient;
  private readonly logger: Logger;

  constructor(
    private readonly config: ProviderConfig,
    logger: Logger,
    client?: OpenAIImagesClient,
  ) {
    this.client =
      client ?? new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    this.logger = logger.child({ component: "openai" });
  }

  async checkModeration(text: string): Promise<ModerationResult> {
    const response = await this.call("moderation", () =>
      this.client.moderations.create({
        input: text,
        ...(this.config.moderationModel ? { model: this.config.moderationModel } : {}),
      }),
    );

    const result = response.results[0];
    if (!result) throw new Error("Moderation response contained no results");

    const categories = Object.entries(result.categories)
      .filter(([, hit]) => hit === true)
      .map(([name]) => name);
    if (result.flagged) {
      this.logger.info({ categories }, "Prompt flagged by moderation");
    }
    return { flagged: result.flagged, categories };
  }

  async generateImage(params: GenerateImageParams): Promise<GeneratedImage> {
    const startedAt = Date.now();
    const response = await this.call("generation", () =>
      this.client.images.generate({
        model: this.config.imageModel,
        prompt: params.prompt,
        n: 1,
        size: SIZE_PARAMS[params.size],
        user: String(params.identity),
      }),
    );

    const url = response.data?.[0]?.url;
    if (!url) throw new Error("Image generation response contained no image URL");

    this.logger.info(
      { size: params.size, durationMs: Date.now() - startedAt },
      "Image generated",
    );
    return { url };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof BadRequestError) {
        this.logger.warn({ operation, status: err.status }, "Provider rejected request");
        throw new ProviderRequestRejected(err.message, "invalid_request", { cause: err });
      }
      if (err instanceof RateLimitError) {
        this.logger.warn({ operation, status: err.status }, "Provider rate limit hit");
        throw new ProviderRequestRejected(err.message, "rate_limited", { cause: err });
      }
      throw err;
    }
  }
}
