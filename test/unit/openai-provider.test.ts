import { describe, it, expect, vi } from "vitest";
import { BadRequestError, RateLimitError } from "openai";
import { OpenAIImageProvider, type OpenAIImagesClient } from "../../src/provider/openai.js";
import { ProviderRequestRejected } from "../../src/provider/errors.js";
import type { ProviderConfig } from "../../src/config/types.js";
import { silentLogger } from "../helpers/fixtures.js";

const config: ProviderConfig = {
  apiKey: "test-key",
  imageModel: "dall-e-2",
  timeoutMs: 120_000,
};

function makeClient() {
  const create = vi.fn(
    async (_body: {
      input: string;
      model?: string;
    }): Promise<{ results: Array<{ flagged: boolean; categories: Record<string, boolean> }> }> => ({
      results: [{ flagged: false, categories: { violence: false, hate: false } }],
    }),
  );
  const generate = vi.fn(
    async (_body: {
      model?: string;
      prompt: string;
      n?: number;
      size?: string;
      user?: string;
    }): Promise<{ data?: Array<{ url?: string }> }> => ({
      data: [{ url: "https://images.example.test/out.png" }],
    }),
  );
  const client: OpenAIImagesClient = {
    moderations: { create },
    images: { generate },
  };
  return { client, create, generate };
}

describe("OpenAIImageProvider", () => {
  it("reports unflagged prompts", async () => {
    const { client, create } = makeClient();
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    await expect(provider.checkModeration("a red fox")).resolves.toEqual({
      flagged: false,
      categories: [],
    });
    expect(create).toHaveBeenCalledWith({ input: "a red fox" });
  });

  it("lists the categories that were hit", async () => {
    const { client, create } = makeClient();
    create.mockResolvedValueOnce({
      results: [{ flagged: true, categories: { violence: true, hate: false } }],
    });
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    await expect(provider.checkModeration("x")).resolves.toEqual({
      flagged: true,
      categories: ["violence"],
    });
  });

  it("passes the configured moderation model", async () => {
    const { client, create } = makeClient();
    const provider = new OpenAIImageProvider(
      { ...config, moderationModel: "omni-moderation-latest" },
      silentLogger(),
      client,
    );

    await provider.checkModeration("x");
    expect(create).toHaveBeenCalledWith({ input: "x", model: "omni-moderation-latest" });
  });

  it("fails on an empty moderation response", async () => {
    const { client, create } = makeClient();
    create.mockResolvedValueOnce({ results: [] });
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    await expect(provider.checkModeration("x")).rejects.toThrow(
      "Moderation response contained no results",
    );
  });

  it("requests one image of the configured size for the identity", async () => {
    const { client, generate } = makeClient();
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    await expect(
      provider.generateImage({ prompt: "a red fox", size: 512, identity: 99 }),
    ).resolves.toEqual({ url: "https://images.example.test/out.png" });
    expect(generate).toHaveBeenCalledWith({
      model: "dall-e-2",
      prompt: "a red fox",
      n: 1,
      size: "512x512",
      user: "99",
    });
  });

  it("fails when no image URL comes back", async () => {
    const { client, generate } = makeClient();
    generate.mockResolvedValueOnce({ data: [{}] });
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    await expect(
      provider.generateImage({ prompt: "x", size: 256, identity: 1 }),
    ).rejects.toThrow("Image generation response contained no image URL");
  });

  it("classifies bad requests as rejections", async () => {
    const { client, generate } = makeClient();
    const apiError = new BadRequestError(
      400,
      { message: "Your request was rejected by the safety system." },
      undefined,
      undefined,
    );
    generate.mockRejectedValueOnce(apiError);
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    const err = await provider
      .generateImage({ prompt: "x", size: 256, identity: 1 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderRequestRejected);
    expect(err).toMatchObject({ kind: "invalid_request", message: apiError.message });
  });

  it("classifies rate limits as rejections", async () => {
    const { client, create } = makeClient();
    const apiError = new RateLimitError(429, { message: "Rate limit reached" }, undefined, undefined);
    create.mockRejectedValueOnce(apiError);
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    const err = await provider.checkModeration("x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderRequestRejected);
    expect(err).toMatchObject({ kind: "rate_limited", message: apiError.message });
  });

  it("rethrows other failures unchanged", async () => {
    const { client, generate } = makeClient();
    const failure = new Error("socket hang up");
    generate.mockRejectedValueOnce(failure);
    const provider = new OpenAIImageProvider(config, silentLogger(), client);

    await expect(provider.generateImage({ prompt: "x", size: 256, identity: 1 })).rejects.toBe(
      failure,
    );
  });
});
