import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { ApiError, GoogleGenAI } from "@google/genai";
import { ProviderError, isRetryableStatus } from "@postroom/lifecycle";
import { buildImagePrompt, IMAGE_NEGATIVE_PROMPT } from "./prompts.js";
import type { ImageGenerationOptions, ImageGenerator } from "./types.js";

export interface ImagenImageGeneratorOptions {
  apiKey: string;
  model: string;
  /** Directory the PNG files are written to; the file path is the image reference. */
  outputDir: string;
}

function slugify(subject: string): string {
  const slug = subject
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[^\p{L}\p{N}]+/gu, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "post";
}

/** Square product shots from Imagen, saved to local disk. */
export class ImagenImageGenerator implements ImageGenerator {
  private readonly client: GoogleGenAI;

  constructor(private readonly options: ImagenImageGeneratorOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(subject: string, options: ImageGenerationOptions): Promise<string> {
    let imageBytes: string | undefined;
    try {
      const response = await this.client.models.generateImages({
        model: this.options.model,
        prompt: buildImagePrompt(subject),
        config: {
          numberOfImages: 1,
          aspectRatio: "1:1",
          negativePrompt: options.negativePrompt ?? IMAGE_NEGATIVE_PROMPT,
          abortSignal: options.signal,
        },
      });
      imageBytes = response.generatedImages?.[0]?.image?.imageBytes;
    } catch (error) {
      if (error instanceof ApiError) {
        throw new ProviderError(error.message, {
          status: error.status,
          retryable: isRetryableStatus(error.status),
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(message, { retryable: true, cause: error });
    }

    if (!imageBytes) {
      throw new ProviderError("Imagen returned no image", { retryable: false });
    }

    // Aborted between the response arriving and the file being written.
    options.signal?.throwIfAborted();

    await mkdir(this.options.outputDir, { recursive: true });
    const filePath = path.join(
      this.options.outputDir,
      `${slugify(subject)}_${randomUUID().slice(0, 8)}.png`,
    );
    await writeFile(filePath, Buffer.from(imageBytes, "base64"));
    return filePath;
  }
}
