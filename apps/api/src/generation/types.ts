import type { PostTone } from "@postroom/shared";

export interface TextGenerationOptions {
  maxLength?: number;
  includeEmoji?: boolean;
  /** Free-text change request ("make it shorter"). */
  instruction?: string;
  /** Current text to rework instead of writing from scratch. */
  previousText?: string;
  signal?: AbortSignal;
}

export interface ImageGenerationOptions {
  negativePrompt?: string;
  signal?: AbortSignal;
}

/** Outbound collaborator: one call, one post text. Throws on failure. */
export interface TextGenerator {
  generate(subject: string, tone: PostTone, options: TextGenerationOptions): Promise<string>;
}

/** Outbound collaborator: returns an opaque asset reference the core stores verbatim. */
export interface ImageGenerator {
  generate(subject: string, options: ImageGenerationOptions): Promise<string>;
}
