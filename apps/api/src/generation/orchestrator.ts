import type { FastifyBaseLogger } from "fastify";
import type { PostTone } from "@postroom/shared";
import {
  DEFAULT_RETRY_POLICY,
  GenerationError,
  ProviderError,
  runWithRetry,
  type GenerationKind,
  type RetryPolicy,
} from "@postroom/lifecycle";
import type { DraftStore } from "../store/types.js";
import type {
  ImageGenerationOptions,
  ImageGenerator,
  TextGenerationOptions,
  TextGenerator,
} from "./types.js";

export interface OrchestratorOptions {
  textGenerator: TextGenerator;
  imageGenerator: ImageGenerator;
  /** Read-only access for seeding regenerations. */
  drafts: Pick<DraftStore, "getDraft">;
  log: FastifyBaseLogger;
  tone: PostTone;
  timeoutMs: number;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

type TextOptions = Omit<TextGenerationOptions, "signal"> & { tone?: PostTone };
type ImageOptions = Omit<ImageGenerationOptions, "signal">;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Calls the external generators under one retry policy and returns their results.
 * Never writes to the draft store; the gateway persists what comes back.
 */
export class GenerationOrchestrator {
  private readonly policy: RetryPolicy;

  constructor(private readonly options: OrchestratorOptions) {
    this.policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  async generateText(subject: string, options: TextOptions = {}): Promise<string> {
    const { tone = this.options.tone, ...rest } = options;
    return this.run("text", subject, (signal) =>
      this.options.textGenerator.generate(subject, tone, { ...rest, signal }),
    );
  }

  async generateImage(subject: string, options: ImageOptions = {}): Promise<string> {
    return this.run("image", subject, (signal) =>
      this.options.imageGenerator.generate(subject, { ...options, signal }),
    );
  }

  /** Reworks the draft's current text, or writes a fresh one if it has none yet. */
  async regenerateText(draftId: string, instruction?: string): Promise<string> {
    const draft = await this.options.drafts.getDraft(draftId);
    try {
      return await this.generateText(draft.subject, {
        instruction,
        previousText: draft.text ?? undefined,
      });
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error.forDraft(draftId);
      }
      throw error;
    }
  }

  private async run(
    kind: GenerationKind,
    subject: string,
    call: (signal: AbortSignal) => Promise<string>,
  ): Promise<string> {
    const { log } = this.options;
    const attempt = async (signal: AbortSignal) => {
      const value = await call(signal);
      if (!value.trim()) {
        throw new ProviderError(`Empty ${kind} result`, { retryable: false });
      }
      return value;
    };
    const outcome = await runWithRetry(this.policy, ({ signal }) => attempt(signal), {
      timeoutMs: this.options.timeoutMs,
      sleep: this.options.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        log.warn(
          { kind, subject, attempt, delayMs, err: errorMessage(error) },
          "Generation attempt failed, retrying",
        );
      },
    });

    if (outcome.ok) {
      log.debug({ kind, subject, attempts: outcome.attempts }, "Generation succeeded");
      return outcome.value;
    }

    log.error(
      { kind, subject, attempts: outcome.attempts, err: errorMessage(outcome.error) },
      "Generation failed",
    );
    throw new GenerationError(
      kind,
      `${kind === "text" ? "Text" : "Image"} generation failed after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`,
      { attempts: outcome.attempts, cause: outcome.error },
    );
  }
}
