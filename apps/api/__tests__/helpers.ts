import Fastify, { type FastifyBaseLogger } from "fastify";
import { vi } from "vitest";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "@postroom/lifecycle";
import { MemoryDraftStore } from "../src/store/memory-draft-store.js";
import { GenerationOrchestrator } from "../src/generation/orchestrator.js";
import { LifecycleGateway } from "../src/gateway/lifecycle-gateway.js";
import type { ImageGenerator, TextGenerator } from "../src/generation/types.js";

export const ROSE_TEXT = "🍯 Fresh rose vinegar...";
export const ROSE_IMAGE = "img_rose.png";
export const START = new Date("2026-01-01T00:00:00.000Z");

/** Logger that drops everything. */
export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

/** Each call returns a time one second after the previous one, starting at START. */
export function steppingClock(start: Date = START, stepMs = 1000): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + stepMs * tick++);
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const fastRetryPolicy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, backoffMs: [0] };

export function makeHarness(options: { timeoutMs?: number } = {}) {
  const log = silentLogger();
  const store = new MemoryDraftStore(steppingClock());
  const textGenerate = vi.fn<TextGenerator["generate"]>().mockResolvedValue(ROSE_TEXT);
  const imageGenerate = vi.fn<ImageGenerator["generate"]>().mockResolvedValue(ROSE_IMAGE);
  const orchestrator = new GenerationOrchestrator({
    textGenerator: { generate: textGenerate },
    imageGenerator: { generate: imageGenerate },
    drafts: store,
    log,
    tone: "friendly",
    timeoutMs: options.timeoutMs ?? 1000,
    retryPolicy: fastRetryPolicy,
    sleep: async () => {},
  });
  const gateway = new LifecycleGateway({ store, orchestrator, log });
  return { store, orchestrator, gateway, textGenerate, imageGenerate, log };
}
