import { describe, it, expect, vi } from "vitest";
import { GenerationError, NotFoundError, ProviderError } from "@postroom/lifecycle";
import { MemoryDraftStore } from "../src/store/memory-draft-store.js";
import { GenerationOrchestrator } from "../src/generation/orchestrator.js";
import type { ImageGenerator, TextGenerator } from "../src/generation/types.js";
import { fastRetryPolicy, silentLogger, steppingClock } from "./helpers.js";

function makeOrchestrator(timeoutMs = 1000) {
  const store = new MemoryDraftStore(steppingClock());
  const textGenerate = vi.fn<TextGenerator["generate"]>();
  const imageGenerate = vi.fn<ImageGenerator["generate"]>();
  const log = silentLogger();
  const warn = vi.spyOn(log, "warn");
  const orchestrator = new GenerationOrchestrator({
    textGenerator: { generate: textGenerate },
    imageGenerator: { generate: imageGenerate },
    drafts: store,
    log,
    tone: "professional",
    timeoutMs,
    retryPolicy: fastRetryPolicy,
    sleep: async () => {},
  });
  return { orchestrator, store, textGenerate, imageGenerate, warn };
}

describe("GenerationOrchestrator.generateText", () => {
  it("calls the generator with the configured tone", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator();
    textGenerate.mockResolvedValue("Golden acacia honey, straight from the hive.");

    const text = await orchestrator.generateText("acacia honey", { maxLength: 200 });

    expect(text).toBe("Golden acacia honey, straight from the hive.");
    expect(textGenerate).toHaveBeenCalledTimes(1);
    const [subject, tone, options] = textGenerate.mock.calls[0];
    expect(subject).toBe("acacia honey");
    expect(tone).toBe("professional");
    expect(options.maxLength).toBe(200);
    expect(options.signal).toBeInstanceOf(AbortSignal);
  });

  it("lets callers override the tone", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator();
    textGenerate.mockResolvedValue("Wow!");

    await orchestrator.generateText("acacia honey", { tone: "enthusiastic" });

    expect(textGenerate.mock.calls[0][1]).toBe("enthusiastic");
  });

  it("retries rate limits and logs each retry", async () => {
    const { orchestrator, textGenerate, warn } = makeOrchestrator();
    textGenerate
      .mockRejectedValueOnce(new ProviderError("rate limited", { status: 429, retryable: true }))
      .mockResolvedValueOnce("Second try");

    await expect(orchestrator.generateText("acacia honey")).resolves.toBe("Second try");
    expect(textGenerate).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("does not retry an invalid-input rejection", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator();
    textGenerate.mockRejectedValue(new ProviderError("prompt blocked", { status: 400, retryable: false }));

    const error = await orchestrator.generateText("acacia honey").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ kind: "text", attempts: 1 });
    expect(textGenerate).toHaveBeenCalledTimes(1);
  });

  it("gives up after three transient failures", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator();
    textGenerate.mockRejectedValue(new ProviderError("unavailable", { status: 503, retryable: true }));

    await expect(orchestrator.generateText("acacia honey")).rejects.toMatchObject({
      kind: "text",
      attempts: 3,
      message: "Text generation failed after 3 attempt(s): unavailable",
    });
    expect(textGenerate).toHaveBeenCalledTimes(3);
  });

  it("reports an empty result as a failure, not a success", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator();
    textGenerate.mockResolvedValue("   ");

    await expect(orchestrator.generateText("acacia honey")).rejects.toMatchObject({
      kind: "text",
      attempts: 1,
    });
  });

  it("counts timeouts as transient", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator(10);
    textGenerate.mockImplementation(() => new Promise<string>(() => {}));

    await expect(orchestrator.generateText("acacia honey")).rejects.toMatchObject({
      kind: "text",
      attempts: 3,
    });
    expect(textGenerate).toHaveBeenCalledTimes(3);
  });
});

describe("GenerationOrchestrator.generateImage", () => {
  it("returns the generator's asset reference verbatim", async () => {
    const { orchestrator, imageGenerate } = makeOrchestrator();
    imageGenerate.mockResolvedValue("generated-images/acacia_1a2b3c4d.png");

    await expect(orchestrator.generateImage("acacia honey")).resolves.toBe(
      "generated-images/acacia_1a2b3c4d.png",
    );
  });

  it("raises an image GenerationError on exhaustion", async () => {
    const { orchestrator, imageGenerate } = makeOrchestrator();
    imageGenerate.mockRejectedValue(new TypeError("fetch failed"));

    await expect(orchestrator.generateImage("acacia honey")).rejects.toMatchObject({
      kind: "image",
      attempts: 3,
    });
  });
});

describe("GenerationOrchestrator.regenerateText", () => {
  it("seeds the generator with the draft's subject and current text", async () => {
    const { orchestrator, store, textGenerate } = makeOrchestrator();
    const { id } = await store.createDraft("linden honey");
    await store.applyTextEdit(id, "Linden honey, soft and floral.", "system");
    textGenerate.mockResolvedValue("Shorter linden copy.");

    const text = await orchestrator.regenerateText(id, "make it shorter");

    expect(text).toBe("Shorter linden copy.");
    const [subject, , options] = textGenerate.mock.calls[0];
    expect(subject).toBe("linden honey");
    expect(options.previousText).toBe("Linden honey, soft and floral.");
    expect(options.instruction).toBe("make it shorter");
  });

  it("writes from scratch when the draft has no text yet", async () => {
    const { orchestrator, store, textGenerate } = makeOrchestrator();
    const { id } = await store.createDraft("linden honey");
    textGenerate.mockResolvedValue("Fresh copy.");

    await orchestrator.regenerateText(id);

    expect(textGenerate.mock.calls[0][2].previousText).toBeUndefined();
  });

  it("tags failures with the draft id and never writes to the store", async () => {
    const { orchestrator, store, textGenerate } = makeOrchestrator();
    const { id } = await store.createDraft("linden honey");
    await store.applyTextEdit(id, "Original", "system");
    textGenerate.mockRejectedValue(new ProviderError("down", { status: 500, retryable: true }));

    await expect(orchestrator.regenerateText(id)).rejects.toMatchObject({
      kind: "text",
      draftId: id,
    });
    expect((await store.getDraft(id)).text).toBe("Original");
    expect(await store.getHistory(id)).toHaveLength(1);
  });

  it("surfaces NotFoundError for unknown drafts without calling the generator", async () => {
    const { orchestrator, textGenerate } = makeOrchestrator();

    await expect(orchestrator.regenerateText("missing")).rejects.toBeInstanceOf(NotFoundError);
    expect(textGenerate).not.toHaveBeenCalled();
  });
});
