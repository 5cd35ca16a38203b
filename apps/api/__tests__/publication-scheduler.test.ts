import { afterEach, describe, it, expect, vi } from "vitest";
import { PublicationScheduler } from "../src/scheduler/publication-scheduler.js";
import { makeHarness, silentLogger } from "./helpers.js";

const NINE_AM = new Date("2026-02-01T09:00:00.000Z");
const TEN_AM = new Date("2026-02-01T10:00:00.000Z");

async function approvedDraft(harness: ReturnType<typeof makeHarness>, subject: string) {
  const { id } = await harness.gateway.createAndGenerate(subject);
  await harness.gateway.approve(id);
  return id;
}

describe("PublicationScheduler.tick", () => {
  it("publishes drafts whose time has come and leaves the rest", async () => {
    const harness = makeHarness();
    const due = await approvedDraft(harness, "rose vinegar");
    const later = await approvedDraft(harness, "linden honey");
    await harness.gateway.schedulePublication(due, NINE_AM);
    await harness.gateway.schedulePublication(later, new Date("2026-02-01T11:00:00.000Z"));
    const scheduler = new PublicationScheduler({
      store: harness.store,
      gateway: harness.gateway,
      log: harness.log,
      intervalMs: 60_000,
    });

    const result = await scheduler.tick(TEN_AM);

    expect(result).toEqual({ published: [due], failed: [] });
    expect((await harness.gateway.getDraft(due)).status).toBe("published");
    expect((await harness.gateway.getDraft(later))).toMatchObject({
      status: "approved",
      scheduledAt: new Date("2026-02-01T11:00:00.000Z"),
    });
  });

  it("does not publish the same draft twice", async () => {
    const harness = makeHarness();
    const id = await approvedDraft(harness, "rose vinegar");
    await harness.gateway.schedulePublication(id, NINE_AM);
    const scheduler = new PublicationScheduler({
      store: harness.store,
      gateway: harness.gateway,
      log: harness.log,
      intervalMs: 60_000,
    });

    await scheduler.tick(TEN_AM);
    const second = await scheduler.tick(TEN_AM);

    expect(second).toEqual({ published: [], failed: [] });
  });

  it("keeps going when one publish fails", async () => {
    const harness = makeHarness();
    const first = await approvedDraft(harness, "rose vinegar");
    const second = await approvedDraft(harness, "linden honey");
    await harness.gateway.schedulePublication(first, new Date("2026-02-01T08:00:00.000Z"));
    await harness.gateway.schedulePublication(second, NINE_AM);
    const log = silentLogger();
    const error = vi.spyOn(log, "error");
    const publish = vi
      .fn<(draftId: string) => ReturnType<typeof harness.gateway.publish>>()
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockImplementation((draftId) => harness.gateway.publish(draftId));
    const scheduler = new PublicationScheduler({
      store: harness.store,
      gateway: { publish },
      log,
      intervalMs: 60_000,
    });

    const result = await scheduler.tick(TEN_AM);

    expect(result).toEqual({ published: [second], failed: [first] });
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("PublicationScheduler.start", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks on the interval until stopped", async () => {
    vi.useFakeTimers();
    const harness = makeHarness();
    const listDueForPublication = vi.fn(async (_now: Date) => []);
    const scheduler = new PublicationScheduler({
      store: { listDueForPublication },
      gateway: harness.gateway,
      log: harness.log,
      intervalMs: 1000,
      clock: () => TEN_AM,
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(listDueForPublication).toHaveBeenCalledTimes(3);
    expect(listDueForPublication).toHaveBeenLastCalledWith(TEN_AM);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(3000);
    expect(listDueForPublication).toHaveBeenCalledTimes(3);
  });
});
