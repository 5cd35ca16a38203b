import type { FastifyBaseLogger } from "fastify";
import { InvalidTransitionError } from "@postroom/lifecycle";
import type { DraftStore } from "../store/types.js";
import type { LifecycleGateway } from "../gateway/lifecycle-gateway.js";

export interface PublicationSchedulerOptions {
  store: Pick<DraftStore, "listDueForPublication">;
  gateway: Pick<LifecycleGateway, "publish">;
  log: FastifyBaseLogger;
  intervalMs: number;
  clock?: () => Date;
}

export interface TickResult {
  published: string[];
  failed: string[];
}

/** Publishes approved drafts once their scheduled time has passed. */
export class PublicationScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<TickResult> | null = null;

  constructor(private readonly options: PublicationSchedulerOptions) {}

  start(): void {
    if (this.timer) {
      this.options.log.warn("Publication scheduler already running");
      return;
    }
    this.timer = setInterval(() => {
      // Overlapping ticks would race to publish the same drafts.
      if (this.running) return;
      this.running = this.tick().finally(() => {
        this.running = null;
      });
      this.running.catch((err: unknown) => {
        this.options.log.error({ err }, "Publication scheduler tick failed");
      });
    }, this.options.intervalMs);
    this.timer.unref();
    this.options.log.info({ intervalMs: this.options.intervalMs }, "Publication scheduler started");
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running.catch(() => undefined);
    }
  }

  async tick(now: Date = (this.options.clock ?? (() => new Date()))()): Promise<TickResult> {
    const { store, gateway, log } = this.options;
    const due = await store.listDueForPublication(now);
    const result: TickResult = { published: [], failed: [] };

    for (const draft of due) {
      try {
        await gateway.publish(draft.id);
        result.published.push(draft.id);
        log.info({ draftId: draft.id }, "Scheduled draft published");
      } catch (err) {
        result.failed.push(draft.id);
        if (err instanceof InvalidTransitionError) {
          log.warn({ draftId: draft.id, status: err.from }, "Scheduled draft no longer publishable");
        } else {
          log.error({ draftId: draft.id, err }, "Failed to publish scheduled draft");
        }
      }
    }
    return result;
  }
}
