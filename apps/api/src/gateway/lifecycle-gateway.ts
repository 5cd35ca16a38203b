import type { FastifyBaseLogger } from "fastify";
import type {
  Draft,
  DraftStatus,
  EditHistoryEntry,
  EditSource,
  FrontendChannel,
} from "@postroom/shared";
import {
  GenerationError,
  InvalidTransitionError,
  KeyedMutex,
  transition,
  type DraftEvent,
  type StatusEvent,
} from "@postroom/lifecycle";
import type { DraftStore } from "../store/types.js";
import type { GenerationOrchestrator } from "../generation/orchestrator.js";

export interface LifecycleGatewayOptions {
  store: DraftStore;
  orchestrator: GenerationOrchestrator;
  log: FastifyBaseLogger;
  mutex?: KeyedMutex;
}

/** Created but nothing generated yet. Hidden from listings. */
function isHollow(draft: Draft): boolean {
  return draft.text === null && draft.imageRef === null;
}

/**
 * The one entry point both front-ends use.
 *
 * Store mutations for a draft run inside that draft's critical section; calls to
 * the generators happen before the lock is taken, so a slow provider never blocks
 * an approve or edit on the same draft.
 */
export class LifecycleGateway {
  private readonly store: DraftStore;
  private readonly orchestrator: GenerationOrchestrator;
  private readonly log: FastifyBaseLogger;
  private readonly mutex: KeyedMutex;

  constructor(options: LifecycleGatewayOptions) {
    this.store = options.store;
    this.orchestrator = options.orchestrator;
    this.log = options.log;
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  /**
   * Create a draft and fill in text and image concurrently.
   * A failed half is reported as a GenerationError carrying the draft id; the
   * draft and whatever did succeed are kept so someone can retry by hand.
   */
  async createAndGenerate(subject: string): Promise<Draft> {
    const created = await this.store.createDraft(subject);
    const draftId = created.id;
    this.log.info({ draftId, subject }, "Draft created");

    const [text, image] = await Promise.allSettled([
      this.orchestrator
        .generateText(subject)
        .then((value) => this.locked(draftId, () => this.store.applyTextEdit(draftId, value, "system"))),
      this.orchestrator
        .generateImage(subject)
        .then((ref) => this.locked(draftId, () => this.store.applyImageUpdate(draftId, ref))),
    ]);

    const failure =
      text.status === "rejected" ? text.reason : image.status === "rejected" ? image.reason : null;
    if (failure !== null) {
      this.log.warn({ draftId }, "Draft created with missing content");
      throw failure instanceof GenerationError ? failure.forDraft(draftId) : failure;
    }

    return this.locked(draftId, () => this.store.getDraft(draftId));
  }

  async approve(draftId: string): Promise<Draft> {
    return this.changeStatus(draftId, "approve");
  }

  async reject(draftId: string): Promise<Draft> {
    return this.changeStatus(draftId, "reject");
  }

  async publish(draftId: string): Promise<Draft> {
    return this.changeStatus(draftId, "publish");
  }

  async editText(draftId: string, newText: string, source: EditSource): Promise<Draft> {
    const draft = await this.locked(draftId, () =>
      this.store.applyTextEdit(draftId, newText, source),
    );
    this.log.info({ draftId, source }, "Draft text edited");
    return draft;
  }

  async regenerateText(draftId: string, instruction?: string): Promise<Draft> {
    await this.ensureAllowed(draftId, "regenerate_text");
    const text = await this.orchestrator.regenerateText(draftId, instruction);
    const draft = await this.locked(draftId, () =>
      this.store.applyTextEdit(draftId, text, "ai-regeneration"),
    );
    this.log.info({ draftId }, "Draft text regenerated");
    return draft;
  }

  async regenerateImage(draftId: string): Promise<Draft> {
    const current = await this.ensureAllowed(draftId, "regenerate_image");
    let imageRef: string;
    try {
      imageRef = await this.orchestrator.generateImage(current.subject);
    } catch (error) {
      throw error instanceof GenerationError ? error.forDraft(draftId) : error;
    }
    const draft = await this.locked(draftId, () => this.store.applyImageUpdate(draftId, imageRef));
    this.log.info({ draftId, imageRef }, "Draft image regenerated");
    return draft;
  }

  async getDraft(draftId: string): Promise<Draft> {
    return this.store.getDraft(draftId);
  }

  async listDrafts(status?: DraftStatus): Promise<Draft[]> {
    const drafts = await this.store.listDrafts(status);
    return drafts.filter((draft) => !isHollow(draft));
  }

  async getHistory(draftId: string): Promise<EditHistoryEntry[]> {
    return this.store.getHistory(draftId);
  }

  /** Point a channel at the message or view now showing the draft. */
  async attachExternalRef(
    draftId: string,
    channel: FrontendChannel,
    ref: string | null,
  ): Promise<Draft> {
    return this.locked(draftId, () => this.store.setExternalRef(draftId, channel, ref));
  }

  async schedulePublication(draftId: string, at: Date): Promise<Draft> {
    const draft = await this.locked(draftId, () => this.store.setSchedule(draftId, at));
    this.log.info({ draftId, scheduledAt: at.toISOString() }, "Publication scheduled");
    return draft;
  }

  async cancelSchedule(draftId: string): Promise<Draft> {
    return this.locked(draftId, () => this.store.setSchedule(draftId, null));
  }

  private async changeStatus(draftId: string, event: StatusEvent): Promise<Draft> {
    const draft = await this.locked(draftId, () => this.store.transitionStatus(draftId, event));
    this.log.info({ draftId, event, status: draft.status }, "Draft status changed");
    return draft;
  }

  /**
   * Fail fast before spending a provider call on a draft that could not take the
   * result. The store checks again when the result is written.
   */
  private async ensureAllowed(draftId: string, event: DraftEvent): Promise<Draft> {
    const draft = await this.store.getDraft(draftId);
    if (transition(draft.status, event) === null) {
      throw new InvalidTransitionError(draftId, draft.status, event);
    }
    return draft;
  }

  private locked<T>(draftId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(draftId, task);
  }
}
