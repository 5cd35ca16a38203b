import { randomUUID } from "node:crypto";
import type {
  Draft,
  DraftStatus,
  EditHistoryEntry,
  EditSource,
  FrontendChannel,
} from "@postroom/shared";
import { NotFoundError, type StatusEvent } from "@postroom/lifecycle";
import { systemClock, type Clock, type DraftStore } from "./types.js";
import {
  nextUpdatedAt,
  planImageUpdate,
  planSchedule,
  planStatusChange,
  planTextEdit,
} from "./mutations.js";

interface StoredDraft {
  draft: Draft;
  /** Creation sequence, breaks `createdAt` ties in listings. */
  seq: number;
  history: EditHistoryEntry[];
}

const copyDate = (value: Date) => new Date(value.getTime());

/** Callers get their own objects, dates included. */
function snapshot(draft: Draft): Draft {
  return {
    ...draft,
    externalRefs: { ...draft.externalRefs },
    scheduledAt: draft.scheduledAt && copyDate(draft.scheduledAt),
    publishedAt: draft.publishedAt && copyDate(draft.publishedAt),
    createdAt: copyDate(draft.createdAt),
    updatedAt: copyDate(draft.updatedAt),
  };
}

/**
 * Process-local DraftStore. Used when no DATABASE_URL is configured, and by tests.
 *
 * Every method reads and writes without yielding between the two, so each call is
 * atomic with respect to other callers on the event loop.
 */
export class MemoryDraftStore implements DraftStore {
  private readonly rows = new Map<string, StoredDraft>();
  private nextSeq = 1;
  private nextHistoryId = 1;

  constructor(private readonly clock: Clock = systemClock) {}

  async createDraft(subject: string): Promise<Draft> {
    const now = this.clock();
    const draft: Draft = {
      id: randomUUID(),
      subject,
      text: null,
      imageRef: null,
      status: "draft",
      externalRefs: {},
      scheduledAt: null,
      publishedAt: null,
      createdAt: now,
      updatedAt: copyDate(now),
    };
    this.rows.set(draft.id, { draft, seq: this.nextSeq++, history: [] });
    return snapshot(draft);
  }

  async getDraft(id: string): Promise<Draft> {
    return snapshot(this.findOrThrow(id).draft);
  }

  async listDrafts(status?: DraftStatus): Promise<Draft[]> {
    return [...this.rows.values()]
      .filter((row) => status === undefined || row.draft.status === status)
      .sort(
        (a, b) =>
          b.draft.createdAt.getTime() - a.draft.createdAt.getTime() || b.seq - a.seq,
      )
      .map((row) => snapshot(row.draft));
  }

  async applyTextEdit(id: string, newText: string, source: EditSource): Promise<Draft> {
    const row = this.findOrThrow(id);
    const plan = planTextEdit(row.draft, newText, source);
    if (!plan) {
      return snapshot(row.draft);
    }

    const now = this.clock();
    row.history.push({
      id: this.nextHistoryId++,
      draftId: id,
      previousText: plan.previousText,
      newText: plan.newText,
      source,
      timestamp: copyDate(now),
    });
    row.draft = {
      ...row.draft,
      text: plan.newText,
      status: plan.status,
      updatedAt: nextUpdatedAt(row.draft, now),
    };
    return snapshot(row.draft);
  }

  async applyImageUpdate(id: string, imageRef: string): Promise<Draft> {
    const row = this.findOrThrow(id);
    const plan = planImageUpdate(row.draft, imageRef);
    if (!plan) {
      return snapshot(row.draft);
    }
    row.draft = { ...row.draft, ...plan, updatedAt: nextUpdatedAt(row.draft, this.clock()) };
    return snapshot(row.draft);
  }

  async transitionStatus(id: string, event: StatusEvent): Promise<Draft> {
    const row = this.findOrThrow(id);
    const now = this.clock();
    const plan = planStatusChange(row.draft, event, now);
    row.draft = { ...row.draft, ...plan, updatedAt: nextUpdatedAt(row.draft, now) };
    return snapshot(row.draft);
  }

  async getHistory(id: string): Promise<EditHistoryEntry[]> {
    return this.findOrThrow(id).history.map((entry) => ({
      ...entry,
      timestamp: copyDate(entry.timestamp),
    }));
  }

  async setExternalRef(
    id: string,
    channel: FrontendChannel,
    ref: string | null,
  ): Promise<Draft> {
    const row = this.findOrThrow(id);
    if ((row.draft.externalRefs[channel] ?? null) === ref) {
      return snapshot(row.draft);
    }
    const externalRefs = { ...row.draft.externalRefs };
    if (ref === null) {
      delete externalRefs[channel];
    } else {
      externalRefs[channel] = ref;
    }
    row.draft = {
      ...row.draft,
      externalRefs,
      updatedAt: nextUpdatedAt(row.draft, this.clock()),
    };
    return snapshot(row.draft);
  }

  async setSchedule(id: string, at: Date | null): Promise<Draft> {
    const row = this.findOrThrow(id);
    const plan = planSchedule(row.draft, at);
    if (!plan) {
      return snapshot(row.draft);
    }
    row.draft = { ...row.draft, ...plan, updatedAt: nextUpdatedAt(row.draft, this.clock()) };
    return snapshot(row.draft);
  }

  async listDueForPublication(now: Date): Promise<Draft[]> {
    const due: Draft[] = [];
    for (const { draft } of this.rows.values()) {
      if (
        draft.status === "approved" &&
        draft.scheduledAt !== null &&
        draft.scheduledAt.getTime() <= now.getTime()
      ) {
        due.push(snapshot(draft));
      }
    }
    return due.sort((a, b) => (a.scheduledAt?.getTime() ?? 0) - (b.scheduledAt?.getTime() ?? 0));
  }

  private findOrThrow(id: string): StoredDraft {
    const row = this.rows.get(id);
    if (!row) {
      throw new NotFoundError(id);
    }
    return row;
  }
}
