import type {
  Draft,
  DraftStatus,
  EditHistoryEntry,
  EditSource,
  FrontendChannel,
} from "@postroom/shared";
import type { StatusEvent } from "@postroom/lifecycle";

/**
 * Sole authority over persisted drafts and their edit history.
 *
 * Every method is one atomic unit per draft: callers never observe a text change
 * without its history entry, or a history entry whose `previousText` skips a version.
 * Unknown ids raise `NotFoundError`; disallowed state/event pairs raise
 * `InvalidTransitionError` and leave the row untouched.
 */
export interface DraftStore {
  createDraft(subject: string): Promise<Draft>;
  getDraft(id: string): Promise<Draft>;
  /** Newest first. */
  listDrafts(status?: DraftStatus): Promise<Draft[]>;
  /** No-op (no entry, no `updatedAt` bump) when `newText` equals the current text. */
  applyTextEdit(id: string, newText: string, source: EditSource): Promise<Draft>;
  /** Not audited in history. */
  applyImageUpdate(id: string, imageRef: string): Promise<Draft>;
  transitionStatus(id: string, event: StatusEvent): Promise<Draft>;
  /** Oldest first. */
  getHistory(id: string): Promise<EditHistoryEntry[]>;
  setExternalRef(id: string, channel: FrontendChannel, ref: string | null): Promise<Draft>;
  /** Only approved drafts can carry a schedule. `null` clears it. */
  setSchedule(id: string, at: Date | null): Promise<Draft>;
  /** Approved drafts with `scheduledAt <= now`, earliest schedule first. */
  listDueForPublication(now: Date): Promise<Draft[]>;
}

/** Injected time source so stores stamp deterministic times in tests. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
