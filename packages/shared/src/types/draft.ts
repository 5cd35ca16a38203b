export type DraftStatus = "draft" | "approved" | "rejected" | "published";

/** Origin of a text edit. Closed set so every call site is checked at compile time. */
export type EditSource =
  | "human-dashboard"
  | "human-chat"
  | "ai-regeneration"
  | "system";

/** Front-end that may display a draft and receive update notifications for it. */
export type FrontendChannel = "chat" | "dashboard";

/**
 * A proposed social post tracked through review.
 * Used by: the draft stores, the lifecycle gateway, HTTP responses and MCP tool results.
 */
export interface Draft {
  id: string;
  subject: string;
  text: string | null;
  imageRef: string | null;
  status: DraftStatus;
  /** At most one active message/view reference per channel. */
  externalRefs: Partial<Record<FrontendChannel, string>>;
  scheduledAt: Date | null;
  publishedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Immutable audit record of one text change. Snapshots, not diffs. */
export interface EditHistoryEntry {
  id: number;
  draftId: string;
  previousText: string | null;
  newText: string;
  source: EditSource;
  timestamp: Date;
}
