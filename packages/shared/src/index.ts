// ─── Shared Types ────────────────────────────────────────────
export type {
  DraftStatus,
  EditSource,
  FrontendChannel,
  Draft,
  EditHistoryEntry,
} from "./types/draft.js";
export type { ApiResponse, ApiError } from "./types/api.js";

// ─── Constants ───────────────────────────────────────────────
export { DRAFT_STATUSES, FRONTEND_CHANNELS, POST_TONES } from "./constants.js";
export type { PostTone } from "./constants.js";

// ─── Utilities ───────────────────────────────────────────────
export { createApiResponse, createApiError } from "./utils/api.js";
