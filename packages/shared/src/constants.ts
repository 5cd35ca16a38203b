export const DRAFT_STATUSES = ["draft", "approved", "rejected", "published"] as const;
export const FRONTEND_CHANNELS = ["chat", "dashboard"] as const;
export const POST_TONES = ["friendly", "professional", "enthusiastic"] as const;
export type PostTone = (typeof POST_TONES)[number];
