export * from "./drafts.js";
export * from "./edit-history.js";
