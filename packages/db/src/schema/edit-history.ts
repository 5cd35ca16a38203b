import { pgTable, serial, uuid, text, timestamp, index } from "drizzle-orm/pg-core";
import { drafts } from "./drafts.js";

/** Append-only. Rows are never updated or deleted; `id` gives insertion order. */
export const editHistory = pgTable(
  "edit_history",
  {
    id: serial("id").primaryKey(),
    draftId: uuid("draft_id")
      .notNull()
      .references(() => drafts.id),
    previousText: text("previous_text"),
    newText: text("new_text").notNull(),
    source: text("source", {
      enum: ["human-dashboard", "human-chat", "ai-regeneration", "system"],
    }).notNull(),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("edit_history_draft_id_idx").on(table.draftId, table.id)],
);
