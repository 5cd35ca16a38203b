import { pgTable, uuid, serial, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type { FrontendChannel } from "@postroom/shared";

export const drafts = pgTable(
  "drafts",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    // Insertion order; breaks created_at ties in listings.
    seq: serial("seq").notNull(),
    subject: text("subject").notNull(),
    text: text("text"), // null until the first generation lands
    imageRef: text("image_ref"),
    status: text("status", { enum: ["draft", "approved", "rejected", "published"] })
      .notNull()
      .default("draft"),
    externalRefs: jsonb("external_refs")
      .$type<Partial<Record<FrontendChannel, string>>>()
      .notNull()
      .default({}),
    scheduledAt: timestamp("scheduled_at", { withTimezone: true }),
    publishedAt: timestamp("published_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("drafts_status_created_at_idx").on(table.status, table.createdAt, table.seq),
    index("drafts_scheduled_at_idx").on(table.scheduledAt),
  ],
);
