import { pgTable, text, timestamp, jsonb, real, index } from "drizzle-orm/pg-core";
import { documents } from "./documents.js";
import { notificationPriorityEnum } from "./enums.js";

export const notificationEvents = pgTable(
  "notification_events",
  {
    id: text("id").primaryKey(),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    chunkId: text("chunk_id").notNull(),
    category: text("category").notNull(),
    similarity: real("similarity").notNull(),
    priority: notificationPriorityEnum("priority").notNull(),
    recipients: jsonb("recipients").notNull().$type<string[]>(),
    title: text("title").notNull(),
    message: text("message").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index("notification_events_document_idx").on(table.documentId),
  }),
);
