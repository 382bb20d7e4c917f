import { index, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

import type { TranscriptSource } from "@/types/transcript";

export const users = pgTable("users", {
  id: uuid("id").primaryKey(),
  email: text("email").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export const blogPosts = pgTable(
  "blog_posts",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    title: text("title").notNull(),
    description: text("description").notNull(),
    content: text("content").notNull(),
    category: text("category").default("Technology").notNull(),
    youtubeUrl: text("youtube_url").notNull(),
    youtubeTitle: text("youtube_title").notNull(),
    youtubeChannel: text("youtube_channel").notNull(),
    youtubeDuration: text("youtube_duration").notNull(),
    transcriptSource: text("transcript_source").$type<TranscriptSource>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userCreatedAtIdx: index("idx_blog_posts_user_created_at").on(table.userId, table.createdAt),
  }),
);

export type BlogPostRow = typeof blogPosts.$inferSelect;
