import { and, desc, eq } from "drizzle-orm";

import { getDb } from "@/db/client";
import { getMemoryStore } from "@/db/memory-store";
import { blogPosts, type BlogPostRow } from "@/db/schema";
import { DEFAULT_BLOG_CATEGORY, type BlogPostPatch, type BlogPostRecord } from "@/types/blog";
import type { TranscriptSource } from "@/types/transcript";

export interface CreateBlogPostInput {
  userId: string;
  title: string;
  description: string;
  content: string;
  category?: string;
  youtubeUrl: string;
  youtubeTitle: string;
  youtubeChannel: string;
  youtubeDuration: string;
  transcriptSource: TranscriptSource;
}

export const MAX_LIST_LIMIT = 100;

function toBlogPostRecord(row: BlogPostRow): BlogPostRecord {
  return {
    ...row,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function clampLimit(limit: number): number {
  return Math.min(Math.max(Math.floor(limit), 1), MAX_LIST_LIMIT);
}

export async function createBlogPost(input: CreateBlogPostInput): Promise<BlogPostRecord> {
  const category = input.category?.trim() || DEFAULT_BLOG_CATEGORY;
  const db = getDb();
  if (!db) {
    const now = new Date().toISOString();
    const record: BlogPostRecord = {
      ...input,
      id: crypto.randomUUID(),
      category,
      createdAt: now,
      updatedAt: now,
    };
    getMemoryStore().blogPosts.set(record.id, record);
    return { ...record };
  }

  const now = new Date();
  const [created] = await db
    .insert(blogPosts)
    .values({ ...input, category, createdAt: now, updatedAt: now })
    .returning();

  return toBlogPostRecord(created);
}

/** Scoped to the owner: another user's post reads as missing. */
export async function getBlogPostById(id: string, userId: string): Promise<BlogPostRecord | null> {
  const db = getDb();
  if (!db) {
    const post = getMemoryStore().blogPosts.get(id);
    return post && post.userId === userId ? { ...post } : null;
  }

  const [row] = await db
    .select()
    .from(blogPosts)
    .where(and(eq(blogPosts.id, id), eq(blogPosts.userId, userId)))
    .limit(1);

  return row ? toBlogPostRecord(row) : null;
}

export async function listBlogPostsByUser(userId: string, limit = 30): Promise<BlogPostRecord[]> {
  const effectiveLimit = clampLimit(limit);
  const db = getDb();
  if (!db) {
    return Array.from(getMemoryStore().blogPosts.values())
      .filter((post) => post.userId === userId)
      .sort((left, right) => new Date(right.createdAt).getTime() - new Date(left.createdAt).getTime())
      .slice(0, effectiveLimit)
      .map((post) => ({ ...post }));
  }

  const rows = await db
    .select()
    .from(blogPosts)
    .where(eq(blogPosts.userId, userId))
    .orderBy(desc(blogPosts.createdAt))
    .limit(effectiveLimit);

  return rows.map(toBlogPostRecord);
}

/** Category is kept when the patch leaves it out. */
export async function updateBlogPost(
  id: string,
  userId: string,
  patch: BlogPostPatch,
): Promise<BlogPostRecord | null> {
  const changes = {
    title: patch.title,
    description: patch.description,
    content: patch.content,
    ...(patch.category !== undefined ? { category: patch.category } : {}),
  };

  const db = getDb();
  if (!db) {
    const store = getMemoryStore();
    const existing = store.blogPosts.get(id);
    if (!existing || existing.userId !== userId) {
      return null;
    }

    const updated: BlogPostRecord = { ...existing, ...changes, updatedAt: new Date().toISOString() };
    store.blogPosts.set(id, updated);
    return { ...updated };
  }

  const [row] = await db
    .update(blogPosts)
    .set({ ...changes, updatedAt: new Date() })
    .where(and(eq(blogPosts.id, id), eq(blogPosts.userId, userId)))
    .returning();

  return row ? toBlogPostRecord(row) : null;
}

export async function deleteBlogPost(id: string, userId: string): Promise<boolean> {
  const db = getDb();
  if (!db) {
    const store = getMemoryStore();
    const existing = store.blogPosts.get(id);
    if (!existing || existing.userId !== userId) {
      return false;
    }
    return store.blogPosts.delete(id);
  }

  const deleted = await db
    .delete(blogPosts)
    .where(and(eq(blogPosts.id, id), eq(blogPosts.userId, userId)))
    .returning({ id: blogPosts.id });

  return deleted.length > 0;
}
