import type { BlogPostRecord } from "@/types/blog";

export interface MemoryUser {
  id: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

export type MemoryBlogPost = BlogPostRecord;

interface MemoryStore {
  users: Map<string, MemoryUser>;
  blogPosts: Map<string, MemoryBlogPost>;
}

declare global {
  var __blogcastMemoryStore__: MemoryStore | undefined;
}

function createStore(): MemoryStore {
  return {
    users: new Map<string, MemoryUser>(),
    blogPosts: new Map<string, MemoryBlogPost>(),
  };
}

export function getMemoryStore(): MemoryStore {
  if (!globalThis.__blogcastMemoryStore__) {
    globalThis.__blogcastMemoryStore__ = createStore();
  }
  return globalThis.__blogcastMemoryStore__;
}
