import type { TranscriptSource } from "@/types/transcript";

export const DEFAULT_BLOG_CATEGORY = "Technology";

export interface BlogPostRecord {
  id: string;
  userId: string;
  title: string;
  description: string;
  content: string;
  category: string;
  youtubeUrl: string;
  youtubeTitle: string;
  youtubeChannel: string;
  youtubeDuration: string;
  transcriptSource: TranscriptSource;
  createdAt: string;
  updatedAt: string;
}

export interface BlogListItem {
  id: string;
  title: string;
  description: string;
  category: string;
  youtubeTitle: string;
  excerpt: string;
  createdAt: string;
}

export interface BlogPostPatch {
  title: string;
  description: string;
  content: string;
  category?: string;
}

const EXCERPT_MAX_CHARS = 160;

export function buildExcerpt(content: string, max = EXCERPT_MAX_CHARS): string {
  const plain = content
    .replace(/^#+\s*/gm, "")
    .replace(/\s+/g, " ")
    .trim();

  if (plain.length <= max) {
    return plain;
  }
  return `${plain.slice(0, max).trim()}...`;
}

export function toBlogListItem(record: BlogPostRecord): BlogListItem {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    category: record.category,
    youtubeTitle: record.youtubeTitle,
    excerpt: buildExcerpt(record.content),
    createdAt: record.createdAt,
  };
}
