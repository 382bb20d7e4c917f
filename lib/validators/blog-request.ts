import { normalizeYouTubeUrl } from "@/lib/validators/youtube";
import type { BlogPostPatch } from "@/types/blog";

export interface GenerateBlogRequestInput {
  youtubeUrl: string;
}

export interface ValidationResult {
  ok: boolean;
  message?: string;
}

const MAX_TITLE_CHARS = 200;
const MAX_DESCRIPTION_CHARS = 1_000;
const MAX_CATEGORY_CHARS = 50;
const MAX_CONTENT_CHARS = 100_000;

const BLOG_POST_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Post ids are uuids; anything else cannot match a row. */
export function isBlogPostId(value: string): boolean {
  return BLOG_POST_ID_PATTERN.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Accepts `youtubeUrl`, or `url` as sent by older clients. */
export function parseGenerateBlogPayload(body: unknown): GenerateBlogRequestInput | null {
  if (!isRecord(body)) {
    return null;
  }

  const raw = typeof body.youtubeUrl === "string" ? body.youtubeUrl : body.url;
  return typeof raw === "string" ? { youtubeUrl: raw } : null;
}

export function validateGenerateBlogRequest(input: GenerateBlogRequestInput): ValidationResult {
  const youtubeUrl = input.youtubeUrl.trim();
  if (!youtubeUrl) {
    return { ok: false, message: "A YouTube URL is required." };
  }

  if (!normalizeYouTubeUrl(youtubeUrl)) {
    return {
      ok: false,
      message: "Enter a valid YouTube video URL (for example https://youtu.be/VIDEO_ID).",
    };
  }

  return { ok: true };
}

export function parseUpdateBlogPayload(body: unknown): BlogPostPatch | null {
  if (!isRecord(body)) {
    return null;
  }

  const { title, description, content, category } = body;
  if (typeof title !== "string" || typeof description !== "string" || typeof content !== "string") {
    return null;
  }
  if (category !== undefined && category !== null && typeof category !== "string") {
    return null;
  }

  return {
    title,
    description,
    content,
    ...(typeof category === "string" ? { category } : {}),
  };
}

export function validateUpdateBlogPayload(patch: BlogPostPatch): ValidationResult {
  if (!patch.title.trim() || !patch.description.trim() || !patch.content.trim()) {
    return { ok: false, message: "Title, description and content are required." };
  }
  if (patch.title.length > MAX_TITLE_CHARS) {
    return { ok: false, message: `Title must be at most ${MAX_TITLE_CHARS} characters.` };
  }
  if (patch.description.length > MAX_DESCRIPTION_CHARS) {
    return { ok: false, message: `Description must be at most ${MAX_DESCRIPTION_CHARS} characters.` };
  }
  if (patch.content.length > MAX_CONTENT_CHARS) {
    return { ok: false, message: `Content must be at most ${MAX_CONTENT_CHARS} characters.` };
  }
  if (patch.category !== undefined && patch.category.trim().length > MAX_CATEGORY_CHARS) {
    return { ok: false, message: `Category must be at most ${MAX_CATEGORY_CHARS} characters.` };
  }

  return { ok: true };
}

/** Trims every field; a blank category counts as absent so the stored one is kept. */
export function normalizeUpdateBlogPayload(patch: BlogPostPatch): BlogPostPatch {
  const category = patch.category?.trim();
  return {
    title: patch.title.trim(),
    description: patch.description.trim(),
    content: patch.content.trim(),
    ...(category ? { category } : {}),
  };
}
