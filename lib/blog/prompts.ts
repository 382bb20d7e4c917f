import type { VideoInfo } from "@/lib/youtube/video-info";

export const TRANSCRIPT_PROMPT_MAX_CHARS = 12_000;

export const BLOG_SYSTEM_INSTRUCTION =
  "You are a professional blog writer who creates engaging, well-structured blog posts from video transcripts.";

export function buildBlogPrompt(transcript: string, videoInfo: Pick<VideoInfo, "title" | "channel">): string {
  return [
    "Create a well-structured, engaging blog post based on the following video transcript.",
    "",
    `Video Title: ${videoInfo.title}`,
    `Video Channel: ${videoInfo.channel}`,
    "",
    "Transcript:",
    transcript.slice(0, TRANSCRIPT_PROMPT_MAX_CHARS),
    "",
    "Please create:",
    "1. A compelling title (max 100 characters)",
    "2. A brief description (2-3 sentences, max 200 characters)",
    "3. A well-structured blog post with an engaging introduction, clear sections with headings, key points and insights, and a conclusion",
    "",
    "Format the response exactly as:",
    "TITLE: [title]",
    "DESCRIPTION: [description]",
    "CONTENT:",
    "[blog post content with headings and paragraphs]",
  ].join("\n");
}

export function buildContinuationPrompt(partialText: string): string {
  return [
    "The response was cut off. Continue ONLY the blog post content from the last sentence.",
    "Do not repeat the title or description. Keep the same style.",
    "",
    "Partial response:",
    partialText,
    "",
    "CONTINUATION:",
  ].join("\n");
}
