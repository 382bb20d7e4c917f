import { NextResponse } from "next/server";

import { isCaptchaSolverAvailable } from "@/lib/captcha/config";
import { createBlogPost } from "@/db/repositories/blog-repository";
import { describeAppError } from "@/lib/errors/error-messages";
import type { GeneratedBlog } from "@/lib/pipeline/blog-pipeline";
import type { BotDetectedError } from "@/lib/youtube/bot-detection";
import type { BlogPostRecord } from "@/types/blog";

export function saveGeneratedBlog(userId: string, generated: GeneratedBlog): Promise<BlogPostRecord> {
  return createBlogPost({
    userId,
    title: generated.blog.title,
    description: generated.blog.description,
    content: generated.blog.content,
    youtubeUrl: generated.youtubeUrl,
    youtubeTitle: generated.videoInfo.title,
    youtubeChannel: generated.videoInfo.channel,
    youtubeDuration: generated.videoInfo.duration,
    transcriptSource: generated.transcriptSource,
  });
}

/** 403 body that tells the client it can offer the CAPTCHA flow. */
export function botDetectedResponse(error: BotDetectedError): NextResponse {
  return NextResponse.json(
    {
      ...describeAppError(error),
      botDetection: true,
      youtubeUrl: error.youtubeUrl,
      captchaSolverAvailable: !error.retryExhausted && isCaptchaSolverAvailable(),
      retryExhausted: error.retryExhausted,
    },
    { status: error.statusCode },
  );
}
