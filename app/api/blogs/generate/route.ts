import { NextResponse } from "next/server";

import { resolveApiUser } from "@/lib/auth/api-user";
import { getCookieSession } from "@/lib/cookies/cookie-store";
import { jsonError, readJsonBody, toErrorResponse } from "@/lib/errors/http";
import { generateBlogFromYouTube } from "@/lib/pipeline/blog-pipeline";
import { botDetectedResponse, saveGeneratedBlog } from "@/lib/pipeline/blog-response";
import { parseGenerateBlogPayload, validateGenerateBlogRequest } from "@/lib/validators/blog-request";
import { BotDetectedError } from "@/lib/youtube/bot-detection";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function POST(request: Request) {
  const { userId, errorResponse } = await resolveApiUser({ ensureProfile: true });
  if (errorResponse) {
    return errorResponse;
  }

  const parsed = await readJsonBody(request);
  if (!parsed.ok) {
    return jsonError("The request body must be JSON.", "INVALID_JSON", 400);
  }

  const payload = parseGenerateBlogPayload(parsed.body);
  if (!payload) {
    return jsonError("The request body must include youtubeUrl.", "INVALID_REQUEST", 400);
  }

  const validation = validateGenerateBlogRequest(payload);
  if (!validation.ok) {
    return jsonError(validation.message ?? "Invalid YouTube URL.", "YOUTUBE_URL_INVALID", 422);
  }

  const requestId = crypto.randomUUID();
  try {
    const generated = await generateBlogFromYouTube(payload.youtubeUrl, getCookieSession(), {
      signal: request.signal,
      requestId,
    });
    const blog = await saveGeneratedBlog(userId, generated);

    return NextResponse.json({ blog }, { status: 201 });
  } catch (error) {
    if (error instanceof BotDetectedError) {
      console.warn("[blogs-generate] bot detection", { requestId, youtubeUrl: error.youtubeUrl });
      return botDetectedResponse(error);
    }
    return toErrorResponse(error, "Blog generation failed.", "blogs-generate");
  }
}
