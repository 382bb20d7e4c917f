import { NextResponse } from "next/server";

import { resolveApiUser } from "@/lib/auth/api-user";
import { createPuppeteerLauncher } from "@/lib/captcha/browser";
import { getCaptchaConfig } from "@/lib/captcha/config";
import { getCookieSession } from "@/lib/cookies/cookie-store";
import { jsonError, readJsonBody, toErrorResponse } from "@/lib/errors/http";
import { recoverAndRetry } from "@/lib/pipeline/blog-pipeline";
import { botDetectedResponse, saveGeneratedBlog } from "@/lib/pipeline/blog-response";
import { parseGenerateBlogPayload } from "@/lib/validators/blog-request";
import { normalizeYouTubeUrl } from "@/lib/validators/youtube";
import { BotDetectedError } from "@/lib/youtube/bot-detection";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/**
 * Opens the recovery browser for a video that hit a bot wall, waits for a person to clear the
 * challenge, then runs generation once more with the new cookies.
 */
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
  const youtubeUrl = payload ? normalizeYouTubeUrl(payload.youtubeUrl) : null;
  if (!youtubeUrl) {
    return jsonError("Enter a valid YouTube video URL.", "YOUTUBE_URL_INVALID", 422);
  }

  const requestId = crypto.randomUUID();
  try {
    const config = getCaptchaConfig();
    const recovered = await recoverAndRetry(
      { kind: "bot_detected", youtubeUrl, rawError: "Verification requested by the client." },
      getCookieSession(),
      {
        launcher: createPuppeteerLauncher(config.browserPath),
        timeoutMs: config.timeoutMs,
        navigationTimeoutMs: config.navigationTimeoutMs,
        signal: request.signal,
        requestId,
      },
    );
    const blog = await saveGeneratedBlog(userId, recovered);

    console.info("[captcha-solve] recovered", {
      requestId,
      youtubeUrl,
      cookieCount: recovered.recovery.cookieCount,
    });
    return NextResponse.json({ blog, cookiesSaved: true }, { status: 201 });
  } catch (error) {
    if (error instanceof BotDetectedError) {
      return botDetectedResponse(error);
    }
    return toErrorResponse(error, "CAPTCHA recovery failed.", "captcha-solve");
  }
}
