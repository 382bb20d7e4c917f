import type { BrowserLauncher } from "@/lib/captcha/browser";
import { recoveryOutcomeToError, runCaptchaRecovery, type RecoverySaved } from "@/lib/captcha/recovery";
import type { CookieSession } from "@/lib/cookies/cookie-store";
import { writeBlogPost, type WrittenBlog } from "@/lib/blog/writer";
import { acquireTranscript, type AcquireTranscriptOptions } from "@/lib/pipeline/transcript-pipeline";
import { BotDetectedError, type ExtractionCondition } from "@/lib/youtube/bot-detection";
import type { VideoInfo } from "@/lib/youtube/video-info";
import type { TranscriptSource } from "@/types/transcript";

export interface GeneratedBlog {
  blog: WrittenBlog;
  youtubeUrl: string;
  videoInfo: VideoInfo;
  transcriptSource: TranscriptSource;
}

export interface GenerateBlogOptions extends Omit<AcquireTranscriptOptions, "signal"> {
  signal?: AbortSignal;
  requestId?: string;
}

export async function generateBlogFromYouTube(
  youtubeUrl: string,
  session: CookieSession,
  options: GenerateBlogOptions = {},
): Promise<GeneratedBlog> {
  const acquired = await acquireTranscript(youtubeUrl, session, options);
  const blog = await writeBlogPost(acquired.transcript.text, acquired.videoInfo, {
    requestId: options.requestId,
    signal: options.signal,
  });

  console.info("[blog-pipeline] blog generated", {
    requestId: options.requestId,
    videoId: acquired.videoId,
    transcriptSource: acquired.transcript.kind,
    model: blog.model,
  });

  return {
    blog,
    youtubeUrl: acquired.youtubeUrl,
    videoInfo: acquired.videoInfo,
    transcriptSource: acquired.transcript.kind,
  };
}

export interface RecoverAndRetryDeps {
  launcher: BrowserLauncher;
  timeoutMs: number;
  navigationTimeoutMs?: number;
  signal?: AbortSignal;
  requestId?: string;
  generate?: typeof generateBlogFromYouTube;
  recover?: typeof runCaptchaRecovery;
}

export interface RecoveredBlog extends GeneratedBlog {
  recovery: RecoverySaved;
}

/**
 * One human-assisted recovery, then exactly one retry with the refreshed cookies. A bot wall
 * on the retry is terminal.
 */
export async function recoverAndRetry(
  condition: ExtractionCondition,
  session: CookieSession,
  deps: RecoverAndRetryDeps,
): Promise<RecoveredBlog> {
  const recover = deps.recover ?? runCaptchaRecovery;
  const generate = deps.generate ?? generateBlogFromYouTube;

  const outcome = await recover({
    condition,
    store: session.store,
    launcher: deps.launcher,
    timeoutMs: deps.timeoutMs,
    navigationTimeoutMs: deps.navigationTimeoutMs,
    signal: deps.signal,
  });

  if (outcome.status !== "saved") {
    throw recoveryOutcomeToError(outcome);
  }

  try {
    const generated = await generate(condition.youtubeUrl, session, {
      signal: deps.signal,
      requestId: deps.requestId,
    });
    return { ...generated, recovery: outcome };
  } catch (error) {
    if (error instanceof BotDetectedError) {
      console.warn("[blog-pipeline] bot wall persisted after recovery", {
        requestId: deps.requestId,
        youtubeUrl: condition.youtubeUrl,
      });
      throw new BotDetectedError(
        "YouTube still requires verification after the CAPTCHA was solved. Try again later.",
        error.youtubeUrl,
        error.rawError,
        true,
      );
    }
    throw error;
  }
}
