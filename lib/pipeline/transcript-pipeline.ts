import type { CookieSession } from "@/lib/cookies/cookie-store";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { transcribeAudio } from "@/lib/transcription";
import { parseYouTubeUrl } from "@/lib/validators/youtube";
import { downloadAudio, type DownloadedAudio } from "@/lib/youtube/audio";
import { BotDetectedError } from "@/lib/youtube/bot-detection";
import { fetchDirectCaptions } from "@/lib/youtube/captions";
import { buildVideoInfo, fetchOEmbedVideoInfo, type VideoInfo } from "@/lib/youtube/video-info";
import type { TranscriptResult } from "@/types/transcript";

export interface TranscriptPipelineDeps {
  fetchCaptions: typeof fetchDirectCaptions;
  downloadAudio: typeof downloadAudio;
  transcribeAudio: typeof transcribeAudio;
  fetchVideoInfo: typeof fetchOEmbedVideoInfo;
}

export interface AcquireTranscriptOptions {
  signal?: AbortSignal;
  /** Defaults to true; when false a caption failure ends the pipeline. */
  allowAudioFallback?: boolean;
  deps?: Partial<TranscriptPipelineDeps>;
}

export interface AcquiredTranscript {
  youtubeUrl: string;
  videoId: string;
  transcript: TranscriptResult;
  videoInfo: VideoInfo;
}

const DEFAULT_DEPS: TranscriptPipelineDeps = {
  fetchCaptions: fetchDirectCaptions,
  downloadAudio,
  transcribeAudio,
  fetchVideoInfo: fetchOEmbedVideoInfo,
};

/**
 * Captions first; any caption failure falls back to audio download plus speech-to-text.
 * A caption bot wall is reported only when the download fails too; once the audio is in hand,
 * transcription errors surface unchanged.
 */
export async function acquireTranscript(
  rawYouTubeUrl: string,
  session: CookieSession,
  options: AcquireTranscriptOptions = {},
): Promise<AcquiredTranscript> {
  const parsed = parseYouTubeUrl(rawYouTubeUrl);
  if (!parsed) {
    throw new AppError("Enter a valid YouTube video URL.", "YOUTUBE_URL_INVALID", 422);
  }

  const deps: TranscriptPipelineDeps = { ...DEFAULT_DEPS, ...options.deps };
  const { normalizedUrl, videoId } = parsed;

  let captionError: unknown;
  try {
    const captions = await deps.fetchCaptions(videoId, normalizedUrl, session, options.signal);
    console.info("[transcript-pipeline] captions fetched", {
      videoId,
      languageCode: captions.transcript.languageCode,
      chars: captions.transcript.text.length,
    });
    return {
      youtubeUrl: normalizedUrl,
      videoId,
      transcript: captions.transcript,
      videoInfo: captions.videoInfo,
    };
  } catch (error) {
    captionError = error;
    console.info("[transcript-pipeline] captions unavailable", {
      videoId,
      botDetected: error instanceof BotDetectedError,
      message: errorMessageOf(error),
    });
  }

  if (options.allowAudioFallback === false) {
    if (captionError instanceof BotDetectedError) {
      throw captionError;
    }
    throw new AppError(
      `No transcript is available for this video: ${errorMessageOf(captionError)}`,
      "YOUTUBE_TRANSCRIPT_UNAVAILABLE",
      422,
    );
  }

  let audio: DownloadedAudio;
  try {
    audio = await deps.downloadAudio(normalizedUrl, session, { signal: options.signal });
  } catch (error) {
    console.warn("[transcript-pipeline] audio download failed", {
      videoId,
      code: error instanceof AppError ? error.code : null,
      message: errorMessageOf(error),
    });
    if (!(error instanceof BotDetectedError) && captionError instanceof BotDetectedError) {
      throw captionError;
    }
    throw error;
  }

  let transcript: TranscriptResult;
  try {
    transcript = await deps.transcribeAudio(audio.filePath, { signal: options.signal });
  } finally {
    await audio.cleanup();
  }

  const videoInfo = (await deps.fetchVideoInfo(normalizedUrl)) ?? buildVideoInfo({});
  console.info("[transcript-pipeline] audio transcribed", {
    videoId,
    provider: transcript.kind === "transcription" ? transcript.provider : null,
    chars: transcript.text.length,
  });

  return { youtubeUrl: normalizedUrl, videoId, transcript, videoInfo };
}
