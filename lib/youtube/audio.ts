import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { CookieSession } from "@/lib/cookies/cookie-store";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { runProcess, summarizeHead, type RunProcessResult } from "@/lib/process/run-process";
import { classifyExtractionFailure, toBotDetectedError } from "@/lib/youtube/bot-detection";
import { BROWSER_USER_AGENT, YTDLP_PLAYER_CLIENTS } from "@/lib/youtube/browser-identity";
import { getYouTubeToolConfig, type YouTubeToolConfig } from "@/lib/youtube/config";

export interface DownloadedAudio {
  filePath: string;
  cleanup(): Promise<void>;
}

export interface DownloadAudioOptions {
  signal?: AbortSignal;
  config?: YouTubeToolConfig;
}

interface YtDlpArgsInput {
  youtubeUrl: string;
  outputTemplate: string;
  cookieFile: string | null;
  ffmpegLocation: string | null;
}

/** Checked in order after yt-dlp exits; `.wav` exists whenever ffmpeg post-processing ran. */
const AUDIO_EXTENSIONS = [".wav", ".webm", ".m4a", ".mp3", ".opus", ".ogg"];
const FFMPEG_PROBE_TIMEOUT_MS = 10_000;

export async function isFfmpegAvailable(ffmpegPath: string): Promise<boolean> {
  try {
    const result = await runProcess(ffmpegPath, ["-version"], { timeoutMs: FFMPEG_PROBE_TIMEOUT_MS });
    return result.code === 0;
  } catch {
    return false;
  }
}

function buildYtDlpArgs(input: YtDlpArgsInput): string[] {
  const args = [
    "--format",
    "bestaudio/best",
    "--output",
    input.outputTemplate,
    "--user-agent",
    BROWSER_USER_AGENT,
    "--extractor-args",
    YTDLP_PLAYER_CLIENTS,
    "--no-playlist",
    "--no-progress",
    "--no-warnings",
  ];

  if (input.cookieFile) {
    args.push("--cookies", input.cookieFile);
  }

  if (input.ffmpegLocation) {
    args.push(
      "--extract-audio",
      "--audio-format",
      "wav",
      "--audio-quality",
      "192K",
      "--ffmpeg-location",
      input.ffmpegLocation,
    );
  }

  args.push(input.youtubeUrl);
  return args;
}

async function locateAudioFile(workDir: string): Promise<string | null> {
  const files = await readdir(workDir);

  for (const extension of AUDIO_EXTENSIONS) {
    const match = files.find((file) => file === `audio${extension}`);
    if (match) {
      return join(workDir, match);
    }
  }

  const fallback = files.find(
    (file) => file.startsWith("audio") && !file.endsWith(".part") && !file.endsWith(".ytdl"),
  );
  return fallback ? join(workDir, fallback) : null;
}

export async function downloadAudio(
  youtubeUrl: string,
  session: CookieSession,
  options: DownloadAudioOptions = {},
): Promise<DownloadedAudio> {
  const config = options.config ?? getYouTubeToolConfig();
  if (config.ytDlpDisabled) {
    throw new AppError("Audio download is disabled (YTDLP_DISABLED).", "AUDIO_DOWNLOAD_FAILED", 502);
  }

  const workDir = await mkdtemp(join(tmpdir(), "blogcast-audio-"));
  const cleanup = async () => {
    await rm(workDir, { recursive: true, force: true });
  };

  try {
    const cookieFile = await session.cookieFile();
    const ffmpegLocation = (await isFfmpegAvailable(config.ffmpegPath)) ? config.ffmpegPath : null;
    const args = buildYtDlpArgs({
      youtubeUrl,
      outputTemplate: join(workDir, "audio.%(ext)s"),
      cookieFile,
      ffmpegLocation,
    });

    let result: RunProcessResult;
    try {
      result = await runProcess(config.ytDlpPath, args, {
        timeoutMs: config.ytDlpTimeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      throw new AppError(
        `yt-dlp could not be started (${config.ytDlpPath}): ${errorMessageOf(error)}`,
        "AUDIO_DOWNLOAD_FAILED",
        502,
      );
    }

    console.info("[youtube-audio] yt-dlp finished", {
      code: result.code,
      timedOut: result.timedOut,
      withCookies: cookieFile !== null,
      withFfmpeg: ffmpegLocation !== null,
      stderrHead: summarizeHead(result.stderr),
    });

    const condition = classifyExtractionFailure(youtubeUrl, `${result.stderr}\n${result.stdout}`);
    if (result.code !== 0) {
      if (condition.kind === "bot_detected") {
        throw toBotDetectedError({ ...condition, rawError: summarizeHead(result.stderr, 500) });
      }
      throw new AppError(
        result.timedOut
          ? `yt-dlp timed out after ${config.ytDlpTimeoutMs}ms.`
          : `yt-dlp exited with code ${result.code}: ${summarizeHead(result.stderr)}`,
        "AUDIO_DOWNLOAD_FAILED",
        502,
      );
    }

    const filePath = await locateAudioFile(workDir);
    if (!filePath) {
      throw new AppError("yt-dlp finished without producing an audio file.", "AUDIO_DOWNLOAD_FAILED", 502);
    }

    return { filePath, cleanup };
  } catch (error) {
    await cleanup();
    throw error;
  }
}

export const __testables = {
  buildYtDlpArgs,
  locateAudioFile,
};
