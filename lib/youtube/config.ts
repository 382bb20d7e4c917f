import { parseBoolean, parsePositiveInteger, readEnv } from "@/lib/config/env";

export interface YouTubeToolConfig {
  ytDlpPath: string;
  ytDlpDisabled: boolean;
  ytDlpTimeoutMs: number;
  ffmpegPath: string;
}

const DEFAULTS = {
  ytDlpPath: "yt-dlp",
  ytDlpTimeoutMs: 300_000,
  ffmpegPath: "ffmpeg",
};

export function getYouTubeToolConfig(): YouTubeToolConfig {
  return {
    ytDlpPath: readEnv("YTDLP_PATH") ?? DEFAULTS.ytDlpPath,
    ytDlpDisabled: parseBoolean(process.env.YTDLP_DISABLED),
    ytDlpTimeoutMs: parsePositiveInteger(
      "YTDLP_TIMEOUT_MS",
      process.env.YTDLP_TIMEOUT_MS,
      DEFAULTS.ytDlpTimeoutMs,
      "YOUTUBE_CONFIG_INVALID",
    ),
    ffmpegPath: readEnv("FFMPEG_PATH") ?? DEFAULTS.ffmpegPath,
  };
}
