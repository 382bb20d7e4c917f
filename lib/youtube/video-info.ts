import { normalizeYouTubeUrl } from "@/lib/validators/youtube";

export interface VideoInfo {
  title: string;
  channel: string;
  durationSeconds: number;
  /** `M:SS` or `H:MM:SS`. */
  duration: string;
  description: string;
}

const DESCRIPTION_MAX_CHARS = 500;
const OEMBED_TIMEOUT_MS = 8_000;

export function formatDuration(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds) || totalSeconds <= 0) {
    return "0:00";
  }

  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = String(seconds % 60).padStart(2, "0");

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${rest}`;
  }
  return `${minutes}:${rest}`;
}

export function buildVideoInfo(input: {
  title?: string | null;
  channel?: string | null;
  durationSeconds?: number | null;
  description?: string | null;
}): VideoInfo {
  const durationSeconds =
    input.durationSeconds && Number.isFinite(input.durationSeconds) && input.durationSeconds > 0
      ? Math.floor(input.durationSeconds)
      : 0;

  return {
    title: input.title?.trim() || "Untitled YouTube video",
    channel: input.channel?.trim() || "Unknown channel",
    durationSeconds,
    duration: formatDuration(durationSeconds),
    description: (input.description ?? "").trim().slice(0, DESCRIPTION_MAX_CHARS),
  };
}

interface OEmbedPayload {
  title?: string;
  author_name?: string;
}

/** Title and channel via oEmbed; used when the player response was not reachable. */
export async function fetchOEmbedVideoInfo(rawYouTubeUrl: string): Promise<VideoInfo | null> {
  const normalizedUrl = normalizeYouTubeUrl(rawYouTubeUrl);
  if (!normalizedUrl) {
    return null;
  }

  const oembedUrl = `https://www.youtube.com/oembed?format=json&url=${encodeURIComponent(normalizedUrl)}`;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), OEMBED_TIMEOUT_MS);

  try {
    const response = await fetch(oembedUrl, {
      cache: "no-store",
      signal: controller.signal,
      headers: { accept: "application/json" },
    });

    if (!response.ok) {
      console.info("[video-info] oembed not ok", { status: response.status });
      return null;
    }

    const data = (await response.json()) as OEmbedPayload;
    if (!data.title?.trim()) {
      return null;
    }

    return buildVideoInfo({ title: data.title, channel: data.author_name });
  } catch (error) {
    console.info("[video-info] oembed failed", {
      message: error instanceof Error ? error.message : "unknown",
    });
    return null;
  } finally {
    clearTimeout(timeout);
  }
}
