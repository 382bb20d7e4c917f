export interface ParsedYouTubeUrl {
  /** Always `https://www.youtube.com/watch?v=<id>`, with playlist and timestamp dropped. */
  normalizedUrl: string;
  videoId: string;
}

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

/** Finds URL-looking substrings so a pasted sentence still yields its link. */
const URL_IN_TEXT_PATTERN =
  /(?:https?:\/\/)?(?:[a-z0-9-]+\.)*(?:youtube\.com|youtu\.be)\/[^\s<>"'()[\]{}]+/gi;

type VideoIdExtractor = (url: URL) => string | null;

const fromPathSegment =
  (index: number): VideoIdExtractor =>
  (url) =>
    url.pathname.split("/").filter(Boolean)[index] ?? null;

const fromYouTubePath: VideoIdExtractor = (url) => {
  const [first, second] = url.pathname.split("/").filter(Boolean);
  if (first === "watch") {
    return url.searchParams.get("v");
  }
  if (first && second && ["shorts", "embed", "live", "v"].includes(first)) {
    return second;
  }
  return null;
};

const EXTRACTORS: Record<string, VideoIdExtractor> = {
  "youtube.com": fromYouTubePath,
  "m.youtube.com": fromYouTubePath,
  "music.youtube.com": fromYouTubePath,
  "youtube-nocookie.com": fromYouTubePath,
  "youtu.be": fromPathSegment(0),
};

function toUrl(candidate: string): URL | null {
  const trimmed = candidate.replace(/[.,!?;:]+$/, "");
  try {
    return new URL(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    return null;
  }
}

function videoIdOf(candidate: string): string | null {
  const url = toUrl(candidate);
  if (!url) {
    return null;
  }

  const extractor = EXTRACTORS[url.hostname.toLowerCase().replace(/^www\./, "")];
  const videoId = extractor?.(url)?.trim();
  return videoId && VIDEO_ID_PATTERN.test(videoId) ? videoId : null;
}

export function parseYouTubeUrl(value: string): ParsedYouTubeUrl | null {
  const text = value.trim();
  if (!text) {
    return null;
  }

  const candidates = text.match(URL_IN_TEXT_PATTERN) ?? [text];
  for (const candidate of candidates) {
    const videoId = videoIdOf(candidate);
    if (videoId) {
      return { normalizedUrl: `https://www.youtube.com/watch?v=${videoId}`, videoId };
    }
  }
  return null;
}

export function normalizeYouTubeUrl(value: string): string | null {
  return parseYouTubeUrl(value)?.normalizedUrl ?? null;
}
