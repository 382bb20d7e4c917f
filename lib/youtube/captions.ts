import type { CookieSession } from "@/lib/cookies/cookie-store";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { summarizeHead } from "@/lib/process/run-process";
import { BotDetectedError, classifyExtractionFailure, isBotChallenge } from "@/lib/youtube/bot-detection";
import {
  BROWSER_ACCEPT_LANGUAGE,
  BROWSER_USER_AGENT,
  CONSENT_COOKIE,
} from "@/lib/youtube/browser-identity";
import { buildVideoInfo, type VideoInfo } from "@/lib/youtube/video-info";
import type { CaptionSegment, CaptionTranscript } from "@/types/transcript";

interface CaptionTrack {
  baseUrl?: string;
  kind?: string;
  languageCode?: string;
}

interface PlayerResponse {
  videoDetails?: {
    title?: string;
    author?: string;
    lengthSeconds?: string;
    shortDescription?: string;
  };
  captions?: {
    playerCaptionsTracklistRenderer?: {
      captionTracks?: CaptionTrack[];
    };
  };
}

interface Json3Payload {
  events?: Array<{
    tStartMs?: number;
    dDurationMs?: number;
    segs?: Array<{
      utf8?: string;
    }>;
  }>;
}

export interface DirectCaptionsResult {
  transcript: CaptionTranscript;
  videoInfo: VideoInfo;
}

interface FetchContext {
  videoId: string;
  youtubeUrl: string;
  cookieHeader: string;
  signal?: AbortSignal;
}

const REQUEST_TIMEOUT_MS = 12_000;
/** Tried in order when the player response lists no tracks at all. */
const FALLBACK_LANGUAGES = ["en", "en-US", "en-GB"];

const INNERTUBE_PLAYER_URL = "https://www.youtube.com/youtubei/v1/player";
const INNERTUBE_CLIENT_NAME = "WEB";
const INNERTUBE_CLIENT_VERSION = "2.20231219.01.00";

const PLAYER_RESPONSE_MARKERS = [
  "var ytInitialPlayerResponse = ",
  "ytInitialPlayerResponse = ",
  'window["ytInitialPlayerResponse"] = ',
];
const BLOCKED_BODY_MARKERS = [
  "consent.youtube.com",
  "before you continue to youtube",
  "www.google.com/sorry",
  "automated queries",
];

function normalizeChunk(value: string): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (/^\[[^\]]+\]$/.test(normalized)) {
    return "";
  }
  return normalized;
}

function pushSegment(segments: CaptionSegment[], segment: CaptionSegment) {
  if (!segment.text || segments[segments.length - 1]?.text === segment.text) {
    return;
  }
  segments.push(segment);
}

function extractJsonBlock(source: string, fromIndex: number): string | null {
  const start = source.indexOf("{", fromIndex);
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < source.length; index += 1) {
    const char = source[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return source.slice(start, index + 1);
      }
    }
  }

  return null;
}

function extractPlayerResponse(html: string): PlayerResponse | null {
  for (const marker of PLAYER_RESPONSE_MARKERS) {
    const markerIndex = html.indexOf(marker);
    if (markerIndex < 0) {
      continue;
    }

    const block = extractJsonBlock(html, markerIndex + marker.length);
    if (!block) {
      continue;
    }

    try {
      return JSON.parse(block) as PlayerResponse;
    } catch {
      continue;
    }
  }

  return null;
}

function scoreCaptionTrack(track: CaptionTrack): number {
  const languageCode = track.languageCode?.toLowerCase() ?? "";
  let score = 10;
  if (languageCode === "en") {
    score = 100;
  } else if (languageCode.startsWith("en")) {
    score = 90;
  }
  if (track.kind === "asr") {
    score -= 5;
  }
  return score;
}

function rankCaptionTracks(captionTracks: CaptionTrack[]): CaptionTrack[] {
  return captionTracks
    .filter((track) => typeof track.baseUrl === "string" && track.baseUrl.length > 0)
    .sort((left, right) => scoreCaptionTrack(right) - scoreCaptionTrack(left));
}

function buildHeaders(context: FetchContext, accept: string): Record<string, string> {
  return {
    accept,
    "accept-language": BROWSER_ACCEPT_LANGUAGE,
    origin: "https://www.youtube.com",
    referer: "https://www.youtube.com/",
    cookie: context.cookieHeader,
    "user-agent": BROWSER_USER_AGENT,
  };
}

/** Bounded by its own timeout and by the caller's signal, which may already be aborted. */
function fetchWithTimeout(url: string, init: RequestInit, signal: AbortSignal | undefined): Promise<Response> {
  const timeout = AbortSignal.timeout(REQUEST_TIMEOUT_MS);
  return fetch(url, {
    ...init,
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    cache: "no-store",
    redirect: "follow",
  });
}

async function fetchPlayerResponseViaInnertube(context: FetchContext): Promise<PlayerResponse | null> {
  try {
    const response = await fetchWithTimeout(
      INNERTUBE_PLAYER_URL,
      {
        method: "POST",
        headers: {
          ...buildHeaders(context, "*/*"),
          "content-type": "application/json",
          "x-youtube-client-name": "1",
          "x-youtube-client-version": INNERTUBE_CLIENT_VERSION,
        },
        body: JSON.stringify({
          videoId: context.videoId,
          context: {
            client: {
              clientName: INNERTUBE_CLIENT_NAME,
              clientVersion: INNERTUBE_CLIENT_VERSION,
              hl: "en",
              gl: "US",
            },
          },
        }),
      },
      context.signal,
    );

    if (!response.ok) {
      console.info("[youtube-captions] innertube player not ok", {
        videoId: context.videoId,
        status: response.status,
      });
      return null;
    }

    const data = (await response.json()) as PlayerResponse;
    if (!data.videoDetails && !data.captions) {
      return null;
    }
    return data;
  } catch (error) {
    console.info("[youtube-captions] innertube player failed", {
      videoId: context.videoId,
      message: errorMessageOf(error, "unknown"),
    });
    return null;
  }
}

function isHtmlLikeBody(contentType: string | null, loweredBody: string): boolean {
  return (
    (contentType ?? "").toLowerCase().includes("text/html") ||
    loweredBody.includes("<html") ||
    loweredBody.includes("<!doctype html")
  );
}

function isBlockedHtmlResponse(
  contentType: string | null,
  body: string,
  responseUrl: string | undefined,
): boolean {
  const loweredBody = body.toLowerCase();
  if (!isHtmlLikeBody(contentType, loweredBody)) {
    return false;
  }

  if (responseUrl?.includes("consent.youtube.com") || responseUrl?.includes("google.com/sorry")) {
    return true;
  }

  if (body.trim().length === 0 || isBotChallenge(body)) {
    return true;
  }

  return BLOCKED_BODY_MARKERS.some((marker) => loweredBody.includes(marker));
}

/** Bot walls become BotDetectedError, other blocks a plain transcript failure. */
function throwForBlockedPage(context: FetchContext, body: string, what: string): never {
  if (classifyExtractionFailure(context.youtubeUrl, body).kind === "bot_detected") {
    throw new BotDetectedError(
      `YouTube challenged the ${what} request with a bot check.`,
      context.youtubeUrl,
      summarizeHead(body, 500),
    );
  }

  throw new AppError(
    `YouTube blocked the ${what} request from this server.`,
    "YOUTUBE_TRANSCRIPT_BLOCKED",
    502,
  );
}

async function fetchPlayerResponse(context: FetchContext): Promise<PlayerResponse> {
  const innertubeResponse = await fetchPlayerResponseViaInnertube(context);
  if (innertubeResponse) {
    return innertubeResponse;
  }

  const watchUrl = `https://www.youtube.com/watch?v=${context.videoId}&hl=en`;
  let response: Response;
  try {
    response = await fetchWithTimeout(
      watchUrl,
      { headers: buildHeaders(context, "text/html,*/*;q=0.8") },
      context.signal,
    );
  } catch (error) {
    throw new AppError(
      `YouTube watch page request failed: ${errorMessageOf(error, "unknown")}`,
      "YOUTUBE_METADATA_FETCH_FAILED",
      502,
    );
  }

  const html = await response.text();
  const playerResponse = response.ok ? extractPlayerResponse(html) : null;
  if (playerResponse) {
    return playerResponse;
  }

  if (isBlockedHtmlResponse(response.headers.get("content-type"), html, response.url)) {
    throwForBlockedPage(context, html, "watch page");
  }

  throw new AppError(
    response.ok
      ? "The YouTube watch page did not contain a player response."
      : `YouTube watch page responded with ${response.status}.`,
    "YOUTUBE_METADATA_FETCH_FAILED",
    502,
  );
}

function parseJson3Transcript(payload: Json3Payload): CaptionSegment[] {
  const segments: CaptionSegment[] = [];

  for (const event of payload.events ?? []) {
    const text = normalizeChunk((event.segs ?? []).map((segment) => segment.utf8 ?? "").join(""));
    pushSegment(segments, {
      text,
      startMs: event.tStartMs ?? 0,
      durationMs: event.dDurationMs ?? 0,
    });
  }

  return segments;
}

function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, "\"")
    .replace(/&#39;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) =>
      String.fromCodePoint(Number.parseInt(code, 16)),
    );
}

function secondsAttribute(tag: string, name: string): number {
  const match = tag.match(new RegExp(`\\b${name}="([0-9.]+)"`));
  return match ? Math.round(Number(match[1]) * 1000) : 0;
}

function parseXmlTranscript(raw: string): CaptionSegment[] {
  const segments: CaptionSegment[] = [];
  const regex = /<text\b([^>]*)>([\s\S]*?)<\/text>/gi;

  for (const match of raw.matchAll(regex)) {
    const attributes = match[1] ?? "";
    pushSegment(segments, {
      text: normalizeChunk(decodeHtmlEntities(match[2] ?? "")),
      startMs: secondsAttribute(attributes, "start"),
      durationMs: secondsAttribute(attributes, "dur"),
    });
  }

  return segments;
}

const VTT_CUE_TIMING =
  /^((?:\d{2}:)?\d{2}:\d{2}\.\d{3})\s+-->\s+((?:\d{2}:)?\d{2}:\d{2}\.\d{3})(?:\s+.*)?$/;

function vttTimestampMs(value: string): number {
  const parts = value.split(":").map(Number);
  const seconds = parts.reduce((total, part) => total * 60 + part, 0);
  return Math.round(seconds * 1000);
}

function parseVttTranscript(raw: string): CaptionSegment[] {
  const segments: CaptionSegment[] = [];
  let cue: { startMs: number; endMs: number; lines: string[] } | null = null;

  const flush = () => {
    if (cue) {
      pushSegment(segments, {
        text: normalizeChunk(cue.lines.join(" ")),
        startMs: cue.startMs,
        durationMs: Math.max(0, cue.endMs - cue.startMs),
      });
    }
    cue = null;
  };

  for (const rawLine of raw.replace(/\r\n/g, "\n").split("\n")) {
    const line = rawLine.trim();
    const timing = line.match(VTT_CUE_TIMING);

    if (timing) {
      flush();
      cue = { startMs: vttTimestampMs(timing[1]), endMs: vttTimestampMs(timing[2]), lines: [] };
      continue;
    }

    if (!line) {
      flush();
      continue;
    }

    if (cue) {
      cue.lines.push(decodeHtmlEntities(line.replace(/<[^>]+>/g, "")));
    }
  }
  flush();

  return segments;
}

function parseCaptionBody(rawBody: string, contentType: string | null): CaptionSegment[] {
  const trimmed = rawBody.trim();
  if (!trimmed) {
    return [];
  }

  const loweredContentType = (contentType ?? "").toLowerCase();
  if (loweredContentType.includes("application/json") || trimmed.startsWith("{")) {
    try {
      return parseJson3Transcript(JSON.parse(trimmed) as Json3Payload);
    } catch {
      return [];
    }
  }

  if (loweredContentType.includes("xml") || trimmed.startsWith("<")) {
    return parseXmlTranscript(trimmed);
  }

  return parseVttTranscript(trimmed);
}

function joinSegments(segments: CaptionSegment[]): string {
  return segments
    .map((segment) => segment.text)
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
}

function buildCaptionUrl(videoId: string, track: CaptionTrack, format?: "json3" | "vtt"): string {
  const url = new URL("https://www.youtube.com/api/timedtext");
  url.searchParams.set("v", videoId);

  const languageCode = track.languageCode?.trim();
  if (languageCode) {
    url.searchParams.set("lang", languageCode);
  }
  if (track.kind) {
    url.searchParams.set("kind", track.kind);
  }
  if (format) {
    url.searchParams.set("fmt", format);
  }

  return url.toString();
}

function candidateUrls(videoId: string, track: CaptionTrack): string[] {
  const candidates = new Set<string>();

  if (track.baseUrl) {
    candidates.add(track.baseUrl);
    try {
      for (const format of ["json3", "vtt"]) {
        const url = new URL(track.baseUrl);
        url.searchParams.set("fmt", format);
        candidates.add(url.toString());
      }
    } catch {
      // Relative or malformed base URLs only get the unsigned candidates below.
    }
  }

  candidates.add(buildCaptionUrl(videoId, track, "json3"));
  candidates.add(buildCaptionUrl(videoId, track, "vtt"));
  candidates.add(buildCaptionUrl(videoId, track));

  return [...candidates];
}

async function fetchTrackSegments(
  context: FetchContext,
  track: CaptionTrack,
): Promise<CaptionSegment[] | null> {
  const urls = candidateUrls(context.videoId, track);

  for (let candidateIndex = 0; candidateIndex < urls.length; candidateIndex += 1) {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        urls[candidateIndex],
        { headers: buildHeaders(context, "application/json,text/vtt,text/xml,*/*;q=0.8") },
        context.signal,
      );
    } catch (error) {
      console.info("[youtube-captions] candidate request failed", {
        candidateIndex,
        languageCode: track.languageCode ?? null,
        message: errorMessageOf(error, "unknown"),
      });
      continue;
    }

    const rawBody = await response.text();
    const contentType = response.headers.get("content-type");

    if (isBlockedHtmlResponse(contentType, rawBody, response.url) && isBotChallenge(rawBody)) {
      throwForBlockedPage(context, rawBody, "caption");
    }

    const segments = response.ok ? parseCaptionBody(rawBody, contentType) : [];
    if (segments.length > 0) {
      console.info("[youtube-captions] candidate parsed", {
        candidateIndex,
        languageCode: track.languageCode ?? null,
        kind: track.kind ?? null,
        segmentCount: segments.length,
      });
      return segments;
    }

    console.info("[youtube-captions] candidate empty", {
      candidateIndex,
      status: response.status,
      contentType,
      bodyHead: summarizeHead(rawBody),
    });
  }

  return null;
}

/**
 * Fetches captions without downloading media: Innertube player response (watch page as
 * fallback), ranked tracks with English first, then json3/vtt/xml candidates per track.
 */
export async function fetchDirectCaptions(
  videoId: string,
  youtubeUrl: string,
  session: CookieSession,
  signal?: AbortSignal,
): Promise<DirectCaptionsResult> {
  const sessionCookies = await session.cookieHeader("www.youtube.com");
  const context: FetchContext = {
    videoId,
    youtubeUrl,
    cookieHeader: sessionCookies ? `${CONSENT_COOKIE}; ${sessionCookies}` : CONSENT_COOKIE,
    signal,
  };

  const playerResponse = await fetchPlayerResponse(context);
  const details = playerResponse.videoDetails;
  const videoInfo = buildVideoInfo({
    title: details?.title,
    channel: details?.author,
    durationSeconds: details?.lengthSeconds ? Number(details.lengthSeconds) : 0,
    description: details?.shortDescription,
  });

  const listedTracks = rankCaptionTracks(
    playerResponse.captions?.playerCaptionsTracklistRenderer?.captionTracks ?? [],
  );
  const tracks: CaptionTrack[] =
    listedTracks.length > 0
      ? listedTracks
      : FALLBACK_LANGUAGES.map((languageCode) => ({ languageCode }));

  for (const track of tracks) {
    const segments = await fetchTrackSegments(context, track);
    if (!segments) {
      continue;
    }

    return {
      transcript: {
        kind: "captions",
        languageCode: track.languageCode ?? "und",
        segments,
        text: joinSegments(segments),
      },
      videoInfo,
    };
  }

  throw new AppError(
    `No usable captions were found for video ${videoId}.`,
    "YOUTUBE_TRANSCRIPT_UNAVAILABLE",
    422,
  );
}

export const __testables = {
  extractPlayerResponse,
  isBlockedHtmlResponse,
  joinSegments,
  parseCaptionBody,
  rankCaptionTracks,
};
