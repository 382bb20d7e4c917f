import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CookieStore, type CookieSession } from "@/lib/cookies/cookie-store";

import { BotDetectedError } from "./bot-detection";
import { __testables, fetchDirectCaptions } from "./captions";

const VIDEO_ID = "abcdefghijk";
const VIDEO_URL = `https://www.youtube.com/watch?v=${VIDEO_ID}`;

function fakeSession(cookieHeader: string | null = null): CookieSession {
  return {
    store: new CookieStore("/tmp/blogcast-captions-test/cookies.txt"),
    cookieFile: vi.fn().mockResolvedValue(null),
    cookieHeader: vi.fn().mockResolvedValue(cookieHeader),
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function requestUrl(input: unknown): string {
  return input instanceof URL ? input.toString() : String(input);
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("caption parsers", () => {
  it("ranks english tracks first and human captions above asr", () => {
    const ranked = __testables.rankCaptionTracks([
      { baseUrl: "https://example.test/1", languageCode: "de" },
      { baseUrl: "https://example.test/2", languageCode: "en", kind: "asr" },
      { baseUrl: "https://example.test/3", languageCode: "en-GB" },
      { baseUrl: "https://example.test/4", languageCode: "en" },
      { languageCode: "en" },
    ]);

    expect(ranked.map((track) => `${track.languageCode ?? ""}:${track.kind ?? ""}`)).toEqual([
      "en:",
      "en:asr",
      "en-GB:",
      "de:",
    ]);
  });

  it("parses json3 events into timed segments", () => {
    const body = JSON.stringify({
      events: [
        { tStartMs: 0, dDurationMs: 1500, segs: [{ utf8: "Hello" }, { utf8: " everyone" }] },
        { tStartMs: 1500, dDurationMs: 900, segs: [{ utf8: "[Music]" }] },
        { tStartMs: 2400, dDurationMs: 1000, segs: [{ utf8: "welcome back." }] },
      ],
    });

    const segments = __testables.parseCaptionBody(body, "application/json; charset=utf-8");
    expect(segments).toEqual([
      { text: "Hello everyone", startMs: 0, durationMs: 1500 },
      { text: "welcome back.", startMs: 2400, durationMs: 1000 },
    ]);
    expect(__testables.joinSegments(segments)).toBe("Hello everyone welcome back.");
  });

  it("parses xml captions and decodes entities", () => {
    const body = [
      "<transcript>",
      '<text start="0.1" dur="1.2">Bread &amp; butter</text>',
      '<text start="1.3" dur="1.25">isn&#39;t &quot;hard&quot;.</text>',
      "</transcript>",
    ].join("");

    expect(__testables.parseCaptionBody(body, "text/xml")).toEqual([
      { text: "Bread & butter", startMs: 100, durationMs: 1200 },
      { text: "isn't \"hard\".", startMs: 1300, durationMs: 1250 },
    ]);
  });

  it("parses vtt cues, dropping headers, tags and repeated lines", () => {
    const body = [
      "WEBVTT",
      "Kind: captions",
      "Language: en",
      "",
      "00:00:00.000 --> 00:00:01.500 align:start position:0%",
      "<c>First</c> line",
      "",
      "00:01.500 --> 00:03.000",
      "First line",
      "",
      "00:00:03.000 --> 00:00:04.000",
      "Second line",
    ].join("\n");

    expect(__testables.parseCaptionBody(body, "text/vtt")).toEqual([
      { text: "First line", startMs: 0, durationMs: 1500 },
      { text: "Second line", startMs: 3000, durationMs: 1000 },
    ]);
  });

  it("extracts the player response embedded in watch html", () => {
    const html =
      '<html><script>var ytInitialPlayerResponse = {"videoDetails":{"title":"A {braced} title"}};</script></html>';

    expect(__testables.extractPlayerResponse(html)).toEqual({
      videoDetails: { title: "A {braced} title" },
    });
  });
});

describe("fetchDirectCaptions", () => {
  it("returns captions and video info from the innertube player response", async () => {
    const baseUrl = `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=en&signature=test`;
    const fetchMock = vi.fn(async (input: unknown, _init?: RequestInit) => {
      const url = requestUrl(input);
      if (url.startsWith("https://www.youtube.com/youtubei/v1/player")) {
        return jsonResponse({
          videoDetails: {
            title: "Proofing dough",
            author: "Bread Lab",
            lengthSeconds: "754",
            shortDescription: "How long to proof.",
          },
          captions: {
            playerCaptionsTracklistRenderer: {
              captionTracks: [{ baseUrl, languageCode: "en" }],
            },
          },
        });
      }
      if (url === baseUrl) {
        return jsonResponse({ events: [{ tStartMs: 0, dDurationMs: 1000, segs: [{ utf8: "Proof it overnight." }] }] });
      }
      return new Response("", { status: 404 });
    });
    vi.stubGlobal("fetch", fetchMock);
    const session = fakeSession("SID=test-cookie");

    const result = await fetchDirectCaptions(VIDEO_ID, VIDEO_URL, session);

    expect(result.transcript).toEqual({
      kind: "captions",
      languageCode: "en",
      segments: [{ text: "Proof it overnight.", startMs: 0, durationMs: 1000 }],
      text: "Proof it overnight.",
    });
    expect(result.videoInfo).toEqual({
      title: "Proofing dough",
      channel: "Bread Lab",
      durationSeconds: 754,
      duration: "12:34",
      description: "How long to proof.",
    });
    expect(session.cookieHeader).toHaveBeenCalledWith("www.youtube.com");
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("cookie")).toContain("SID=test-cookie");
  });

  it("raises BotDetectedError when the watch page is a bot wall", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: unknown) => {
        const url = requestUrl(input);
        if (url.startsWith("https://www.youtube.com/youtubei/v1/player")) {
          return new Response("forbidden", { status: 403 });
        }
        return new Response(
          "<!doctype html><html><body>Sign in to confirm you’re not a bot</body></html>",
          { status: 200, headers: { "content-type": "text/html" } },
        );
      }),
    );

    const error = await fetchDirectCaptions(VIDEO_ID, VIDEO_URL, fakeSession()).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(BotDetectedError);
    expect(error).toMatchObject({ code: "YOUTUBE_BOT_DETECTED", youtubeUrl: VIDEO_URL });
  });

  it("reports unavailable captions when no track yields text", async () => {
    const fetchMock = vi.fn(async (input: unknown) => {
      const url = requestUrl(input);
      if (url.startsWith("https://www.youtube.com/youtubei/v1/player")) {
        return jsonResponse({ videoDetails: { title: "Silent film" } });
      }
      return new Response("", { status: 404 });
    });
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchDirectCaptions(VIDEO_ID, VIDEO_URL, fakeSession())).rejects.toMatchObject({
      code: "YOUTUBE_TRANSCRIPT_UNAVAILABLE",
      statusCode: 422,
    });
    // Player request plus json3/vtt/plain for each of en, en-US, en-GB.
    expect(fetchMock).toHaveBeenCalledTimes(10);
  });

  it("stops waiting on YouTube once the caller has aborted", async () => {
    const fetchMock = vi.fn(async (_input: unknown, init?: RequestInit) => {
      if (init?.signal?.aborted) {
        throw new DOMException("This operation was aborted", "AbortError");
      }
      return new Promise<Response>(() => undefined);
    });
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(
      fetchDirectCaptions(VIDEO_ID, VIDEO_URL, fakeSession(), controller.signal),
    ).rejects.toMatchObject({ code: "YOUTUBE_METADATA_FETCH_FAILED" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
