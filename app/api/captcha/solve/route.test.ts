import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/lib/auth/api-user", () => ({
  resolveApiUser: vi.fn(),
}));

vi.mock("@/lib/pipeline/blog-pipeline", () => ({
  recoverAndRetry: vi.fn(),
}));

vi.mock("@/db/repositories/blog-repository", () => ({
  createBlogPost: vi.fn(),
}));

vi.mock("@/lib/captcha/browser", () => ({
  createPuppeteerLauncher: vi.fn(() => ({ marker: "launcher" })),
}));

vi.mock("@/lib/cookies/cookie-store", () => ({
  getCookieSession: vi.fn(() => ({ marker: "session" })),
}));

import { createBlogPost } from "@/db/repositories/blog-repository";
import { resolveApiUser } from "@/lib/auth/api-user";
import { createPuppeteerLauncher } from "@/lib/captcha/browser";
import { AppError } from "@/lib/errors/app-error";
import { recoverAndRetry, type RecoveredBlog } from "@/lib/pipeline/blog-pipeline";
import { BotDetectedError } from "@/lib/youtube/bot-detection";
import type { BlogPostRecord } from "@/types/blog";

import { POST } from "./route";

const mockedResolveApiUser = vi.mocked(resolveApiUser);
const mockedRecoverAndRetry = vi.mocked(recoverAndRetry);
const mockedCreateBlogPost = vi.mocked(createBlogPost);
const mockedCreateLauncher = vi.mocked(createPuppeteerLauncher);

const VIDEO_URL = "https://www.youtube.com/watch?v=abcdefghijk";
const ORIGINAL_BROWSER_PATH = process.env.CAPTCHA_BROWSER_PATH;

function postJson(body: unknown): Request {
  return new Request("http://localhost/api/captcha/solve", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("/api/captcha/solve route", () => {
  beforeEach(() => {
    mockedRecoverAndRetry.mockReset();
    mockedCreateBlogPost.mockReset();
    mockedResolveApiUser.mockResolvedValue({ userId: "user-1", email: "user@example.com", errorResponse: null });
    process.env.CAPTCHA_BROWSER_PATH = "/usr/bin/chromium";
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (ORIGINAL_BROWSER_PATH === undefined) {
      delete process.env.CAPTCHA_BROWSER_PATH;
    } else {
      process.env.CAPTCHA_BROWSER_PATH = ORIGINAL_BROWSER_PATH;
    }
  });

  it("rejects a URL that is not a YouTube video", async () => {
    const response = await POST(postJson({ youtubeUrl: "https://example.com/watch" }));

    expect(response.status).toBe(422);
    expect(mockedRecoverAndRetry).not.toHaveBeenCalled();
  });

  it("recovers, retries once and stores the blog", async () => {
    const recovered: RecoveredBlog = {
      blog: { title: "Title", description: "Desc", content: "Body", model: null },
      youtubeUrl: VIDEO_URL,
      videoInfo: { title: "Video", channel: "Channel", durationSeconds: 0, duration: "0:00", description: "" },
      transcriptSource: "transcription",
      recovery: {
        status: "saved",
        session: { youtubeUrl: VIDEO_URL, startedAt: 0, deadline: 300_000, state: "saved", history: [] },
        cookieCount: 4,
      },
    };
    const record: BlogPostRecord = {
      id: "blog-9",
      userId: "user-1",
      title: "Title",
      description: "Desc",
      content: "Body",
      category: "Technology",
      youtubeUrl: VIDEO_URL,
      youtubeTitle: "Video",
      youtubeChannel: "Channel",
      youtubeDuration: "0:00",
      transcriptSource: "transcription",
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    };
    mockedRecoverAndRetry.mockResolvedValue(recovered);
    mockedCreateBlogPost.mockResolvedValue(record);

    const response = await POST(postJson({ youtubeUrl: "https://youtu.be/abcdefghijk" }));

    expect(response.status).toBe(201);
    await expect(response.json()).resolves.toEqual({ blog: record, cookiesSaved: true });
    expect(mockedCreateLauncher).toHaveBeenCalledWith("/usr/bin/chromium");
    expect(mockedRecoverAndRetry).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "bot_detected", youtubeUrl: VIDEO_URL }),
      { marker: "session" },
      expect.objectContaining({
        launcher: { marker: "launcher" },
        timeoutMs: 300_000,
        navigationTimeoutMs: 60_000,
      }),
    );
  });

  it("maps a timed-out recovery to 408", async () => {
    mockedRecoverAndRetry.mockRejectedValue(
      new AppError("The verification was not completed within 300 seconds.", "CAPTCHA_TIMED_OUT", 408),
    );

    const response = await POST(postJson({ youtubeUrl: VIDEO_URL }));

    expect(response.status).toBe(408);
    await expect(response.json()).resolves.toMatchObject({ code: "CAPTCHA_TIMED_OUT" });
    expect(mockedCreateBlogPost).not.toHaveBeenCalled();
  });

  it("reports an exhausted retry without offering another CAPTCHA", async () => {
    mockedRecoverAndRetry.mockRejectedValue(
      new BotDetectedError("YouTube still requires verification.", VIDEO_URL, "Sign in to confirm", true),
    );

    const response = await POST(postJson({ youtubeUrl: VIDEO_URL }));

    expect(response.status).toBe(403);
    await expect(response.json()).resolves.toMatchObject({
      botDetection: true,
      retryExhausted: true,
      captchaSolverAvailable: false,
    });
  });
});
