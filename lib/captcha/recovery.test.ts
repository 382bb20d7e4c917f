import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CookieStore } from "@/lib/cookies/cookie-store";
import type { BrowserCookie } from "@/lib/cookies/netscape";
import type { ExtractionCondition } from "@/lib/youtube/bot-detection";

import type { BrowserLauncher, RecoveryPage } from "./browser";
import { recoveryOutcomeToError, runCaptchaRecovery } from "./recovery";

const VIDEO_URL = "https://www.youtube.com/watch?v=abcdefghijk";
const CONDITION: ExtractionCondition = {
  kind: "bot_detected",
  youtubeUrl: VIDEO_URL,
  rawError: "Sign in to confirm you're not a bot",
};
const ORIGINAL_JAR = "# Netscape HTTP Cookie File\n.youtube.com\tTRUE\t/\tTRUE\t0\tOLD\tkeep\n";

let workDir: string;
let store: CookieStore;

function fakeLauncher(page: Partial<RecoveryPage>) {
  const close = vi.fn().mockResolvedValue(undefined);
  const fullPage: RecoveryPage = {
    open: vi.fn().mockResolvedValue(undefined),
    waitForVideoPage: vi.fn().mockResolvedValue(undefined),
    cookies: vi.fn<() => Promise<BrowserCookie[]>>().mockResolvedValue([]),
    ...page,
  };
  const launcher: BrowserLauncher = {
    launch: vi.fn().mockResolvedValue({ newPage: async () => fullPage, close }),
  };
  return { launcher, close, page: fullPage };
}

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "blogcast-recovery-test-"));
  store = new CookieStore(join(workDir, "youtube_cookies.txt"));
  await writeFile(store.path, ORIGINAL_JAR);
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(workDir, { recursive: true, force: true });
});

describe("runCaptchaRecovery", () => {
  it("saves captured cookies and records every transition", async () => {
    const { launcher, close, page } = fakeLauncher({
      cookies: async () => [
        { name: "SID", value: "test-sid", domain: ".youtube.com", path: "/", secure: true, expires: 1900000000 },
      ],
    });
    let tick = 1_000;

    const outcome = await runCaptchaRecovery({
      condition: CONDITION,
      store,
      launcher,
      timeoutMs: 5_000,
      now: () => tick++,
    });

    expect(outcome.status).toBe("saved");
    expect(outcome.session.startedAt).toBe(1_000);
    expect(outcome.session.deadline).toBe(6_000);
    expect(outcome.session.history.map((entry) => entry.state)).toEqual([
      "idle",
      "browser_launching",
      "awaiting_human_solve",
      "cookies_captured",
      "saved",
    ]);
    expect(page.open).toHaveBeenCalledWith(VIDEO_URL, 60_000);
    expect(await readFile(store.path, "utf8")).toContain(".youtube.com\tTRUE\t/\tTRUE\t1900000000\tSID\ttest-sid");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("times out without touching the cookie file", async () => {
    const { launcher, close } = fakeLauncher({
      waitForVideoPage: () => new Promise<void>(() => undefined),
    });

    const outcome = await runCaptchaRecovery({ condition: CONDITION, store, launcher, timeoutMs: 30 });

    expect(outcome.status).toBe("timed_out");
    expect(outcome.session.state).toBe("timed_out");
    expect(await readFile(store.path, "utf8")).toBe(ORIGINAL_JAR);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("counts the deadline from the start, including the browser launch", async () => {
    let clock = 1_000;
    const { launcher, close, page } = fakeLauncher({
      waitForVideoPage: () => new Promise<void>(() => undefined),
    });
    vi.mocked(launcher.launch).mockImplementationOnce(async () => {
      clock += 4_980;
      return { newPage: async () => page, close };
    });

    const outcome = await runCaptchaRecovery({
      condition: CONDITION,
      store,
      launcher,
      timeoutMs: 5_000,
      now: () => clock,
    });

    expect(outcome.status).toBe("timed_out");
    expect(outcome.session.deadline).toBe(6_000);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("fails without a partial write when saving the cookies fails", async () => {
    const { launcher, close } = fakeLauncher({
      cookies: async () => [
        { name: "SID", value: "test-sid", domain: ".youtube.com", path: "/", secure: true, expires: 1900000000 },
      ],
    });
    vi.spyOn(store, "save").mockRejectedValueOnce(new Error("disk full"));

    const outcome = await runCaptchaRecovery({ condition: CONDITION, store, launcher, timeoutMs: 5_000 });

    expect(outcome).toMatchObject({ status: "failed", message: "CAPTCHA recovery failed: disk full" });
    expect(outcome.session.history.map((entry) => entry.state)).toEqual([
      "idle",
      "browser_launching",
      "awaiting_human_solve",
      "cookies_captured",
      "failed",
    ]);
    expect(await readFile(store.path, "utf8")).toBe(ORIGINAL_JAR);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("treats a caller abort as a timeout", async () => {
    const controller = new AbortController();
    const { launcher } = fakeLauncher({
      waitForVideoPage: () => new Promise<void>(() => undefined),
    });

    const pending = runCaptchaRecovery({
      condition: CONDITION,
      store,
      launcher,
      timeoutMs: 60_000,
      signal: controller.signal,
    });
    controller.abort();
    const outcome = await pending;

    expect(outcome).toMatchObject({
      status: "timed_out",
      message: "The verification was cancelled before it completed.",
    });
    expect(await readFile(store.path, "utf8")).toBe(ORIGINAL_JAR);
  });

  it("fails when the browser has no cookies", async () => {
    const { launcher, close } = fakeLauncher({});

    const outcome = await runCaptchaRecovery({ condition: CONDITION, store, launcher, timeoutMs: 1_000 });

    expect(outcome).toMatchObject({
      status: "failed",
      message: "The browser returned no YouTube cookies after verification.",
    });
    expect(await readFile(store.path, "utf8")).toBe(ORIGINAL_JAR);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("reports an unavailable browser", async () => {
    const launcher: BrowserLauncher = {
      launch: vi.fn().mockRejectedValue(new Error("Failed to launch the browser process")),
    };

    const outcome = await runCaptchaRecovery({ condition: CONDITION, store, launcher, timeoutMs: 1_000 });

    if (outcome.status === "saved") {
      throw new Error("expected a failed recovery");
    }
    expect(outcome.status).toBe("browser_unavailable");
    expect(outcome.session.history.map((entry) => entry.state)).toEqual([
      "idle",
      "browser_launching",
      "browser_unavailable",
    ]);
    expect(recoveryOutcomeToError(outcome)).toMatchObject({
      code: "CAPTCHA_BROWSER_UNAVAILABLE",
      statusCode: 503,
    });
  });

  it("only starts from a bot-detection condition", async () => {
    const { launcher } = fakeLauncher({});

    await expect(
      runCaptchaRecovery({
        condition: { kind: "failure", youtubeUrl: VIDEO_URL, rawError: "HTTP 500" },
        store,
        launcher,
        timeoutMs: 1_000,
      }),
    ).rejects.toMatchObject({ code: "CAPTCHA_NOT_APPLICABLE" });
    expect(launcher.launch).not.toHaveBeenCalled();
  });
});

describe("recoveryOutcomeToError", () => {
  it("maps a timeout to 408", () => {
    const session = {
      youtubeUrl: VIDEO_URL,
      startedAt: 0,
      deadline: 1,
      state: "timed_out" as const,
      history: [],
    };

    expect(recoveryOutcomeToError({ status: "timed_out", session, message: "late" })).toMatchObject({
      code: "CAPTCHA_TIMED_OUT",
      statusCode: 408,
      message: "late",
    });
  });
});
