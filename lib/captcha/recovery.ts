import type { BrowserLauncher, RecoveryBrowser } from "@/lib/captcha/browser";
import type { CookieStore } from "@/lib/cookies/cookie-store";
import { fromBrowserCookies } from "@/lib/cookies/netscape";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import type { ExtractionCondition } from "@/lib/youtube/bot-detection";

export type RecoveryState =
  | "idle"
  | "browser_launching"
  | "awaiting_human_solve"
  | "cookies_captured"
  | "saved"
  | "timed_out"
  | "browser_unavailable"
  | "failed";

export interface RecoveryTransition {
  state: RecoveryState;
  at: number;
  detail?: string;
}

export interface RecoverySession {
  youtubeUrl: string;
  startedAt: number;
  deadline: number;
  state: RecoveryState;
  history: RecoveryTransition[];
}

export interface RecoverySaved {
  status: "saved";
  session: RecoverySession;
  cookieCount: number;
}

export interface RecoveryFailure {
  status: "timed_out" | "browser_unavailable" | "failed";
  session: RecoverySession;
  message: string;
}

export type RecoveryOutcome = RecoverySaved | RecoveryFailure;

export interface RunCaptchaRecoveryInput {
  condition: ExtractionCondition;
  store: CookieStore;
  launcher: BrowserLauncher;
  timeoutMs: number;
  navigationTimeoutMs?: number;
  signal?: AbortSignal;
  now?: () => number;
}

const DEFAULT_NAVIGATION_TIMEOUT_MS = 60_000;

function transition(session: RecoverySession, state: RecoveryState, at: number, detail?: string) {
  session.state = state;
  session.history.push(detail ? { state, at, detail } : { state, at });
  console.info("[captcha-recovery] state changed", {
    youtubeUrl: session.youtubeUrl,
    state,
    ...(detail ? { detail } : {}),
  });
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error("Recovery wait was aborted."));
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

async function closeQuietly(browser: RecoveryBrowser, youtubeUrl: string) {
  try {
    await browser.close();
  } catch (error) {
    console.warn("[captcha-recovery] browser close failed", {
      youtubeUrl,
      message: errorMessageOf(error),
    });
  }
}

/**
 * Opens a visible browser on the blocked video so a person can clear the challenge, then
 * stores the browser's YouTube cookies. The store is only written on the `saved` path.
 */
export async function runCaptchaRecovery(input: RunCaptchaRecoveryInput): Promise<RecoveryOutcome> {
  const { condition } = input;
  if (condition.kind !== "bot_detected") {
    throw new AppError(
      "CAPTCHA recovery only applies to a bot-detection failure.",
      "CAPTCHA_NOT_APPLICABLE",
      400,
    );
  }

  const now = input.now ?? Date.now;
  const startedAt = now();
  const session: RecoverySession = {
    youtubeUrl: condition.youtubeUrl,
    startedAt,
    deadline: startedAt + input.timeoutMs,
    state: "idle",
    history: [{ state: "idle", at: startedAt }],
  };

  transition(session, "browser_launching", now());
  let browser: RecoveryBrowser;
  try {
    browser = await input.launcher.launch();
  } catch (error) {
    const message =
      error instanceof AppError
        ? error.message
        : `The recovery browser could not be started: ${errorMessageOf(error)}. Check CAPTCHA_BROWSER_PATH.`;
    transition(session, "browser_unavailable", now(), message);
    return { status: "browser_unavailable", session, message };
  }

  const deadlineController = new AbortController();
  const onCallerAbort = () => deadlineController.abort();
  input.signal?.addEventListener("abort", onCallerAbort, { once: true });
  if (input.signal?.aborted) {
    deadlineController.abort();
  }
  const deadlineTimer = setTimeout(() => deadlineController.abort(), Math.max(0, session.deadline - now()));

  try {
    const page = await browser.newPage();
    transition(session, "awaiting_human_solve", now());

    try {
      await untilAborted(
        page.open(condition.youtubeUrl, input.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS),
        deadlineController.signal,
      );
    } catch (error) {
      if (!deadlineController.signal.aborted) {
        // A challenge page can keep the network busy; the selector wait decides.
        console.warn("[captcha-recovery] initial navigation did not settle", {
          youtubeUrl: condition.youtubeUrl,
          message: errorMessageOf(error),
        });
      }
    }

    try {
      const remainingMs = Math.max(1, session.deadline - now());
      await untilAborted(
        page.waitForVideoPage(remainingMs, deadlineController.signal),
        deadlineController.signal,
      );
    } catch (error) {
      if (deadlineController.signal.aborted || isTimeoutError(error)) {
        const message = input.signal?.aborted
          ? "The verification was cancelled before it completed."
          : `The verification was not completed within ${Math.round(input.timeoutMs / 1000)} seconds. Please try again.`;
        transition(session, "timed_out", now(), message);
        return { status: "timed_out", session, message };
      }
      throw error;
    }

    const cookies = fromBrowserCookies(await page.cookies());
    if (cookies.length === 0) {
      const message = "The browser returned no YouTube cookies after verification.";
      transition(session, "failed", now(), message);
      return { status: "failed", session, message };
    }
    transition(session, "cookies_captured", now(), `${cookies.length} cookies`);

    await input.store.save(cookies);
    transition(session, "saved", now());
    return { status: "saved", session, cookieCount: cookies.length };
  } catch (error) {
    const message = `CAPTCHA recovery failed: ${errorMessageOf(error)}`;
    transition(session, "failed", now(), message);
    return { status: "failed", session, message };
  } finally {
    clearTimeout(deadlineTimer);
    input.signal?.removeEventListener("abort", onCallerAbort);
    await closeQuietly(browser, condition.youtubeUrl);
  }
}

export function recoveryOutcomeToError(outcome: RecoveryFailure): AppError {
  switch (outcome.status) {
    case "timed_out":
      return new AppError(outcome.message, "CAPTCHA_TIMED_OUT", 408);
    case "browser_unavailable":
      return new AppError(outcome.message, "CAPTCHA_BROWSER_UNAVAILABLE", 503);
    case "failed":
      return new AppError(outcome.message, "CAPTCHA_FAILED", 500);
  }
}
