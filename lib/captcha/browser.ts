import puppeteer from "puppeteer-core";

import type { BrowserCookie } from "@/lib/cookies/netscape";
import { AppError } from "@/lib/errors/app-error";
import { BROWSER_ACCEPT_LANGUAGE, BROWSER_USER_AGENT } from "@/lib/youtube/browser-identity";

export interface RecoveryPage {
  open(url: string, timeoutMs: number): Promise<void>;
  /** Resolves once the watch page has rendered; rejects on timeout or abort. */
  waitForVideoPage(timeoutMs: number, signal: AbortSignal): Promise<void>;
  cookies(): Promise<BrowserCookie[]>;
}

export interface RecoveryBrowser {
  newPage(): Promise<RecoveryPage>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<RecoveryBrowser>;
}

export const VIDEO_PAGE_SELECTOR = "#movie_player, ytd-watch-flexy, div#player";
const YOUTUBE_ORIGIN = "https://www.youtube.com";

export function createPuppeteerLauncher(executablePath: string | null): BrowserLauncher {
  return {
    async launch() {
      if (!executablePath) {
        throw new AppError(
          "No browser is configured for CAPTCHA recovery. Set CAPTCHA_BROWSER_PATH to a Chrome or Chromium executable.",
          "CAPTCHA_BROWSER_UNAVAILABLE",
          503,
        );
      }

      const browser = await puppeteer.launch({
        executablePath,
        headless: false,
        defaultViewport: { width: 1280, height: 720 },
        args: ["--disable-blink-features=AutomationControlled", "--window-size=1280,720"],
      });

      return {
        async newPage() {
          const page = await browser.newPage();
          await page.setUserAgent(BROWSER_USER_AGENT);
          await page.setExtraHTTPHeaders({ "accept-language": BROWSER_ACCEPT_LANGUAGE });

          return {
            async open(url, timeoutMs) {
              await page.goto(url, { waitUntil: "networkidle2", timeout: timeoutMs });
            },
            async waitForVideoPage(timeoutMs, signal) {
              await page.waitForSelector(VIDEO_PAGE_SELECTOR, { timeout: timeoutMs, signal });
            },
            async cookies() {
              return page.cookies(YOUTUBE_ORIGIN);
            },
          };
        },
        async close() {
          await browser.close();
        },
      };
    },
  };
}
