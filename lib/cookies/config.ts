import { isAbsolute, join } from "node:path";

import { readEnv } from "@/lib/config/env";

export interface CookieConfig {
  /** The deployment's one authoritative cookie file. */
  cookiePath: string;
  remoteBucket: string | null;
  remoteKey: string | null;
  inlineBase64: string | null;
}

const DEFAULT_COOKIE_PATH = join("cookies", "youtube_cookies.txt");

export function resolveCookiePath(rawPath: string | null, cwd = process.cwd()): string {
  const path = rawPath ?? DEFAULT_COOKIE_PATH;
  return isAbsolute(path) ? path : join(cwd, path);
}

export function getCookieConfig(): CookieConfig {
  return {
    cookiePath: resolveCookiePath(readEnv("YTDLP_COOKIES_PATH")),
    remoteBucket: readEnv("YTDLP_COOKIES_BUCKET"),
    remoteKey: readEnv("YTDLP_COOKIES_KEY"),
    inlineBase64: readEnv("YTDLP_COOKIES_B64"),
  };
}
