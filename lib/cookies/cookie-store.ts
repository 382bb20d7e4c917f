import { chmod, mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { getCookieConfig } from "@/lib/cookies/config";
import {
  parseNetscapeCookies,
  serializeNetscapeCookies,
  toCookieHeader,
  type CookieSet,
} from "@/lib/cookies/netscape";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";

const COOKIE_FILE_MODE = 0o600;

function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Owns a single cookie file. Saves replace the file atomically (temp file + rename),
 * so readers only ever see a complete jar; concurrent writers resolve as last-writer-wins.
 */
export class CookieStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async exists(): Promise<boolean> {
    try {
      const info = await stat(this.path);
      return info.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw new AppError(
        `Cookie file could not be inspected: ${errorMessageOf(error)}`,
        "COOKIE_STORE_IO_FAILED",
        500,
      );
    }
  }

  async load(): Promise<CookieSet | null> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new AppError(
        `Cookie file could not be read: ${errorMessageOf(error)}`,
        "COOKIE_STORE_IO_FAILED",
        500,
      );
    }

    const cookies = parseNetscapeCookies(text);
    return cookies.length > 0 ? cookies : null;
  }

  async save(cookies: CookieSet): Promise<void> {
    if (cookies.length === 0) {
      throw new AppError("Refusing to replace the cookie file with an empty set.", "COOKIE_SET_EMPTY", 422);
    }

    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, serializeNetscapeCookies(cookies), { mode: COOKIE_FILE_MODE });
      await chmod(tempPath, COOKIE_FILE_MODE);
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new AppError(
        `Cookie file could not be written: ${errorMessageOf(error)}`,
        "COOKIE_STORE_IO_FAILED",
        500,
      );
    }

    console.info("[cookie-store] cookies saved", {
      path: this.path,
      cookieCount: cookies.length,
    });
  }
}

/**
 * Explicit handle on the cookies every extraction call should use. Recovery writes through
 * `store`, so the next call made with the same session picks the new cookies up.
 */
export interface CookieSession {
  store: CookieStore;
  /** Path to hand to yt-dlp, or null while the store holds no cookies. */
  cookieFile(): Promise<string | null>;
  cookieHeader(hostname: string): Promise<string | null>;
}

export function createCookieSession(store: CookieStore): CookieSession {
  return {
    store,
    async cookieFile() {
      const cookies = await store.load();
      return cookies ? store.path : null;
    },
    async cookieHeader(hostname) {
      const cookies = await store.load();
      return cookies ? toCookieHeader(cookies, hostname) : null;
    },
  };
}

declare global {
  var __blogcastCookieSession__: CookieSession | undefined;
}

export function getCookieSession(): CookieSession {
  const { cookiePath } = getCookieConfig();
  const current = globalThis.__blogcastCookieSession__;
  if (current && current.store.path === cookiePath) {
    return current;
  }

  const session = createCookieSession(new CookieStore(cookiePath));
  globalThis.__blogcastCookieSession__ = session;
  return session;
}
