import type { CookieConfig } from "@/lib/cookies/config";
import { CookieStore } from "@/lib/cookies/cookie-store";
import { parseNetscapeCookies, type CookieSet } from "@/lib/cookies/netscape";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { createSupabaseBlobReader, type RemoteBlobReader } from "@/lib/supabase/storage";

export type CookieSourceKind = "remote-blob" | "inline-base64" | "local-file" | "none";

export interface ProvisionResult {
  source: CookieSourceKind;
  path: string;
  cookieCount: number;
}

interface ProvisionDependencies {
  store?: CookieStore;
  /** Defaults to the Supabase Storage reader; pass null to disable the remote source. */
  remote?: RemoteBlobReader | null;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

function decodeBase64CookieFile(raw: string): string {
  const compact = raw.replace(/\s+/g, "");
  if (!compact || !BASE64_PATTERN.test(compact)) {
    throw new AppError("YTDLP_COOKIES_B64 is not valid base64.", "COOKIE_SOURCE_INVALID", 500);
  }
  return Buffer.from(compact, "base64").toString("utf8");
}

function requireCookies(text: string, source: CookieSourceKind): CookieSet {
  const cookies = parseNetscapeCookies(text);
  if (cookies.length === 0) {
    throw new AppError(
      `Cookie source ${source} does not contain any Netscape cookie lines.`,
      "COOKIE_SOURCE_INVALID",
      500,
    );
  }
  return cookies;
}

function logSkippedSource(source: CookieSourceKind, error: unknown) {
  console.error("[cookie-provision] source skipped", {
    source,
    errorCode: error instanceof AppError ? error.code : "UNKNOWN",
    message: errorMessageOf(error),
  });
}

/**
 * Materializes the cookie file at startup. Sources are tried in a fixed order:
 * remote blob, inline base64, then a file already on disk. The first one that yields
 * cookies wins; a configured source that fails is logged and the next one is tried.
 */
export async function provisionCookies(
  config: CookieConfig,
  dependencies: ProvisionDependencies = {},
): Promise<ProvisionResult> {
  const store = dependencies.store ?? new CookieStore(config.cookiePath);

  if (config.remoteBucket && config.remoteKey) {
    const remote =
      dependencies.remote === undefined ? createSupabaseBlobReader() : dependencies.remote;

    if (!remote) {
      console.info("[cookie-provision] remote blob configured without storage credentials", {
        bucket: config.remoteBucket,
      });
    } else {
      try {
        const cookies = requireCookies(
          await remote.download(config.remoteBucket, config.remoteKey),
          "remote-blob",
        );
        await store.save(cookies);
        return finish({ source: "remote-blob", path: store.path, cookieCount: cookies.length });
      } catch (error) {
        logSkippedSource("remote-blob", error);
      }
    }
  }

  if (config.inlineBase64) {
    try {
      const cookies = requireCookies(decodeBase64CookieFile(config.inlineBase64), "inline-base64");
      await store.save(cookies);
      return finish({ source: "inline-base64", path: store.path, cookieCount: cookies.length });
    } catch (error) {
      logSkippedSource("inline-base64", error);
    }
  }

  const existing = await store.load();
  if (existing) {
    return finish({ source: "local-file", path: store.path, cookieCount: existing.length });
  }

  return finish({ source: "none", path: store.path, cookieCount: 0 });
}

function finish(result: ProvisionResult): ProvisionResult {
  console.info("[cookie-provision] completed", result);
  return result;
}
