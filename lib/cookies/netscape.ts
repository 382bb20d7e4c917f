/**
 * Netscape cookie-jar format, the layout yt-dlp reads through `--cookies`.
 *
 * One cookie per line, seven tab-separated fields:
 * domain, include-subdomains flag, path, secure flag, expiry (unix seconds, 0 for session),
 * name, value. Lines prefixed with `#HttpOnly_` are cookies, every other `#` line is a comment.
 */

export interface CookieRecord {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds; 0 marks a session cookie. */
  expires: number;
  name: string;
  value: string;
  httpOnly?: boolean;
}

export type CookieSet = CookieRecord[];

/** Shape shared by browser-automation cookie objects (puppeteer, CDP). */
export interface BrowserCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  secure?: boolean;
  expires?: number;
  httpOnly?: boolean;
}

export const NETSCAPE_HEADER = "# Netscape HTTP Cookie File";
const HTTP_ONLY_PREFIX = "#HttpOnly_";
const DEFAULT_COOKIE_DOMAIN = ".youtube.com";

function formatFlag(value: boolean): string {
  return value ? "TRUE" : "FALSE";
}

function normalizeExpiry(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.trunc(value);
}

export function parseNetscapeCookies(text: string): CookieSet {
  const records: CookieSet = [];

  for (const rawLine of text.split("\n")) {
    let line = rawLine.replace(/\r$/, "");
    let httpOnly = false;

    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      httpOnly = true;
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if (line.trim() === "" || line.trimStart().startsWith("#")) {
      continue;
    }

    const fields = line.split("\t");
    if (fields.length < 7) {
      continue;
    }

    const [domain, subdomainFlag, path, secureFlag, expiry, name, ...valueParts] = fields;
    if (!domain.trim() || !name) {
      continue;
    }

    records.push({
      domain: domain.trim(),
      includeSubdomains: subdomainFlag.trim().toUpperCase() === "TRUE",
      path: path || "/",
      secure: secureFlag.trim().toUpperCase() === "TRUE",
      expires: normalizeExpiry(Number(expiry.trim())),
      name,
      value: valueParts.join("\t"),
      ...(httpOnly ? { httpOnly } : {}),
    });
  }

  return records;
}

export function serializeNetscapeCookies(cookies: CookieSet): string {
  const lines = cookies.map((cookie) =>
    [
      `${cookie.httpOnly ? HTTP_ONLY_PREFIX : ""}${cookie.domain}`,
      formatFlag(cookie.includeSubdomains),
      cookie.path || "/",
      formatFlag(cookie.secure),
      String(normalizeExpiry(cookie.expires)),
      cookie.name,
      cookie.value,
    ].join("\t"),
  );

  const header = [
    NETSCAPE_HEADER,
    "# Written by blogcast. Edits are overwritten on the next CAPTCHA solve.",
    "",
  ];
  return `${[...header, ...lines].join("\n")}\n`;
}

export function fromBrowserCookies(
  cookies: BrowserCookie[],
  fallbackDomain = DEFAULT_COOKIE_DOMAIN,
): CookieSet {
  return cookies
    .filter((cookie) => cookie.name.length > 0)
    .map((cookie) => {
      const domain = cookie.domain?.trim() || fallbackDomain;
      return {
        domain,
        includeSubdomains: domain.startsWith("."),
        path: cookie.path || "/",
        secure: cookie.secure ?? false,
        expires: normalizeExpiry(cookie.expires),
        name: cookie.name,
        value: cookie.value,
        ...(cookie.httpOnly ? { httpOnly: true } : {}),
      };
    });
}

function domainMatches(cookieDomain: string, hostname: string): boolean {
  const bare = cookieDomain.replace(/^\./, "").toLowerCase();
  const host = hostname.toLowerCase();
  return host === bare || host.endsWith(`.${bare}`);
}

/** Builds a `cookie` request header for `hostname`, skipping expired entries. */
export function toCookieHeader(
  cookies: CookieSet,
  hostname: string,
  nowSeconds = Math.floor(Date.now() / 1000),
): string | null {
  const pairs = cookies
    .filter((cookie) => domainMatches(cookie.domain, hostname))
    .filter((cookie) => cookie.expires === 0 || cookie.expires > nowSeconds)
    .map((cookie) => `${cookie.name}=${cookie.value}`);

  return pairs.length > 0 ? pairs.join("; ") : null;
}
