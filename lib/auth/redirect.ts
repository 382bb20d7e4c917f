const DEFAULT_REDIRECT_PATH = "/";

/**
 * Resolves the post-login `next` parameter against the callback URL. Anything that would leave
 * the callback's origin (absolute URLs, `//host`, `/\host`, other schemes) yields the fallback.
 */
export function resolveRedirectTarget(
  rawNext: string | null | undefined,
  callbackUrl: string | URL,
  fallbackPath = DEFAULT_REDIRECT_PATH,
): URL {
  const base = new URL(callbackUrl);
  const fallback = new URL(fallbackPath, base.origin);

  if (!rawNext || !rawNext.startsWith("/") || /^\/[/\\]/.test(rawNext)) {
    return fallback;
  }

  let target: URL;
  try {
    target = new URL(rawNext, base.origin);
  } catch {
    return fallback;
  }

  return target.origin === base.origin ? target : fallback;
}
