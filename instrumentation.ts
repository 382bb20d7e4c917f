export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  const [{ getCookieConfig }, { provisionCookies }, { errorMessageOf }] = await Promise.all([
    import("@/lib/cookies/config"),
    import("@/lib/cookies/provision"),
    import("@/lib/errors/app-error"),
  ]);

  try {
    await provisionCookies(getCookieConfig());
  } catch (error) {
    console.error("[instrumentation] cookie provisioning failed", { message: errorMessageOf(error) });
  }
}
