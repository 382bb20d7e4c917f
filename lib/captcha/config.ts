import { parsePositiveInteger, readEnv } from "@/lib/config/env";

export interface CaptchaConfig {
  browserPath: string | null;
  timeoutMs: number;
  navigationTimeoutMs: number;
}

const CONFIG_ERROR_CODE = "CAPTCHA_CONFIG_INVALID";

export function getCaptchaConfig(): CaptchaConfig {
  return {
    browserPath: readEnv("CAPTCHA_BROWSER_PATH"),
    timeoutMs: parsePositiveInteger(
      "CAPTCHA_TIMEOUT_MS",
      process.env.CAPTCHA_TIMEOUT_MS,
      300_000,
      CONFIG_ERROR_CODE,
    ),
    navigationTimeoutMs: parsePositiveInteger(
      "CAPTCHA_NAVIGATION_TIMEOUT_MS",
      process.env.CAPTCHA_NAVIGATION_TIMEOUT_MS,
      60_000,
      CONFIG_ERROR_CODE,
    ),
  };
}

export function isCaptchaSolverAvailable(config: CaptchaConfig = getCaptchaConfig()): boolean {
  return config.browserPath !== null;
}
