import { parsePositiveInteger } from "@/lib/config/env";
import { AppError } from "@/lib/errors/app-error";

export type GeminiLogLevel = "info" | "debug";

export interface GeminiRuntimeConfig {
  model: string;
  /** Tried in order; a model that is unavailable or keeps failing hands over to the next. */
  modelCandidates: string[];
  apiVersion: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxOutputTokens: number;
  temperature: number;
  topP: number;
  logLevel: GeminiLogLevel;
}

const CONFIG_ERROR_CODE = "GEMINI_CONFIG_INVALID";

const DEFAULTS = {
  model: "gemini-2.0-flash",
  apiVersion: "v1",
  timeoutMs: 60_000,
  maxRetries: 2,
  retryBaseDelayMs: 700,
  maxOutputTokens: 3500,
  temperature: 0.7,
  topP: 0.95,
  logLevel: "info",
} as const satisfies Omit<GeminiRuntimeConfig, "modelCandidates">;

function parseBoundedNumber(
  name: string,
  rawValue: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  if (!rawValue || rawValue.trim() === "") {
    return fallback;
  }

  const parsed = Number(rawValue);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new AppError(
      `${name} must be a number between ${min} and ${max} (received "${rawValue}").`,
      CONFIG_ERROR_CODE,
      500,
    );
  }

  return parsed;
}

function parseLogLevel(rawValue: string | undefined): GeminiLogLevel {
  const normalized = rawValue?.trim().toLowerCase();
  if (!normalized) {
    return DEFAULTS.logLevel;
  }
  if (normalized === "info" || normalized === "debug") {
    return normalized;
  }

  throw new AppError("GEMINI_LOG_LEVEL must be either info or debug.", CONFIG_ERROR_CODE, 500);
}

function parseModelCandidates(rawValue: string | undefined, fallbackModel: string): string[] {
  const candidates = (rawValue ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean)
    .filter((value, index, all) => all.indexOf(value) === index);

  return candidates.length > 0 ? candidates : [fallbackModel];
}

/** Retry count may be zero, unlike the other integer settings. */
function parseRetryCount(rawValue: string | undefined): number {
  if (rawValue?.trim() === "0") {
    return 0;
  }
  return parsePositiveInteger("GEMINI_MAX_RETRIES", rawValue, DEFAULTS.maxRetries, CONFIG_ERROR_CODE);
}

export function getGeminiRuntimeConfig(): GeminiRuntimeConfig {
  const model = process.env.GEMINI_MODEL?.trim() || DEFAULTS.model;

  return {
    model,
    modelCandidates: parseModelCandidates(process.env.GEMINI_MODEL_CANDIDATES, model),
    apiVersion: process.env.GEMINI_API_VERSION?.trim() || DEFAULTS.apiVersion,
    timeoutMs: parsePositiveInteger(
      "GEMINI_TIMEOUT_MS",
      process.env.GEMINI_TIMEOUT_MS,
      DEFAULTS.timeoutMs,
      CONFIG_ERROR_CODE,
    ),
    maxRetries: parseRetryCount(process.env.GEMINI_MAX_RETRIES),
    retryBaseDelayMs: parsePositiveInteger(
      "GEMINI_RETRY_BASE_DELAY_MS",
      process.env.GEMINI_RETRY_BASE_DELAY_MS,
      DEFAULTS.retryBaseDelayMs,
      CONFIG_ERROR_CODE,
    ),
    maxOutputTokens: parsePositiveInteger(
      "GEMINI_MAX_OUTPUT_TOKENS",
      process.env.GEMINI_MAX_OUTPUT_TOKENS,
      DEFAULTS.maxOutputTokens,
      CONFIG_ERROR_CODE,
    ),
    temperature: parseBoundedNumber("GEMINI_TEMPERATURE", process.env.GEMINI_TEMPERATURE, DEFAULTS.temperature, 0, 2),
    topP: parseBoundedNumber("GEMINI_TOP_P", process.env.GEMINI_TOP_P, DEFAULTS.topP, 0, 1),
    logLevel: parseLogLevel(process.env.GEMINI_LOG_LEVEL),
  };
}
