import { GoogleGenAI } from "@google/genai";

import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { getGeminiRuntimeConfig, type GeminiLogLevel, type GeminiRuntimeConfig } from "@/lib/gemini/config";

export interface GenerateWithGeminiOptions {
  requestId?: string;
  systemInstruction?: string;
  maxOutputTokens?: number;
  /** Aborting stops the in-flight request and any pending retry. */
  signal?: AbortSignal;
}

export interface GeminiGeneration {
  text: string;
  /** e.g. `STOP` or `MAX_TOKENS`; null when the SDK reported none. */
  finishReason: string | null;
  model: string;
}

type FailureKind = "timeout" | "transient" | "model_unavailable" | "fatal";

interface ClassifiedFailure {
  kind: FailureKind;
  status: number | undefined;
  error: unknown;
}

interface AttemptContext {
  requestId: string;
  model: string;
  candidate: string;
  attempt: number;
}

const RETRYABLE_HTTP_STATUSES = new Set([429, 500, 502, 503, 504]);
const TRANSIENT_MESSAGE = /rate limit|too many requests|resource exhausted|overloaded|temporar(?:y|ily) unavailable/i;
const TIMEOUT_ERROR_NAMES = new Set(["AbortError", "TimeoutError"]);
const TIMEOUT_MESSAGE = /timeout|timed out|deadline/i;
const MAX_BACKOFF_MS = 12_000;

let cachedClient: { key: string; client: GoogleGenAI } | null = null;

function clientFor(apiKey: string, apiVersion: string): GoogleGenAI {
  const key = `${apiVersion}:${apiKey}`;
  if (cachedClient?.key === key) {
    return cachedClient.client;
  }
  const client = new GoogleGenAI({ apiKey, apiVersion });
  cachedClient = { key, client };
  return client;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function isModelMissing(error: unknown, status: number | undefined): boolean {
  if (status === 404) {
    return true;
  }
  if (status !== 400) {
    return false;
  }
  const message = errorMessageOf(error, "").toLowerCase();
  return (
    message.includes("not found for api version") ||
    message.includes("not supported for generatecontent") ||
    (message.includes("model") && message.includes("not found"))
  );
}

function classify(error: unknown): ClassifiedFailure {
  const status = statusOf(error);
  if (error instanceof AppError) {
    return { kind: "fatal", status, error };
  }
  if (error instanceof Error && (TIMEOUT_ERROR_NAMES.has(error.name) || TIMEOUT_MESSAGE.test(error.message))) {
    return { kind: "timeout", status, error };
  }
  const retryableStatus = status !== undefined && RETRYABLE_HTTP_STATUSES.has(status);
  if (retryableStatus || TRANSIENT_MESSAGE.test(errorMessageOf(error, ""))) {
    return { kind: "transient", status, error };
  }
  if (isModelMissing(error, status)) {
    return { kind: "model_unavailable", status, error };
  }
  return { kind: "fatal", status, error };
}

function toAppError(failure: ClassifiedFailure, model: string): AppError {
  const { error, status } = failure;
  if (error instanceof AppError) {
    return error;
  }

  switch (failure.kind) {
    case "timeout":
      return new AppError("The Gemini request timed out.", "GEMINI_TIMEOUT", 504);
    case "model_unavailable":
      return new AppError(
        `Gemini model ${model} is not available. Check GEMINI_MODEL and GEMINI_MODEL_CANDIDATES.`,
        "GEMINI_CONFIG_INVALID",
        500,
      );
    default:
      return error instanceof Error
        ? new AppError(
            `Gemini request failed${status ? ` (${status})` : ""}: ${error.message.slice(0, 240)}`,
            "GEMINI_REQUEST_FAILED",
            502,
          )
        : new AppError("Gemini failed with an unknown error.", "GEMINI_UNKNOWN_ERROR", 500);
  }
}

function log(logLevel: GeminiLogLevel, level: "debug" | "info" | "error", message: string, payload: object) {
  if (level === "debug" && logLevel !== "debug") {
    return;
  }
  const write = level === "error" ? console.error : level === "debug" ? console.debug : console.info;
  write(`[gemini] ${message}`, payload);
}

function waitFor(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

async function attempt(
  ai: GoogleGenAI,
  prompt: string,
  config: GeminiRuntimeConfig,
  options: GenerateWithGeminiOptions,
  context: AttemptContext,
): Promise<GeminiGeneration> {
  const signals = [AbortSignal.timeout(config.timeoutMs)];
  if (options.signal) {
    signals.push(options.signal);
  }
  const startedAt = Date.now();

  const response = await ai.models.generateContent({
    model: context.model,
    contents: prompt,
    config: {
      abortSignal: AbortSignal.any(signals),
      httpOptions: { timeout: config.timeoutMs },
      maxOutputTokens: options.maxOutputTokens ?? config.maxOutputTokens,
      temperature: config.temperature,
      topP: config.topP,
      ...(options.systemInstruction ? { systemInstruction: options.systemInstruction } : {}),
    },
  });

  const text = response.text?.trim() ?? "";
  const finishReason = response.candidates?.[0]?.finishReason ?? null;
  const durationMs = Date.now() - startedAt;

  if (!text) {
    log(config.logLevel, "error", "empty response", { ...context, durationMs, finishReason });
    throw new AppError("Gemini returned no text.", "GEMINI_EMPTY_RESPONSE", 502);
  }

  log(config.logLevel, "info", "request completed", {
    ...context,
    durationMs,
    finishReason,
    status: response.sdkHttpResponse?.responseInternal?.status,
  });
  return { text, finishReason, model: context.model };
}

/**
 * One text generation. Timeouts and transient HTTP failures are retried with exponential
 * backoff up to `maxRetries`; after that, or when the model does not exist, the next model
 * candidate is tried.
 */
export async function generateWithGemini(
  prompt: string,
  options: GenerateWithGeminiOptions = {},
): Promise<GeminiGeneration> {
  const config = getGeminiRuntimeConfig();
  const apiKey = process.env.GEMINI_API_KEY?.trim();
  if (!apiKey) {
    throw new AppError("GEMINI_API_KEY is not configured.", "MISSING_GEMINI_KEY", 500);
  }

  const ai = clientFor(apiKey, config.apiVersion);
  const requestId = options.requestId ?? crypto.randomUUID();
  const models = config.modelCandidates.length > 0 ? config.modelCandidates : [config.model];

  for (const [index, model] of models.entries()) {
    const isLastModel = index === models.length - 1;

    for (let retry = 0; ; retry += 1) {
      const context: AttemptContext = {
        requestId,
        model,
        candidate: `${index + 1}/${models.length}`,
        attempt: retry + 1,
      };
      log(config.logLevel, "debug", "request started", context);

      try {
        return await attempt(ai, prompt, config, options, context);
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }

        const failure = classify(error);
        const retriable = failure.kind === "timeout" || failure.kind === "transient";
        const details = {
          ...context,
          status: failure.status,
          kind: failure.kind,
          errorMessageHead: errorMessageOf(error).replace(/\s+/g, " ").trim().slice(0, 240),
        };

        if (retriable && retry < config.maxRetries) {
          const retryDelayMs = Math.min(config.retryBaseDelayMs * 2 ** retry, MAX_BACKOFF_MS);
          log(config.logLevel, "info", "request retry scheduled", { ...details, retryDelayMs });
          await waitFor(retryDelayMs, options.signal);
          continue;
        }

        if ((retriable || failure.kind === "model_unavailable") && !isLastModel) {
          log(config.logLevel, "info", "switching model candidate", details);
          break;
        }

        const appError = toAppError(failure, model);
        log(config.logLevel, "error", "request failed", { ...details, errorCode: appError.code });
        throw appError;
      }
    }
  }

  throw new AppError("No Gemini model candidate produced a response.", "GEMINI_REQUEST_FAILED", 502);
}
