import { parsePositiveInteger, readEnv } from "@/lib/config/env";
import type { TranscriptionProvider } from "@/types/transcript";

export type { TranscriptionProvider };
export type TranscriptionProviderSelection = TranscriptionProvider | "auto";

export interface WhisperConfig {
  path: string;
  model: string;
  language: string;
  timeoutMs: number;
}

export interface AssemblyAiConfig {
  apiKey: string | null;
  baseUrl: string;
  pollIntervalMs: number;
  maxWaitMs: number;
}

export interface DeepgramConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
}

export interface TranscriptionConfig {
  provider: TranscriptionProviderSelection;
  whisper: WhisperConfig;
  assemblyAi: AssemblyAiConfig;
  deepgram: DeepgramConfig;
}

const PROVIDER_SELECTIONS: readonly TranscriptionProviderSelection[] = [
  "auto",
  "whisper",
  "assemblyai",
  "deepgram",
];

const CONFIG_ERROR_CODE = "TRANSCRIPTION_CONFIG_INVALID";

function isProviderSelection(value: string): value is TranscriptionProviderSelection {
  return PROVIDER_SELECTIONS.some((selection) => selection === value);
}

export function parseProviderSelection(raw: string | undefined): TranscriptionProviderSelection {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized) {
    return "auto";
  }

  if (isProviderSelection(normalized)) {
    return normalized;
  }

  console.warn("[transcription] unknown TRANSCRIPTION_PROVIDER, using auto", {
    received: raw,
    allowed: PROVIDER_SELECTIONS,
  });
  return "auto";
}

/** Accepts values pasted as `NAME=value` or wrapped in quotes. */
export function normalizeApiKey(raw: string | null): string | null {
  if (!raw) {
    return null;
  }

  const withoutName = raw.trim().replace(/^[A-Z][A-Z0-9_]*=/, "");
  const unquoted = withoutName.replace(/^(["'])(.*)\1$/, "$2").trim();
  return unquoted || null;
}

export function getTranscriptionConfig(): TranscriptionConfig {
  return {
    provider: parseProviderSelection(process.env.TRANSCRIPTION_PROVIDER),
    whisper: {
      path: readEnv("WHISPER_PATH") ?? "whisper",
      model: readEnv("WHISPER_MODEL") ?? "base",
      language: readEnv("WHISPER_LANGUAGE") ?? "en",
      timeoutMs: parsePositiveInteger(
        "WHISPER_TIMEOUT_MS",
        process.env.WHISPER_TIMEOUT_MS,
        900_000,
        CONFIG_ERROR_CODE,
      ),
    },
    assemblyAi: {
      apiKey: normalizeApiKey(readEnv("ASSEMBLYAI_API_KEY")),
      baseUrl: readEnv("ASSEMBLYAI_BASE_URL") ?? "https://api.assemblyai.com",
      pollIntervalMs: parsePositiveInteger(
        "ASSEMBLYAI_POLL_INTERVAL_MS",
        process.env.ASSEMBLYAI_POLL_INTERVAL_MS,
        1_000,
        CONFIG_ERROR_CODE,
      ),
      maxWaitMs: parsePositiveInteger(
        "ASSEMBLYAI_MAX_WAIT_MS",
        process.env.ASSEMBLYAI_MAX_WAIT_MS,
        600_000,
        CONFIG_ERROR_CODE,
      ),
    },
    deepgram: {
      apiKey: normalizeApiKey(readEnv("DEEPGRAM_API_KEY")),
      baseUrl: readEnv("DEEPGRAM_BASE_URL") ?? "https://api.deepgram.com",
      model: readEnv("DEEPGRAM_MODEL") ?? "nova-2",
    },
  };
}
