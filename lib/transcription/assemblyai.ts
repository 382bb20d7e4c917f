import { readFile } from "node:fs/promises";

import { AppError } from "@/lib/errors/app-error";
import type { AssemblyAiConfig } from "@/lib/transcription/config";

interface UploadResponse {
  upload_url?: string;
}

interface TranscriptResponse {
  id?: string;
  status?: "queued" | "processing" | "completed" | "error";
  text?: string | null;
  error?: string;
}

const MAX_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 500;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AppError("Transcription was cancelled.", "TRANSCRIPTION_FAILED", 502));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AppError("Transcription was cancelled.", "TRANSCRIPTION_FAILED", 502));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function requestJson<T>(
  url: string,
  init: RequestInit,
  what: string,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    const response = await fetch(url, { ...init, signal, cache: "no-store" });
    if (response.ok) {
      return (await response.json()) as T;
    }

    if (attempt < MAX_ATTEMPTS && isRetryableStatus(response.status)) {
      console.warn("[assemblyai] retrying request", { what, status: response.status, attempt });
      await sleep(RETRY_BASE_DELAY_MS * 2 ** (attempt - 1), signal);
      continue;
    }

    const detail = (await response.text().catch(() => "")).slice(0, 200);
    throw new AppError(
      `AssemblyAI ${what} failed with ${response.status}${detail ? `: ${detail}` : ""}`,
      "TRANSCRIPTION_FAILED",
      502,
    );
  }
}

export async function transcribeWithAssemblyAi(
  filePath: string,
  config: AssemblyAiConfig,
  signal?: AbortSignal,
): Promise<string> {
  if (!config.apiKey) {
    throw new AppError("ASSEMBLYAI_API_KEY is not configured.", "TRANSCRIPTION_FAILED", 502);
  }

  const headers = { authorization: config.apiKey };
  const audio = new Uint8Array(await readFile(filePath));

  const upload = await requestJson<UploadResponse>(
    `${config.baseUrl}/v2/upload`,
    {
      method: "POST",
      headers: { ...headers, "content-type": "application/octet-stream" },
      body: audio,
    },
    "upload",
    signal,
  );
  if (!upload.upload_url) {
    throw new AppError("AssemblyAI upload returned no upload_url.", "TRANSCRIPTION_FAILED", 502);
  }

  const created = await requestJson<TranscriptResponse>(
    `${config.baseUrl}/v2/transcript`,
    {
      method: "POST",
      headers: { ...headers, "content-type": "application/json" },
      body: JSON.stringify({ audio_url: upload.upload_url }),
    },
    "transcript request",
    signal,
  );
  if (!created.id) {
    throw new AppError("AssemblyAI returned no transcript id.", "TRANSCRIPTION_FAILED", 502);
  }

  const deadline = Date.now() + config.maxWaitMs;
  let current = created;

  while (current.status !== "completed") {
    if (current.status === "error") {
      throw new AppError(
        `AssemblyAI transcription failed: ${current.error ?? "unknown error"}`,
        "TRANSCRIPTION_FAILED",
        502,
      );
    }

    if (Date.now() >= deadline) {
      throw new AppError(
        `AssemblyAI transcription did not finish within ${config.maxWaitMs}ms.`,
        "TRANSCRIPTION_FAILED",
        502,
      );
    }

    await sleep(config.pollIntervalMs, signal);
    current = await requestJson<TranscriptResponse>(
      `${config.baseUrl}/v2/transcript/${created.id}`,
      { method: "GET", headers },
      "poll",
      signal,
    );
  }

  return (current.text ?? "").trim();
}
