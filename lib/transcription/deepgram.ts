import { readFile } from "node:fs/promises";

import { AppError } from "@/lib/errors/app-error";
import type { DeepgramConfig } from "@/lib/transcription/config";

interface DeepgramResponse {
  results?: {
    channels?: Array<{
      alternatives?: Array<{ transcript?: string }>;
    }>;
  };
}

export async function transcribeWithDeepgram(
  filePath: string,
  config: DeepgramConfig,
  signal?: AbortSignal,
): Promise<string> {
  if (!config.apiKey) {
    throw new AppError("DEEPGRAM_API_KEY is not configured.", "TRANSCRIPTION_FAILED", 502);
  }

  const url = new URL("/v1/listen", config.baseUrl);
  url.searchParams.set("model", config.model);
  url.searchParams.set("smart_format", "true");
  url.searchParams.set("punctuate", "true");

  const response = await fetch(url, {
    method: "POST",
    headers: {
      authorization: `Token ${config.apiKey}`,
      "content-type": "application/octet-stream",
    },
    body: new Uint8Array(await readFile(filePath)),
    signal,
    cache: "no-store",
  });

  if (!response.ok) {
    const detail = (await response.text().catch(() => "")).slice(0, 200);
    throw new AppError(
      `Deepgram request failed with ${response.status}${detail ? `: ${detail}` : ""}`,
      "TRANSCRIPTION_FAILED",
      502,
    );
  }

  const data = (await response.json()) as DeepgramResponse;
  return (data.results?.channels?.[0]?.alternatives?.[0]?.transcript ?? "").trim();
}
