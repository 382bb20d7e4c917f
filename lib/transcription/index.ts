import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { transcribeWithAssemblyAi } from "@/lib/transcription/assemblyai";
import {
  getTranscriptionConfig,
  type TranscriptionConfig,
  type TranscriptionProvider,
} from "@/lib/transcription/config";
import { transcribeWithDeepgram } from "@/lib/transcription/deepgram";
import { transcribeWithWhisper } from "@/lib/transcription/whisper";
import type { AudioTranscript } from "@/types/transcript";

export interface TranscribeAudioOptions {
  config?: TranscriptionConfig;
  signal?: AbortSignal;
}

export function resolveProviderChain(config: TranscriptionConfig): TranscriptionProvider[] {
  if (config.provider !== "auto") {
    return [config.provider];
  }

  const chain: TranscriptionProvider[] = ["whisper"];
  if (config.assemblyAi.apiKey) {
    chain.push("assemblyai");
  }
  if (config.deepgram.apiKey) {
    chain.push("deepgram");
  }
  return chain;
}

function runProvider(
  provider: TranscriptionProvider,
  filePath: string,
  config: TranscriptionConfig,
  signal: AbortSignal | undefined,
): Promise<string> {
  switch (provider) {
    case "whisper":
      return transcribeWithWhisper(filePath, config.whisper, signal);
    case "assemblyai":
      return transcribeWithAssemblyAi(filePath, config.assemblyAi, signal);
    case "deepgram":
      return transcribeWithDeepgram(filePath, config.deepgram, signal);
  }
}

export async function transcribeAudio(
  filePath: string,
  options: TranscribeAudioOptions = {},
): Promise<AudioTranscript> {
  const config = options.config ?? getTranscriptionConfig();
  const chain = resolveProviderChain(config);
  const failures: string[] = [];

  for (const provider of chain) {
    const startedAt = Date.now();
    try {
      const text = (await runProvider(provider, filePath, config, options.signal)).trim();
      if (!text) {
        failures.push(`${provider}: empty transcript`);
        console.warn("[transcription] provider returned no text", { provider });
        continue;
      }

      console.info("[transcription] completed", {
        provider,
        chars: text.length,
        durationMs: Date.now() - startedAt,
      });
      return { kind: "transcription", provider, text };
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const message = errorMessageOf(error);
      failures.push(`${provider}: ${message}`);
      console.warn("[transcription] provider failed", { provider, message });
    }
  }

  throw new AppError(
    `All transcription providers failed (${chain.join(", ")}). ${failures.join("; ")}`,
    "TRANSCRIPTION_FAILED",
    502,
  );
}
