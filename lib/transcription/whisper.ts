import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join } from "node:path";

import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { runProcess, summarizeHead, type RunProcessResult } from "@/lib/process/run-process";
import type { WhisperConfig } from "@/lib/transcription/config";

export function buildWhisperArgs(filePath: string, config: WhisperConfig, outputDir: string): string[] {
  return [
    filePath,
    "--model",
    config.model,
    "--language",
    config.language,
    "--output_format",
    "txt",
    "--output_dir",
    outputDir,
    "--fp16",
    "False",
  ];
}

export async function transcribeWithWhisper(
  filePath: string,
  config: WhisperConfig,
  signal?: AbortSignal,
): Promise<string> {
  const outputDir = await mkdtemp(join(tmpdir(), "blogcast-whisper-"));

  try {
    let result: RunProcessResult;
    try {
      result = await runProcess(config.path, buildWhisperArgs(filePath, config, outputDir), {
        timeoutMs: config.timeoutMs,
        signal,
      });
    } catch (error) {
      throw new AppError(
        `Whisper could not be started (${config.path}): ${errorMessageOf(error)}`,
        "TRANSCRIPTION_FAILED",
        502,
      );
    }

    if (result.code !== 0) {
      throw new AppError(
        result.timedOut
          ? `Whisper timed out after ${config.timeoutMs}ms.`
          : `Whisper exited with code ${result.code}: ${summarizeHead(result.stderr)}`,
        "TRANSCRIPTION_FAILED",
        502,
      );
    }

    const outputFile = join(outputDir, `${basename(filePath, extname(filePath))}.txt`);
    let text: string;
    try {
      text = await readFile(outputFile, "utf8");
    } catch (error) {
      throw new AppError(
        `Whisper did not write a transcript: ${errorMessageOf(error)}`,
        "TRANSCRIPTION_FAILED",
        502,
      );
    }

    return text.trim();
  } finally {
    await rm(outputDir, { recursive: true, force: true });
  }
}
