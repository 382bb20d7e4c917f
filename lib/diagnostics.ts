import { getCaptchaConfig, type CaptchaConfig } from "@/lib/captcha/config";
import { getCookieConfig } from "@/lib/cookies/config";
import { CookieStore } from "@/lib/cookies/cookie-store";
import { errorMessageOf } from "@/lib/errors/app-error";
import { runProcess, summarizeHead } from "@/lib/process/run-process";
import { getTranscriptionConfig, type TranscriptionConfig } from "@/lib/transcription/config";
import { resolveProviderChain } from "@/lib/transcription";
import { getYouTubeToolConfig, type YouTubeToolConfig } from "@/lib/youtube/config";
import type { TranscriptionProvider } from "@/types/transcript";

export interface ToolStatus {
  command: string;
  available: boolean;
  /** First line of the tool's version output, or the failure reason. */
  detail: string;
}

export interface DiagnosticsReport {
  tools: {
    ytDlp: ToolStatus & { disabled: boolean };
    ffmpeg: ToolStatus;
    whisper: ToolStatus;
  };
  transcription: {
    selected: TranscriptionConfig["provider"];
    chain: TranscriptionProvider[];
  };
  cookies: {
    path: string;
    present: boolean;
  };
  captcha: {
    browserConfigured: boolean;
  };
}

export interface DiagnosticsInput {
  youtube?: YouTubeToolConfig;
  transcription?: TranscriptionConfig;
  captcha?: CaptchaConfig;
  cookiePath?: string;
}

const PROBE_TIMEOUT_MS = 10_000;

async function probeTool(command: string, args: string[]): Promise<ToolStatus> {
  try {
    const result = await runProcess(command, args, { timeoutMs: PROBE_TIMEOUT_MS, maxOutputChars: 2_000 });
    const firstLine = (result.stdout || result.stderr).split("\n")[0] ?? "";
    if (result.code !== 0) {
      return {
        command,
        available: false,
        detail: result.timedOut ? "timed out" : `exited with code ${result.code}`,
      };
    }
    return { command, available: true, detail: summarizeHead(firstLine, 120) };
  } catch (error) {
    return { command, available: false, detail: errorMessageOf(error) };
  }
}

export async function collectDiagnostics(input: DiagnosticsInput = {}): Promise<DiagnosticsReport> {
  const youtube = input.youtube ?? getYouTubeToolConfig();
  const transcription = input.transcription ?? getTranscriptionConfig();
  const captcha = input.captcha ?? getCaptchaConfig();
  const cookieStore = new CookieStore(input.cookiePath ?? getCookieConfig().cookiePath);

  const [ytDlp, ffmpeg, whisper, cookiesPresent] = await Promise.all([
    youtube.ytDlpDisabled
      ? Promise.resolve<ToolStatus>({ command: youtube.ytDlpPath, available: false, detail: "disabled" })
      : probeTool(youtube.ytDlpPath, ["--version"]),
    probeTool(youtube.ffmpegPath, ["-version"]),
    probeTool(transcription.whisper.path, ["--help"]),
    cookieStore.exists(),
  ]);

  return {
    tools: {
      ytDlp: { ...ytDlp, disabled: youtube.ytDlpDisabled },
      ffmpeg,
      whisper: whisper.available ? { ...whisper, detail: "installed" } : whisper,
    },
    transcription: {
      selected: transcription.provider,
      chain: resolveProviderChain(transcription),
    },
    cookies: {
      path: cookieStore.path,
      present: cookiesPresent,
    },
    captcha: {
      browserConfigured: captcha.browserPath !== null,
    },
  };
}
