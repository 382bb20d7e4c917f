import { AppError } from "@/lib/errors/app-error";

/**
 * Phrases YouTube and Google use on their "prove you're human" walls, already normalized
 * (lower case, straight apostrophes, single spaces). Matching is by whole phrase only.
 */
export const BOT_CHALLENGE_SIGNATURES = [
  "sign in to confirm you're not a bot",
  "sign in to confirm that you're not a bot",
  "sign in to confirm you are not a bot",
  "confirm you're not a robot",
  "verify you're not a robot",
  "our systems have detected unusual traffic",
  "unusual traffic from your computer network",
  "www.google.com/sorry/index",
] as const;

export type ExtractionCondition =
  | { kind: "bot_detected"; youtubeUrl: string; rawError: string }
  | { kind: "failure"; youtubeUrl: string; rawError: string };

export function normalizeErrorText(raw: string): string {
  return raw
    .replace(/[‘’‛ʼ`´]/g, "'")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

export function isBotChallenge(raw: string): boolean {
  const normalized = normalizeErrorText(raw);
  return BOT_CHALLENGE_SIGNATURES.some((signature) => normalized.includes(signature));
}

export function classifyExtractionFailure(youtubeUrl: string, rawError: string): ExtractionCondition {
  return {
    kind: isBotChallenge(rawError) ? "bot_detected" : "failure",
    youtubeUrl,
    rawError,
  };
}

export class BotDetectedError extends AppError {
  youtubeUrl: string;
  rawError: string;
  retryExhausted: boolean;

  constructor(message: string, youtubeUrl: string, rawError: string, retryExhausted = false) {
    super(message, "YOUTUBE_BOT_DETECTED", 403);
    this.name = "BotDetectedError";
    this.youtubeUrl = youtubeUrl;
    this.rawError = rawError;
    this.retryExhausted = retryExhausted;
  }

  toCondition(): ExtractionCondition {
    return { kind: "bot_detected", youtubeUrl: this.youtubeUrl, rawError: this.rawError };
  }
}

export function toBotDetectedError(condition: ExtractionCondition): BotDetectedError {
  return new BotDetectedError(
    "YouTube requires a human verification step before this video can be extracted.",
    condition.youtubeUrl,
    condition.rawError,
  );
}
