import { AppError } from "@/lib/errors/app-error";

const CODE_MESSAGE_MAP: Record<string, string> = {
  YOUTUBE_URL_INVALID: "Please provide a valid YouTube URL (youtube.com or youtu.be).",
  YOUTUBE_BOT_DETECTED:
    "YouTube asked us to confirm we are not a bot. Solve the CAPTCHA to refresh the session cookies and try again.",
  YOUTUBE_METADATA_FETCH_FAILED: "Could not load the video details from YouTube. Please try again shortly.",
  YOUTUBE_TRANSCRIPT_BLOCKED: "YouTube blocked the caption request from this server.",
  YOUTUBE_TRANSCRIPT_UNAVAILABLE: "This video has no captions we can use.",
  AUDIO_DOWNLOAD_FAILED: "Downloading the video audio failed. Check that yt-dlp is installed and up to date.",
  TRANSCRIPTION_FAILED:
    "No speech-to-text provider could transcribe the audio. Check TRANSCRIPTION_PROVIDER and the provider keys.",
  TRANSCRIPTION_CONFIG_INVALID: "The speech-to-text configuration is invalid.",
  CAPTCHA_BROWSER_UNAVAILABLE:
    "The CAPTCHA browser could not be started. Install Chrome or Chromium and set CAPTCHA_BROWSER_PATH.",
  CAPTCHA_TIMED_OUT: "The CAPTCHA was not solved in time. No cookies were changed.",
  CAPTCHA_FAILED: "The CAPTCHA session ended without usable cookies.",
  CAPTCHA_NOT_APPLICABLE: "CAPTCHA recovery only applies after YouTube asked for verification.",
  CAPTCHA_CONFIG_INVALID: "The CAPTCHA settings are invalid. Check CAPTCHA_TIMEOUT_MS and CAPTCHA_NAVIGATION_TIMEOUT_MS.",
  COOKIE_STORE_IO_FAILED: "The cookie file could not be read or written.",
  COOKIE_SET_EMPTY: "No cookies were captured, so the existing cookie file was kept.",
  YOUTUBE_CONFIG_INVALID: "The yt-dlp/ffmpeg settings are invalid.",
  SUPABASE_CONFIG_INVALID: "Sign-in is enabled but the Supabase project is not configured.",
  BLOG_NOT_FOUND: "Blog post not found.",
  GEMINI_TIMEOUT: "The writing model took too long to respond. Please try again.",
  MISSING_GEMINI_KEY: "The server is missing its writing model key. Contact the administrator.",
  GEMINI_REQUEST_FAILED:
    "The writing model request was rejected (possibly rate limited). Try again later and check the API key quota.",
  GEMINI_EMPTY_RESPONSE: "The writing model returned no text. Please try again.",
  CHAT_REQUEST_FAILED: "The fallback writing model request failed. Check the GROQ/OPENAI keys and quotas.",
  CHAT_EMPTY_RESPONSE: "The fallback writing model returned no text.",
  CHAT_CONFIG_INVALID: "The fallback writing model settings are invalid. Check CHAT_TIMEOUT_MS and CHAT_MAX_OUTPUT_TOKENS.",
  GEMINI_CONFIG_INVALID: "The writing model configuration is invalid. Check GEMINI_MODEL/GEMINI_MODEL_CANDIDATES.",
};

/** Text for the end user; the raw message when the code has none. */
export function userFacingMessage(code: string, rawMessage: string): string {
  return CODE_MESSAGE_MAP[code] ?? rawMessage;
}

export function describeAppError(error: AppError): { error: string; code: string; message: string } {
  return {
    error: error.message,
    code: error.code,
    message: userFacingMessage(error.code, error.message),
  };
}
