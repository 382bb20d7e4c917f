import { parsePositiveInteger, readEnv } from "@/lib/config/env";

export type ChatProviderName = "groq" | "openai";

/** An OpenAI-compatible chat completions endpoint. */
export interface ChatProviderConfig {
  name: ChatProviderName;
  apiKey: string;
  /** Null for the OpenAI API itself. */
  baseURL: string | null;
  /** Tried in order; a retired or unknown model hands over to the next. */
  models: string[];
  timeoutMs: number;
  maxOutputTokens: number;
  temperature: number;
}

const CONFIG_ERROR_CODE = "CHAT_CONFIG_INVALID";
const GROQ_BASE_URL = "https://api.groq.com/openai/v1";
const DEFAULT_MODELS: Record<ChatProviderName, string[]> = {
  groq: ["llama-3.3-70b-versatile", "llama-3.1-8b-instant"],
  openai: ["gpt-4o-mini"],
};
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_OUTPUT_TOKENS = 3500;
const TEMPERATURE = 0.7;

function parseModelList(rawValue: string | null, fallback: string[]): string[] {
  const models = (rawValue ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
  return models.length > 0 ? [...new Set(models)] : fallback;
}

/** Providers with an API key, in the order the blog writer tries them around Gemini. */
export function getChatProviderConfigs(): ChatProviderConfig[] {
  const timeoutMs = parsePositiveInteger(
    "CHAT_TIMEOUT_MS",
    process.env.CHAT_TIMEOUT_MS,
    DEFAULT_TIMEOUT_MS,
    CONFIG_ERROR_CODE,
  );
  const maxOutputTokens = parsePositiveInteger(
    "CHAT_MAX_OUTPUT_TOKENS",
    process.env.CHAT_MAX_OUTPUT_TOKENS,
    DEFAULT_MAX_OUTPUT_TOKENS,
    CONFIG_ERROR_CODE,
  );

  const providers: ChatProviderConfig[] = [];
  const groqKey = readEnv("GROQ_API_KEY");
  if (groqKey) {
    providers.push({
      name: "groq",
      apiKey: groqKey,
      baseURL: GROQ_BASE_URL,
      models: parseModelList(readEnv("GROQ_MODELS"), DEFAULT_MODELS.groq),
      timeoutMs,
      maxOutputTokens,
      temperature: TEMPERATURE,
    });
  }

  const openaiKey = readEnv("OPENAI_API_KEY");
  if (openaiKey) {
    providers.push({
      name: "openai",
      apiKey: openaiKey,
      baseURL: null,
      models: parseModelList(readEnv("OPENAI_MODELS"), DEFAULT_MODELS.openai),
      timeoutMs,
      maxOutputTokens,
      temperature: TEMPERATURE,
    });
  }

  return providers;
}
