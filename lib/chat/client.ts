import OpenAI from "openai";

import type { ChatProviderConfig } from "@/lib/chat/config";
import { AppError, errorMessageOf } from "@/lib/errors/app-error";

export interface ChatCompletionOptions {
  requestId: string;
  systemInstruction: string;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

export interface ChatGeneration {
  text: string;
  /** e.g. `stop` or `length`. */
  finishReason: string | null;
  model: string;
}

const RETIRED_MODEL_MESSAGE = /decommissioned|model_not_found|does not exist|not found/i;

const clients = new Map<string, OpenAI>();

function clientFor(provider: ChatProviderConfig): OpenAI {
  const key = `${provider.name}:${provider.baseURL ?? ""}:${provider.apiKey}`;
  const cached = clients.get(key);
  if (cached) {
    return cached;
  }
  const client = new OpenAI({
    apiKey: provider.apiKey,
    ...(provider.baseURL ? { baseURL: provider.baseURL } : {}),
    timeout: provider.timeoutMs,
    maxRetries: 1,
  });
  clients.set(key, client);
  return client;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function isModelUnavailable(error: unknown): boolean {
  const status = statusOf(error);
  return status === 404 || (status === 400 && RETIRED_MODEL_MESSAGE.test(errorMessageOf(error, "")));
}

/** One completion; only a retired or unknown model moves on to the provider's next model. */
export async function generateWithChatProvider(
  provider: ChatProviderConfig,
  prompt: string,
  options: ChatCompletionOptions,
): Promise<ChatGeneration> {
  const client = clientFor(provider);

  for (const [index, model] of provider.models.entries()) {
    const context = { requestId: options.requestId, provider: provider.name, model };
    try {
      const completion = await client.chat.completions.create(
        {
          model,
          messages: [
            { role: "system", content: options.systemInstruction },
            { role: "user", content: prompt },
          ],
          max_tokens: options.maxOutputTokens ?? provider.maxOutputTokens,
          temperature: provider.temperature,
        },
        { signal: options.signal },
      );

      const choice = completion.choices[0];
      const text = choice?.message.content?.trim() ?? "";
      const finishReason = choice?.finish_reason ?? null;
      if (!text) {
        throw new AppError(`${provider.name} returned no text.`, "CHAT_EMPTY_RESPONSE", 502);
      }

      console.info("[chat] request completed", { ...context, finishReason });
      return { text, finishReason, model };
    } catch (error) {
      if (options.signal?.aborted || error instanceof AppError) {
        throw error;
      }

      const status = statusOf(error);
      if (isModelUnavailable(error) && index < provider.models.length - 1) {
        console.info("[chat] model unavailable, trying the next one", { ...context, status });
        continue;
      }

      console.error("[chat] request failed", { ...context, status, message: errorMessageOf(error).slice(0, 240) });
      throw new AppError(
        `${provider.name} request failed${status ? ` (${status})` : ""}: ${errorMessageOf(error).slice(0, 240)}`,
        "CHAT_REQUEST_FAILED",
        502,
      );
    }
  }

  throw new AppError(`${provider.name} has no models configured.`, "CHAT_CONFIG_INVALID", 500);
}
