import { BLOG_SYSTEM_INSTRUCTION, buildBlogPrompt, buildContinuationPrompt } from "@/lib/blog/prompts";
import { generateWithChatProvider } from "@/lib/chat/client";
import { getChatProviderConfigs, type ChatProviderName } from "@/lib/chat/config";
import { errorMessageOf } from "@/lib/errors/app-error";
import { generateWithGemini } from "@/lib/gemini/client";
import type { VideoInfo } from "@/lib/youtube/video-info";

export interface BlogDraft {
  title: string;
  description: string;
  content: string;
}

export interface WrittenBlog extends BlogDraft {
  /** Null when no model could be reached and the transcript became the content. */
  model: string | null;
}

export interface GenerationRequest {
  requestId: string;
  systemInstruction: string;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

export interface Generation {
  text: string;
  finishReason: string | null;
  model: string;
}

/** One LLM the writer can ask; continuations go to the same backend. */
export interface BlogBackend {
  name: ChatProviderName | "gemini";
  generate(prompt: string, request: GenerationRequest): Promise<Generation>;
}

export const DEFAULT_BLOG_DESCRIPTION = "A blog post generated from a YouTube video.";
const CONTINUATION_MAX_OUTPUT_TOKENS = 1500;
/** Gemini reports `MAX_TOKENS`, chat completion APIs `length`. */
const TRUNCATED_FINISH_REASONS = new Set(["MAX_TOKENS", "length"]);
const TITLE_PATTERN = /TITLE:\s*(.+?)(?:\n|DESCRIPTION:)/i;
const DESCRIPTION_PATTERN = /DESCRIPTION:\s*(.+?)(?:\n|CONTENT:)/i;
const CONTENT_PATTERN = /CONTENT:\s*([\s\S]+)$/i;

export function parseBlogResponse(text: string, videoInfo: Pick<VideoInfo, "title">): BlogDraft {
  const title = TITLE_PATTERN.exec(text)?.[1]?.trim();
  const description = DESCRIPTION_PATTERN.exec(text)?.[1]?.trim();
  const content = CONTENT_PATTERN.exec(text)?.[1]?.trim();

  return {
    title: title || videoInfo.title,
    description: description || DEFAULT_BLOG_DESCRIPTION,
    content: content || text.trim(),
  };
}

export interface WriteBlogPostOptions {
  requestId?: string;
  signal?: AbortSignal;
  backends?: BlogBackend[];
}

/** Groq when keyed, then Gemini, then OpenAI when keyed. */
export function resolveBlogBackends(): BlogBackend[] {
  const chatProviders = getChatProviderConfigs();
  const chatBackend = (name: ChatProviderName): BlogBackend[] =>
    chatProviders
      .filter((provider) => provider.name === name)
      .map((provider): BlogBackend => ({
        name,
        generate: (prompt, request) => generateWithChatProvider(provider, prompt, request),
      }));

  return [...chatBackend("groq"), { name: "gemini", generate: generateWithGemini }, ...chatBackend("openai")];
}

async function continueIfTruncated(
  backend: BlogBackend,
  generation: Generation,
  requestId: string,
  signal: AbortSignal | undefined,
): Promise<string> {
  if (!generation.finishReason || !TRUNCATED_FINISH_REASONS.has(generation.finishReason)) {
    return generation.text;
  }

  try {
    const continuation = await backend.generate(buildContinuationPrompt(generation.text), {
      requestId: `${requestId}:continue`,
      systemInstruction: BLOG_SYSTEM_INSTRUCTION,
      maxOutputTokens: CONTINUATION_MAX_OUTPUT_TOKENS,
      signal,
    });
    return `${generation.text}\n${continuation.text.trim()}`;
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    console.warn("[blog-writer] continuation failed", {
      requestId,
      backend: backend.name,
      message: errorMessageOf(error),
    });
    return generation.text;
  }
}

/**
 * Tries each backend in turn. Never throws for model failures: when none answers, the
 * transcript is the content. A caller abort is rethrown.
 */
export async function writeBlogPost(
  transcript: string,
  videoInfo: VideoInfo,
  options: WriteBlogPostOptions = {},
): Promise<WrittenBlog> {
  const requestId = options.requestId ?? crypto.randomUUID();
  const backends = options.backends ?? resolveBlogBackends();
  const prompt = buildBlogPrompt(transcript, videoInfo);

  for (const backend of backends) {
    try {
      const generation = await backend.generate(prompt, {
        requestId,
        systemInstruction: BLOG_SYSTEM_INSTRUCTION,
        signal: options.signal,
      });
      const text = await continueIfTruncated(backend, generation, requestId, options.signal);
      return { ...parseBlogResponse(text, videoInfo), model: generation.model };
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      console.warn("[blog-writer] backend failed", {
        requestId,
        backend: backend.name,
        message: errorMessageOf(error),
      });
    }
  }

  console.warn("[blog-writer] falling back to transcript content", { requestId, backendCount: backends.length });
  return {
    title: videoInfo.title,
    description: DEFAULT_BLOG_DESCRIPTION,
    content: transcript,
    model: null,
  };
}
