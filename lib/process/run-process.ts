import { spawn } from "node:child_process";

export interface RunProcessOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Only the tail of each stream is kept. */
  maxOutputChars?: number;
  cwd?: string;
}

export interface RunProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

const DEFAULT_MAX_OUTPUT_CHARS = 8000;

function appendTail(current: string, chunk: Buffer, max: number): string {
  const next = current + chunk.toString();
  return next.length > max ? next.slice(-max) : next;
}

export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions,
): Promise<RunProcessResult> {
  const maxChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;

  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new Error(`${command} was cancelled before it started`));
      return;
    }

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
      ...(options.cwd ? { cwd: options.cwd } : {}),
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
    }, options.timeoutMs);

    const onAbort = () => {
      child.kill("SIGTERM");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const cleanup = () => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout.on("data", (chunk: Buffer) => {
      stdout = appendTail(stdout, chunk, maxChars);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = appendTail(stderr, chunk, maxChars);
    });

    child.on("error", (error) => {
      cleanup();
      reject(error);
    });

    child.on("close", (code) => {
      cleanup();
      resolve({ code, stdout, stderr, timedOut });
    });
  });
}

export function summarizeHead(raw: string, maxChars = 220): string {
  return raw.replace(/\s+/g, " ").trim().slice(0, maxChars);
}
