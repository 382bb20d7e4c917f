import { NextResponse } from "next/server";

import { AppError, errorMessageOf } from "@/lib/errors/app-error";
import { describeAppError } from "@/lib/errors/error-messages";

export async function readJsonBody(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return { ok: false };
  }
}

export function jsonError(message: string, code: string, status: number): NextResponse {
  return NextResponse.json({ error: message, code }, { status });
}

/** AppErrors keep their status and code; anything else becomes a logged 500. */
export function toErrorResponse(error: unknown, fallbackMessage: string, logTag: string): NextResponse {
  if (error instanceof AppError) {
    console.warn(`[${logTag}] request failed`, { code: error.code, status: error.statusCode, message: error.message });
    return NextResponse.json(describeAppError(error), { status: error.statusCode });
  }

  console.error(`[${logTag}] unexpected error`, { message: errorMessageOf(error) });
  return jsonError(errorMessageOf(error, fallbackMessage), "INTERNAL_ERROR", 500);
}
