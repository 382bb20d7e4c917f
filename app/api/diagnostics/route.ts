import { NextResponse } from "next/server";

import { resolveApiUser } from "@/lib/auth/api-user";
import { collectDiagnostics } from "@/lib/diagnostics";
import { toErrorResponse } from "@/lib/errors/http";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function GET() {
  const { errorResponse } = await resolveApiUser();
  if (errorResponse) {
    return errorResponse;
  }

  try {
    return NextResponse.json(await collectDiagnostics(), { status: 200 });
  } catch (error) {
    return toErrorResponse(error, "Diagnostics could not be collected.", "diagnostics");
  }
}
