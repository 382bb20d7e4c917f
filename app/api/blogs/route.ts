import { NextResponse } from "next/server";

import { listBlogPostsByUser, MAX_LIST_LIMIT } from "@/db/repositories/blog-repository";
import { resolveApiUser } from "@/lib/auth/api-user";
import { toErrorResponse } from "@/lib/errors/http";
import { toBlogListItem } from "@/types/blog";

export const dynamic = "force-dynamic";

const DEFAULT_LIMIT = 30;

function parseLimit(url: URL): number {
  const value = Number.parseInt(url.searchParams.get("limit") ?? String(DEFAULT_LIMIT), 10);
  if (!Number.isFinite(value) || value <= 0) {
    return DEFAULT_LIMIT;
  }
  return Math.min(value, MAX_LIST_LIMIT);
}

export async function GET(request: Request) {
  const { userId, errorResponse } = await resolveApiUser();
  if (errorResponse) {
    return errorResponse;
  }

  try {
    const records = await listBlogPostsByUser(userId, parseLimit(new URL(request.url)));
    return NextResponse.json({ items: records.map(toBlogListItem) }, { status: 200 });
  } catch (error) {
    return toErrorResponse(error, "Could not load blog posts.", "blogs-list");
  }
}
