import { NextResponse } from "next/server";

import { upsertUserProfile } from "@/db/repositories/user-repository";
import { getAuthConfig, placeholderEmail } from "@/lib/auth/config";
import { errorMessageOf } from "@/lib/errors/app-error";
import { createSupabaseSessionClient } from "@/lib/supabase/clients";

export const AUTH_REQUIRED_ERROR_MESSAGE = "Sign in to continue.";
export const AUTH_CHECK_FAILED_ERROR_MESSAGE = "The session could not be verified.";

interface ResolveApiUserOptions {
  /** Upserts the `users` row so blog posts can reference it. */
  ensureProfile?: boolean;
}

export type ResolveApiUserResult =
  | { userId: string; email: string; errorResponse: null }
  | { userId: ""; email: null; errorResponse: NextResponse };

interface ApiUser {
  id: string;
  email: string;
}

function rejected(message: string, code: string, status: number): ResolveApiUserResult {
  return {
    userId: "",
    email: null,
    errorResponse: NextResponse.json({ error: message, code }, { status }),
  };
}

async function lookupSessionUser(): Promise<ApiUser | null> {
  const supabase = await createSupabaseSessionClient();
  const {
    data: { user },
    error,
  } = await supabase.auth.getUser();

  if (error || !user) {
    return null;
  }
  return { id: user.id, email: user.email ?? placeholderEmail(user.id) };
}

/**
 * Resolves the caller from the Supabase session. With auth disabled every request runs as
 * the configured guest user.
 */
export async function resolveApiUser(options: ResolveApiUserOptions = {}): Promise<ResolveApiUserResult> {
  try {
    const config = getAuthConfig();
    const user = config.enabled
      ? await lookupSessionUser()
      : { id: config.guestUserId, email: placeholderEmail(`guest-${config.guestUserId}`) };

    if (!user) {
      return rejected(AUTH_REQUIRED_ERROR_MESSAGE, "AUTH_REQUIRED", 401);
    }

    if (options.ensureProfile) {
      await upsertUserProfile(user);
    }
    return { userId: user.id, email: user.email, errorResponse: null };
  } catch (error) {
    console.error("[auth] user resolution failed", { message: errorMessageOf(error) });
    return rejected(errorMessageOf(error, AUTH_CHECK_FAILED_ERROR_MESSAGE), "AUTH_CHECK_FAILED", 500);
  }
}
