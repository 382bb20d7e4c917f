import { NextResponse, type NextRequest } from "next/server";

import { upsertUserProfile } from "@/db/repositories/user-repository";
import { placeholderEmail } from "@/lib/auth/config";
import { resolveRedirectTarget } from "@/lib/auth/redirect";
import { errorMessageOf } from "@/lib/errors/app-error";
import { jsonError } from "@/lib/errors/http";
import { createSupabaseSessionClient } from "@/lib/supabase/clients";

export const dynamic = "force-dynamic";

/** OAuth / magic-link landing: exchanges the code for a session cookie and records the user. */
export async function GET(request: NextRequest) {
  const code = request.nextUrl.searchParams.get("code");
  if (!code) {
    return jsonError("The sign-in callback is missing its authorization code.", "AUTH_CODE_MISSING", 400);
  }

  try {
    const supabase = await createSupabaseSessionClient();
    const { data, error } = await supabase.auth.exchangeCodeForSession(code);
    const user = data.user;
    if (error || !user) {
      throw error ?? new Error("The code exchange returned no user.");
    }

    await upsertUserProfile({ id: user.id, email: user.email ?? placeholderEmail(user.id) });
    console.info("[auth-callback] session established", { userId: user.id });

    return NextResponse.redirect(resolveRedirectTarget(request.nextUrl.searchParams.get("next"), request.url));
  } catch (error) {
    console.error("[auth-callback] code exchange failed", { message: errorMessageOf(error) });
    return jsonError("Sign-in could not be completed.", "AUTH_EXCHANGE_FAILED", 401);
  }
}
