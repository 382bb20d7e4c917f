import { createServerClient, type CookieOptions } from "@supabase/ssr";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { cookies } from "next/headers";

import type { ServiceCredentials } from "@/lib/supabase/config";
import { requireSessionCredentials } from "@/lib/supabase/config";

/** Per-request client bound to the caller's auth cookies. */
export async function createSupabaseSessionClient(): Promise<SupabaseClient> {
  const { url, publishableKey } = requireSessionCredentials();
  const cookieStore = await cookies();

  return createServerClient(url, publishableKey, {
    cookies: {
      getAll: () => cookieStore.getAll(),
      setAll(cookiesToSet: { name: string; value: string; options: CookieOptions }[]) {
        for (const { name, value, options } of cookiesToSet) {
          cookieStore.set(name, value, options);
        }
      },
    },
  });
}

/** Server-only client for Storage; never carries a user session. */
export function createSupabaseServiceClient(credentials: ServiceCredentials): SupabaseClient {
  return createClient(credentials.url, credentials.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
