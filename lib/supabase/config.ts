import { readEnv } from "@/lib/config/env";
import { AppError } from "@/lib/errors/app-error";

export interface SupabaseConfig {
  url: string | null;
  publishableKey: string | null;
  serviceRoleKey: string | null;
}

export interface SessionCredentials {
  url: string;
  publishableKey: string;
}

export interface ServiceCredentials {
  url: string;
  serviceRoleKey: string;
}

/** Checked in order; the older names still show up in deployed environments. */
const PUBLISHABLE_KEY_NAMES = [
  "NEXT_PUBLIC_SUPABASE_PUBLISHABLE_DEFAULT_KEY",
  "NEXT_PUBLIC_SUPABASE_PUBLISHABLE_KEY",
  "NEXT_PUBLIC_SUPABASE_ANON_KEY",
] as const;

export function getSupabaseConfig(): SupabaseConfig {
  let publishableKey: string | null = null;
  for (const name of PUBLISHABLE_KEY_NAMES) {
    publishableKey = readEnv(name);
    if (publishableKey) {
      break;
    }
  }

  return {
    url: readEnv("NEXT_PUBLIC_SUPABASE_URL"),
    publishableKey,
    serviceRoleKey: readEnv("SUPABASE_SERVICE_ROLE_KEY"),
  };
}

export function requireSessionCredentials(config: SupabaseConfig = getSupabaseConfig()): SessionCredentials {
  if (!config.url || !config.publishableKey) {
    throw new AppError(
      `NEXT_PUBLIC_SUPABASE_URL and one of ${PUBLISHABLE_KEY_NAMES.join(", ")} must be set when auth is enabled.`,
      "SUPABASE_CONFIG_INVALID",
      500,
    );
  }
  return { url: config.url, publishableKey: config.publishableKey };
}

/** Null when either value is missing; the remote cookie source is then skipped. */
export function getServiceCredentials(config: SupabaseConfig = getSupabaseConfig()): ServiceCredentials | null {
  if (!config.url || !config.serviceRoleKey) {
    return null;
  }
  return { url: config.url, serviceRoleKey: config.serviceRoleKey };
}
