import { parseBoolean, readEnv } from "@/lib/config/env";

export interface AuthConfig {
  /** When false every request runs as the guest user. */
  enabled: boolean;
  guestUserId: string;
}

const DEFAULT_GUEST_USER_ID = "00000000-0000-0000-0000-000000000001";

export function getAuthConfig(): AuthConfig {
  return {
    enabled: parseBoolean(process.env.NEXT_PUBLIC_AUTH_ENABLED),
    guestUserId: readEnv("DEV_GUEST_USER_ID") ?? DEFAULT_GUEST_USER_ID,
  };
}

/** Placeholder address for accounts that have no e-mail on file. */
export function placeholderEmail(userId: string): string {
  return `${userId}@local.invalid`;
}
