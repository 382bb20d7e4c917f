import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NextRequest } from "next/server";

vi.mock("@/db/repositories/user-repository", () => ({
  upsertUserProfile: vi.fn(),
}));

vi.mock("@/lib/supabase/clients", () => ({
  createSupabaseSessionClient: vi.fn(),
}));

import { upsertUserProfile } from "@/db/repositories/user-repository";
import { createSupabaseSessionClient } from "@/lib/supabase/clients";

import { GET } from "./route";

const mockedUpsertUserProfile = vi.mocked(upsertUserProfile);
const mockedCreateSessionClient = vi.mocked(createSupabaseSessionClient);

type SessionClient = Awaited<ReturnType<typeof createSupabaseSessionClient>>;

function clientExchanging(result: { data: { user: { id: string; email?: string } | null }; error: Error | null }) {
  // Only auth.exchangeCodeForSession is reached by the callback.
  return {
    auth: { exchangeCodeForSession: vi.fn().mockResolvedValue(result) },
  } as unknown as SessionClient;
}

describe("/auth/callback route", () => {
  beforeEach(() => {
    mockedUpsertUserProfile.mockReset();
    mockedCreateSessionClient.mockReset();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects a callback without a code", async () => {
    const response = await GET(new NextRequest("https://blogcast.test/auth/callback"));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({ code: "AUTH_CODE_MISSING" });
  });

  it("records the user and redirects to the sanitized next path", async () => {
    mockedCreateSessionClient.mockResolvedValue(
      clientExchanging({ data: { user: { id: "user-1", email: "user@example.com" } }, error: null }),
    );

    const response = await GET(
      new NextRequest("https://blogcast.test/auth/callback?code=abc&next=%2F%2Fevil.example"),
    );

    expect(response.status).toBe(307);
    expect(response.headers.get("location")).toBe("https://blogcast.test/");
    expect(mockedUpsertUserProfile).toHaveBeenCalledWith({ id: "user-1", email: "user@example.com" });
  });

  it("returns 401 when the exchange fails", async () => {
    mockedCreateSessionClient.mockResolvedValue(
      clientExchanging({ data: { user: null }, error: new Error("invalid grant") }),
    );

    const response = await GET(new NextRequest("https://blogcast.test/auth/callback?code=bad"));

    expect(response.status).toBe(401);
    await expect(response.json()).resolves.toEqual({
      error: "Sign-in could not be completed.",
      code: "AUTH_EXCHANGE_FAILED",
    });
    expect(mockedUpsertUserProfile).not.toHaveBeenCalled();
  });
});
