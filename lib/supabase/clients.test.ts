import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@supabase/ssr", () => ({ createServerClient: vi.fn(() => ({})) }));
vi.mock("@supabase/supabase-js", () => ({ createClient: vi.fn(() => ({})) }));
vi.mock("next/headers", () => ({ cookies: vi.fn() }));

import { createServerClient } from "@supabase/ssr";
import { cookies } from "next/headers";

import { createSupabaseSessionClient } from "./clients";

const cookieStore = {
  getAll: vi.fn(() => [{ name: "sb-access-token", value: "test-token" }]),
  set: vi.fn(),
};

beforeEach(() => {
  process.env.NEXT_PUBLIC_SUPABASE_URL = "https://project.supabase.test";
  process.env.NEXT_PUBLIC_SUPABASE_PUBLISHABLE_KEY = "test-publishable-key";
  vi.mocked(cookies).mockResolvedValue(cookieStore as unknown as Awaited<ReturnType<typeof cookies>>);
});

afterEach(() => {
  delete process.env.NEXT_PUBLIC_SUPABASE_URL;
  delete process.env.NEXT_PUBLIC_SUPABASE_PUBLISHABLE_KEY;
  vi.clearAllMocks();
});

describe("createSupabaseSessionClient", () => {
  it("reads and writes auth cookies through the request cookie store", async () => {
    await createSupabaseSessionClient();

    const [url, key, options] = vi.mocked(createServerClient).mock.calls[0];
    expect(url).toBe("https://project.supabase.test");
    expect(key).toBe("test-publishable-key");

    const cookieMethods = options.cookies;
    if (!("setAll" in cookieMethods) || !cookieMethods.setAll) {
      throw new Error("expected setAll cookie method");
    }
    expect(await cookieMethods.getAll()).toEqual([{ name: "sb-access-token", value: "test-token" }]);

    await cookieMethods.setAll([{ name: "sb-refresh-token", value: "rotated", options: { path: "/", httpOnly: true } }]);
    expect(cookieStore.set).toHaveBeenCalledWith("sb-refresh-token", "rotated", { path: "/", httpOnly: true });
  });
});
