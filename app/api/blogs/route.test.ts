import { beforeEach, describe, expect, it, vi } from "vitest";
import { NextResponse } from "next/server";

vi.mock("@/db/repositories/blog-repository", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/db/repositories/blog-repository")>();
  return { ...actual, listBlogPostsByUser: vi.fn() };
});

vi.mock("@/lib/auth/api-user", () => ({
  resolveApiUser: vi.fn(),
}));

import { listBlogPostsByUser } from "@/db/repositories/blog-repository";
import { resolveApiUser } from "@/lib/auth/api-user";

import { GET } from "./route";

const mockedList = vi.mocked(listBlogPostsByUser);
const mockedResolveApiUser = vi.mocked(resolveApiUser);

describe("/api/blogs route", () => {
  beforeEach(() => {
    mockedList.mockReset();
    mockedResolveApiUser.mockResolvedValue({ userId: "user-1", email: "user@example.com", errorResponse: null });
  });

  it("returns the auth error response from the resolver", async () => {
    mockedResolveApiUser.mockResolvedValue({
      userId: "",
      email: null,
      errorResponse: NextResponse.json({ error: "Sign in to continue." }, { status: 401 }),
    });

    const response = await GET(new Request("http://localhost/api/blogs"));

    expect(response.status).toBe(401);
    expect(mockedList).not.toHaveBeenCalled();
  });

  it("lists the caller's posts as list items", async () => {
    mockedList.mockResolvedValue([
      {
        id: "blog-1",
        userId: "user-1",
        title: "Knife skills",
        description: "Dicing onions",
        content: "# Intro\nKeep the tip down.",
        category: "Cooking",
        youtubeUrl: "https://www.youtube.com/watch?v=abcdefghijk",
        youtubeTitle: "Chef video",
        youtubeChannel: "Chef",
        youtubeDuration: "3:10",
        transcriptSource: "captions",
        createdAt: "2026-02-01T00:00:00.000Z",
        updatedAt: "2026-02-01T00:00:00.000Z",
      },
    ]);

    const response = await GET(new Request("http://localhost/api/blogs"));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      items: [
        {
          id: "blog-1",
          title: "Knife skills",
          description: "Dicing onions",
          category: "Cooking",
          youtubeTitle: "Chef video",
          excerpt: "Intro Keep the tip down.",
          createdAt: "2026-02-01T00:00:00.000Z",
        },
      ],
    });
    expect(mockedList).toHaveBeenCalledWith("user-1", 30);
  });

  it("clamps the limit to the repository maximum", async () => {
    mockedList.mockResolvedValue([]);

    await GET(new Request("http://localhost/api/blogs?limit=500"));
    await GET(new Request("http://localhost/api/blogs?limit=abc"));

    expect(mockedList.mock.calls).toEqual([
      ["user-1", 100],
      ["user-1", 30],
    ]);
  });
});
