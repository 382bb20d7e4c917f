import { describe, expect, it } from "vitest";

import { parseDatabaseUrl } from "./database-url";

describe("parseDatabaseUrl", () => {
  it("keeps passwords with reserved characters intact", () => {
    expect(
      parseDatabaseUrl("postgresql://postgres.ref:p@ss:w/rd@aws-0.pooler.supabase.com:6543/postgres?sslmode=require"),
    ).toEqual({
      host: "aws-0.pooler.supabase.com",
      port: 6543,
      user: "postgres.ref",
      password: "p@ss:w/rd",
      database: "postgres",
      ssl: "require",
    });
  });

  it("omits the port and ssl when absent", () => {
    expect(parseDatabaseUrl("postgres://app@localhost/blogcast")).toEqual({
      host: "localhost",
      user: "app",
      database: "blogcast",
    });
  });

  it("maps sslmode=disable to false", () => {
    expect(parseDatabaseUrl("postgres://app:test-secret@db:5432/blogcast?sslmode=disable").ssl).toBe(false);
  });

  it("rejects a url without a database", () => {
    expect(() => parseDatabaseUrl("postgres://app:test-secret@db:5432/")).toThrow(
      "DATABASE_URL must include a database name",
    );
  });
});
