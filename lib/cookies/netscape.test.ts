import { describe, expect, it } from "vitest";

import {
  fromBrowserCookies,
  parseNetscapeCookies,
  serializeNetscapeCookies,
  toCookieHeader,
  type CookieSet,
} from "./netscape";

const SAMPLE: CookieSet = [
  {
    domain: ".youtube.com",
    includeSubdomains: true,
    path: "/",
    secure: true,
    expires: 1_900_000_000,
    name: "VISITOR_INFO1_LIVE",
    value: "abc123",
  },
  {
    domain: "www.youtube.com",
    includeSubdomains: false,
    path: "/watch",
    secure: false,
    expires: 0,
    name: "PREF",
    value: "f6=40000000&hl=en",
  },
];

describe("serializeNetscapeCookies", () => {
  it("writes the header and one tab-separated line per cookie", () => {
    const text = serializeNetscapeCookies(SAMPLE);
    const lines = text.split("\n");

    expect(lines[0]).toBe("# Netscape HTTP Cookie File");
    expect(lines).toContain(".youtube.com\tTRUE\t/\tTRUE\t1900000000\tVISITOR_INFO1_LIVE\tabc123");
    expect(lines).toContain("www.youtube.com\tFALSE\t/watch\tFALSE\t0\tPREF\tf6=40000000&hl=en");
    expect(text.endsWith("\n")).toBe(true);
  });

  it("round-trips domain, name, value and expiry", () => {
    const parsed = parseNetscapeCookies(serializeNetscapeCookies(SAMPLE));

    expect(
      parsed.map(({ domain, name, value, expires }) => ({ domain, name, value, expires })),
    ).toEqual(
      SAMPLE.map(({ domain, name, value, expires }) => ({ domain, name, value, expires })),
    );
  });
});

describe("parseNetscapeCookies", () => {
  it("skips comments, blank and short lines but keeps HttpOnly entries", () => {
    const text = [
      "# Netscape HTTP Cookie File",
      "",
      "# a comment",
      "broken\tline",
      "#HttpOnly_.youtube.com\tTRUE\t/\tTRUE\t1900000000\tLOGIN_INFO\tsecret-value",
      ".youtube.com\tTRUE\t/\tFALSE\t-1\tYSC\tqwerty\r",
    ].join("\n");

    expect(parseNetscapeCookies(text)).toEqual([
      {
        domain: ".youtube.com",
        includeSubdomains: true,
        path: "/",
        secure: true,
        expires: 1_900_000_000,
        name: "LOGIN_INFO",
        value: "secret-value",
        httpOnly: true,
      },
      {
        domain: ".youtube.com",
        includeSubdomains: true,
        path: "/",
        secure: false,
        expires: 0,
        name: "YSC",
        value: "qwerty",
      },
    ]);
  });
});

describe("fromBrowserCookies", () => {
  it("derives the subdomain flag from the leading dot and maps session cookies to 0", () => {
    const set = fromBrowserCookies([
      { name: "SID", value: "one", domain: ".youtube.com", path: "/", secure: true, expires: 1_900_000_000.75 },
      { name: "GPS", value: "1", domain: "www.youtube.com", path: "/", secure: false, expires: -1 },
    ]);

    expect(set).toEqual([
      {
        domain: ".youtube.com",
        includeSubdomains: true,
        path: "/",
        secure: true,
        expires: 1_900_000_000,
        name: "SID",
        value: "one",
      },
      {
        domain: "www.youtube.com",
        includeSubdomains: false,
        path: "/",
        secure: false,
        expires: 0,
        name: "GPS",
        value: "1",
      },
    ]);
  });

  it("falls back to the youtube domain when the browser omits it", () => {
    expect(fromBrowserCookies([{ name: "A", value: "b" }])[0]).toMatchObject({
      domain: ".youtube.com",
      includeSubdomains: true,
      path: "/",
    });
  });
});

describe("toCookieHeader", () => {
  it("keeps matching, unexpired cookies only", () => {
    const set: CookieSet = [
      ...SAMPLE,
      { ...SAMPLE[0], name: "OLD", value: "gone", expires: 10 },
      { ...SAMPLE[0], domain: ".google.com", name: "NID", value: "other" },
    ];

    expect(toCookieHeader(set, "www.youtube.com", 1_000)).toBe(
      "VISITOR_INFO1_LIVE=abc123; PREF=f6=40000000&hl=en",
    );
    expect(toCookieHeader(set, "example.com", 1_000)).toBeNull();
  });
});
