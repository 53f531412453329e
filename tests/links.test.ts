import { describe, expect, test, vi } from "vitest";
import {
  compileExcludePatterns,
  extractLinks,
  isExcluded,
  type LinkScope,
} from "../src/links";

function scopeFor(overrides: Partial<LinkScope> = {}): LinkScope {
  return {
    allowedHosts: new Set(["example.com"]),
    isVisited: () => false,
    isAllowed: async () => true,
    ...overrides,
  };
}

describe("isExcluded", () => {
  test("skips static assets and platform paths", () => {
    expect(isExcluded("https://example.com/logo.PNG")).toBe(true);
    expect(isExcluded("https://example.com/styles/site.css")).toBe(true);
    expect(isExcluded("https://example.com/wp-admin/options")).toBe(true);
    expect(isExcluded("https://example.com/cdn-cgi/l/email")).toBe(true);
    expect(isExcluded("https://example.com/docs/setup")).toBe(false);
  });

  test("applies extra patterns case-insensitively", () => {
    const patterns = compileExcludePatterns(["/private"]);
    expect(isExcluded("https://example.com/PRIVATE/page", patterns)).toBe(true);
    expect(isExcluded("https://example.com/public/page", patterns)).toBe(false);
  });
});

describe("extractLinks", () => {
  test("keeps same-site pages in discovery order", async () => {
    const html = `
      <a href="/about">About</a>
      <a href="https://www.example.com/contact/">Contact</a>
      <a href="https://other.org/x">External</a>
      <a href="/logo.png">Logo</a>
      <a href="/wp-admin/settings">Admin</a>
      <a href="mailto:team@example.com">Mail</a>
      <a href="#top">Top</a>
      <a href="/about#team">Team</a>
    `;
    const links = await extractLinks(html, "https://example.com/", scopeFor());
    expect(links).toEqual([
      "https://example.com/about",
      "https://example.com/contact",
      "https://example.com/",
      "https://example.com/about",
    ]);
  });

  test("drops visited and disallowed URLs without asking about foreign hosts", async () => {
    const isAllowed = vi.fn(
      async (url: string) => !url.includes("/blocked")
    );
    const html = `
      <a href="/seen">Seen</a>
      <a href="/blocked">Blocked</a>
      <a href="/fresh">Fresh</a>
      <a href="https://elsewhere.net/page">Elsewhere</a>
    `;
    const links = await extractLinks(
      html,
      "https://example.com/",
      scopeFor({
        isVisited: (url) => url === "https://example.com/seen",
        isAllowed,
      })
    );

    expect(links).toEqual(["https://example.com/fresh"]);
    expect(isAllowed).toHaveBeenCalledTimes(2);
    expect(isAllowed).not.toHaveBeenCalledWith("https://elsewhere.net/page");
  });

  test("follows extra allowed hosts", async () => {
    const html = `<a href="https://docs.example.com/start">Docs</a>`;
    const links = await extractLinks(
      html,
      "https://example.com/",
      scopeFor({ allowedHosts: new Set(["example.com", "docs.example.com"]) })
    );
    expect(links).toEqual(["https://docs.example.com/start"]);
  });

  test("resolves relative links against <base href>", async () => {
    const html = `
      <html><head><base href="https://example.com/docs/"></head>
      <body><a href="intro">Intro</a></body></html>
    `;
    const links = await extractLinks(html, "https://example.com/", scopeFor());
    expect(links).toEqual(["https://example.com/docs/intro"]);
  });

  test("applies user exclude patterns", async () => {
    const html = `<a href="/private/a">A</a><a href="/public/b">B</a>`;
    const links = await extractLinks(
      html,
      "https://example.com/",
      scopeFor({
        excludePatterns: compileExcludePatterns([
          "^https://example\\.com/private",
        ]),
      })
    );
    expect(links).toEqual(["https://example.com/public/b"]);
  });
});
