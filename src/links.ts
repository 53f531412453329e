import { JSDOM } from "jsdom";
import {
  EXCLUDED_EXTENSIONS_REGEX,
  EXCLUDED_PATH_SEGMENTS,
} from "./constants";
import { hostOf, normalizeUrl } from "./utils";

export interface LinkScope {
  /** Normalized hosts (no `www.`) that links may point to. */
  allowedHosts: ReadonlySet<string>;
  /** Extra case-insensitive patterns on top of the built-in exclusions. */
  excludePatterns?: readonly RegExp[];
  isVisited: (url: string) => boolean;
  isAllowed: (url: string) => Promise<boolean>;
}

export function compileExcludePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => new RegExp(pattern, "i"));
}

export function isExcluded(
  url: string,
  extraPatterns: readonly RegExp[] = []
): boolean {
  const lower = url.toLowerCase();
  if (EXCLUDED_PATH_SEGMENTS.some((segment) => lower.includes(segment))) {
    return true;
  }
  if (EXCLUDED_EXTENSIONS_REGEX.test(url)) {
    return true;
  }
  return extraPatterns.some((pattern) => pattern.test(url));
}

export function resolveDocumentBaseUrl(document: Document, base: string): string {
  const baseHref = document.querySelector("base[href]")?.getAttribute("href");
  if (!baseHref) {
    return base;
  }
  try {
    return new URL(baseHref, base).toString();
  } catch {
    return base;
  }
}

/**
 * Candidate URLs in discovery order. Repeats within one page are left to the
 * frontier's visited check. Robots rules are consulted last so robots.txt is
 * only ever fetched for hosts inside the allow-list.
 */
export async function extractLinksFromDom(
  document: Document,
  baseUrl: string,
  scope: LinkScope
): Promise<string[]> {
  const baseForResolution = resolveDocumentBaseUrl(document, baseUrl);
  const results: string[] = [];

  for (const anchor of document.querySelectorAll("a[href]")) {
    const href = anchor.getAttribute("href");
    if (!href) {
      continue;
    }
    const normalized = normalizeUrl(href, baseForResolution);
    if (!normalized || scope.isVisited(normalized)) {
      continue;
    }
    if (isExcluded(normalized, scope.excludePatterns)) {
      continue;
    }
    const host = hostOf(normalized);
    if (!(host && scope.allowedHosts.has(host))) {
      continue;
    }
    if (!(await scope.isAllowed(normalized))) {
      continue;
    }
    results.push(normalized);
  }

  return results;
}

export async function extractLinks(
  html: string,
  baseUrl: string,
  scope: LinkScope
): Promise<string[]> {
  const dom = new JSDOM(html, { url: baseUrl });
  try {
    return await extractLinksFromDom(dom.window.document, baseUrl, scope);
  } finally {
    dom.window.close();
  }
}
