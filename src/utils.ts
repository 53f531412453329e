import { mkdir } from "node:fs/promises";

const LEADING_WWW_REGEX = /^(?:www\.)+/i;
const UNSUPPORTED_SCHEME_REGEX = /^\s*(mailto|tel):/i;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
}

export function parsePositiveInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function parseNonNegativeInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

/** Parses a duration in (possibly fractional) seconds into milliseconds. */
export function parseSecondsToMs(
  raw: string | undefined,
  fallbackMs: number
): number {
  if (!raw) {
    return fallbackMs;
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) && value >= 0
    ? Math.round(value * 1000)
    : fallbackMs;
}

export function sanitizeSegment(segment: string): string {
  const clean = segment.replace(/[^a-z0-9.-]+/gi, "_").replace(/^_+|_+$/g, "");
  return clean.length > 0 ? clean.toLowerCase() : "site";
}

/** Lowercase, punycoded (as URL parsing yields it) and without `www.`. */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().toLowerCase();
  let hostname = trimmed;
  try {
    hostname = new URL(`https://${trimmed}`).hostname;
  } catch {
    // Not a parsable host; compare it as given.
  }
  return hostname.replace(LEADING_WWW_REGEX, "");
}

/**
 * Canonical form used for every frontier and visited-set comparison:
 * https scheme, no `www.`, no fragment, single-slash path without a
 * trailing slash, query kept as parsed. Returns null for anything that
 * cannot be crawled.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  if (!url || url.trim().length === 0 || UNSUPPORTED_SCHEME_REGEX.test(url)) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = baseUrl ? new URL(url.trim(), baseUrl) : new URL(url.trim());
  } catch {
    return null;
  }

  if (!parsed.protocol || !parsed.hostname) {
    return null;
  }

  const host = normalizeHost(parsed.hostname);
  if (!host) {
    return null;
  }
  const port = parsed.port && parsed.port !== "443" ? `:${parsed.port}` : "";
  const segments = parsed.pathname.split("/").filter(Boolean);
  const pathname = `/${segments.join("/")}`;

  return `https://${host}${port}${pathname}${parsed.search}`;
}

/** Host of an already-normalized (or normalizable) URL, or null. */
export function hostOf(url: string): string | null {
  const normalized = normalizeUrl(url);
  if (!normalized) {
    return null;
  }
  return new URL(normalized).host;
}

/**
 * Turns a bare domain (`example.com`) or a full URL into the crawl seed.
 */
export function seedToUrl(seed: string): string | null {
  const trimmed = seed.trim();
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;
  return normalizeUrl(candidate);
}

export function formatStamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return [
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`,
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`,
  ].join("_");
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}
