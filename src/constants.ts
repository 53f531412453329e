import TurndownService from "turndown";
import type { CrawlOptions, NoiseProfile } from "./types";

export const DEFAULT_OPTIONS: Omit<CrawlOptions, "seed"> = {
  outDir: "crawled_data",
  renderSettleMs: 3000,
  scrollSettleMs: 1000,
  delayMs: 1000,
  maxPages: 50,
  maxDepth: 2,
  respectRobots: true,
  concurrency: 1,
  noiseTags: ["script", "style", "meta", "link"],
  outputMode: "text",
  contentScope: "body",
  includeHtml: true,
  allowedDomains: [],
  excludePatterns: [],
  navigationTimeoutMs: 30_000,
  robotsTimeoutMs: 10_000,
  renderRetries: 0,
  retryBackoffMs: 2000,
  checkpointInterval: 10,
  userAgent: "sitecrawl/1.0",
  verbose: false,
  progress: true,
};

// The command line ignores robots.txt unless asked to honor it; library
// callers get DEFAULT_OPTIONS.respectRobots instead.
export const CLI_DEFAULTS: Pick<CrawlOptions, "respectRobots"> = {
  respectRobots: false,
};

export const NOISE_TAG_PROFILES: Record<NoiseProfile, readonly string[]> = {
  default: ["script", "style", "meta", "link"],
  extended: [
    "script",
    "style",
    "meta",
    "link",
    "img",
    "svg",
    "header",
    "footer",
    "nav",
  ],
};

export const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 13_6) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
] as const;

export const ROBOTS_AGENT = "*";

export const EXCLUDED_PATH_SEGMENTS = [
  "/cdn-cgi/",
  "/wp-admin/",
  "/wp-includes/",
  "/wp-content/uploads/",
] as const;

export const EXCLUDED_EXTENSIONS_REGEX =
  /\.(jpg|jpeg|gif|png|svg|css|js|ico|xml|pdf|zip|gz|rar)$/i;

export const SCROLL_TO_BOTTOM_SCRIPT =
  "window.scrollTo(0, document.body.scrollHeight);";

export const LINE_SPLIT_REGEX = /\r?\n/;

export const turndownService = new TurndownService({
  headingStyle: "atx",
  bulletListMarker: "-",
  codeBlockStyle: "fenced",
  emDelimiter: "*",
  strongDelimiter: "**",
});

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

turndownService.addRule("singleLineAnchors", {
  filter: "a",
  replacement(content, node): string {
    const href = node.getAttribute("href");
    const text = collapseWhitespace(node.textContent || content);
    if (!href || !text) {
      return text;
    }
    return `[${text}](${href})`;
  },
});

turndownService.addRule("compactListItems", {
  filter: "li",
  replacement(content, node): string {
    const parent = node.parentElement;
    let prefix = "- ";
    if (parent?.nodeName === "OL") {
      const start = Number.parseInt(parent.getAttribute("start") ?? "", 10);
      const index = Array.from(parent.children).indexOf(node);
      prefix = `${(Number.isFinite(start) ? start : 1) + index}. `;
    }
    const body = content
      .replace(/^\n+/, "")
      .replace(/\n+$/, "\n")
      .replace(/\n/gm, "\n  ");
    const needsBreak = node.nextSibling !== null && !body.endsWith("\n");
    return `${prefix}${body}${needsBreak ? "\n" : ""}`;
  },
});

turndownService.addRule("strikethrough", {
  filter: ["del", "s"],
  replacement(content): string {
    return `~~${content}~~`;
  },
});
