import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import { DEFAULT_OPTIONS, NOISE_TAG_PROFILES, turndownService } from "./constants";
import { describeError } from "./errors";
import { logger } from "./logger";
import type { ContentScope, OutputMode, PageRecord } from "./types";

const TEXT_NODE = 3;

export interface ContentOptions {
  outputMode: OutputMode;
  noiseTags: readonly string[];
  contentScope: ContentScope;
  includeHtml: boolean;
}

export const DEFAULT_CONTENT_OPTIONS: ContentOptions = {
  outputMode: DEFAULT_OPTIONS.outputMode,
  noiseTags: NOISE_TAG_PROFILES.default,
  contentScope: DEFAULT_OPTIONS.contentScope,
  includeHtml: DEFAULT_OPTIONS.includeHtml,
};

/**
 * Collapses blank-line runs to a single newline and space runs to a single
 * space, then trims both ends.
 */
export function normalizeWhitespace(value: string): string {
  return value
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t\f\v\u00a0]+/g, " ")
    .replace(/ ?\n ?/g, "\n")
    .replace(/\n{2,}/g, "\n")
    .trim();
}

export function removeNoise(document: Document, tags: readonly string[]): void {
  for (const tag of tags) {
    // Tag names are matched literally, never parsed as selectors.
    for (const element of Array.from(document.getElementsByTagName(tag))) {
      element.remove();
    }
  }
}

function collectText(node: Node, parts: string[]): void {
  if (node.nodeType === TEXT_NODE) {
    const text = node.textContent;
    if (text && text.trim().length > 0) {
      parts.push(text);
    }
    return;
  }
  for (const child of Array.from(node.childNodes)) {
    collectText(child, parts);
  }
}

function toPlainText(root: Node): string {
  const parts: string[] = [];
  collectText(root, parts);
  return parts.join("\n");
}

function articleHtml(dom: JSDOM, url: string): string | null {
  // Readability mutates the document it reads, so give it its own copy.
  const copy = new JSDOM(dom.serialize(), { url });
  try {
    const article = new Readability(copy.window.document).parse();
    const content = article?.content;
    return content && content.trim().length > 0 ? content : null;
  } finally {
    copy.window.close();
  }
}

/**
 * Builds a PageRecord from rendered HTML. Malformed markup never throws; the
 * worst case is a record with empty content.
 */
export function extractContent(
  html: string,
  url: string,
  options: ContentOptions = DEFAULT_CONTENT_OPTIONS
): PageRecord {
  const timestamp = new Date().toISOString();
  const dom = new JSDOM(html, { url });
  try {
    const document = dom.window.document;
    removeNoise(document, options.noiseTags);
    const title = normalizeWhitespace(document.title);

    let rootHtml = document.body.innerHTML;
    let rootNode: Node = document.body;
    if (options.contentScope === "article") {
      const main = articleHtml(dom, url);
      if (main) {
        rootHtml = main;
        rootNode = JSDOM.fragment(main);
      } else {
        logger.logFallback(`No article detected on ${url}; using full body`);
      }
    }

    let content: string;
    if (options.outputMode === "markdown") {
      try {
        content = normalizeWhitespace(turndownService.turndown(rootHtml));
      } catch (error) {
        logger.logFallback(
          `Markup conversion failed on ${url} (${describeError(error)}); using plain text`
        );
        content = normalizeWhitespace(toPlainText(rootNode));
      }
    } else {
      content = normalizeWhitespace(toPlainText(rootNode));
    }

    return {
      url,
      title,
      content,
      timestamp,
      ...(options.includeHtml ? { html } : {}),
    };
  } finally {
    dom.window.close();
  }
}
