import { CLI_DEFAULTS, DEFAULT_OPTIONS, NOISE_TAG_PROFILES } from "./constants";
import { logger } from "./logger";
import type { ContentScope, CrawlOptions, NoiseProfile, OutputMode } from "./types";
import {
  parseNonNegativeInt,
  parsePositiveInt,
  parseSecondsToMs,
  seedToUrl,
} from "./utils";

export type ParseResult =
  | { command: "crawl"; options: CrawlOptions; showHelp: boolean }
  | { command: "version" };

const OUTPUT_MODES: readonly OutputMode[] = ["text", "markdown"];
const CONTENT_SCOPES: readonly ContentScope[] = ["body", "article"];
const NOISE_PROFILES: readonly NoiseProfile[] = ["default", "extended"];

export function printHelp(): void {
  const lines = [
    "Usage:",
    "  sitecrawl <domain|url> [options]",
    "",
    "Options:",
    "  --render-time <s>        Seconds to let page scripts run after load (default 3)",
    "  --scroll-time <s>        Seconds to wait after scrolling to the bottom (default 1)",
    "  --delay <s>              Minimum seconds between requests to one host (default 1)",
    "  --max-pages <n>          Maximum pages to capture (default 50)",
    "  --max-depth <n>          Maximum link depth from the seed (default 2)",
    "  --output-dir <path>      Where reports are written (default crawled_data)",
    "  --respect-robots         Honor robots.txt rules and Crawl-delay",
    "  --ignore-robots          Ignore robots.txt (default for the command line)",
    "  --renderers <n>          Headless browser sessions, also the worker count (default 1)",
    "  --noise-profile <name>   Tags to strip: default | extended",
    "  --noise-tags <a,b,...>   Explicit list of tags to strip",
    "  --format <mode>          Page content as text | markdown (default text)",
    "  --scope <scope>          body | article (main article only)",
    "  --allow-domain <host>    Also follow links to this host (repeatable)",
    "  --exclude <regex>        Skip URLs matching this pattern (repeatable)",
    "  --retries <n>            Extra render attempts per page (default 0)",
    "  --timeout <ms>           Navigation timeout (default 30000)",
    "  --no-html                Leave raw HTML out of the report",
    "  --verbose                Verbose logging",
    "  --no-progress            Hide the progress bar",
    "  --version                Print the version",
    "  --help                   Show this help",
    "",
    "Examples:",
    "  sitecrawl example.com",
    "  sitecrawl https://example.com/docs --max-depth 1 --format markdown",
  ];
  console.info(lines.join("\n"));
}

function pickOne<T extends string>(
  raw: string | undefined,
  allowed: readonly T[],
  flag: string
): T {
  const match = allowed.find((value) => value === raw?.toLowerCase());
  if (!match) {
    throw new Error(`${flag} expects one of: ${allowed.join(", ")}`);
  }
  return match;
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}

export function parseArgs(args: string[]): ParseResult {
  const opts: CrawlOptions = {
    ...DEFAULT_OPTIONS,
    ...CLI_DEFAULTS,
    seed: "",
    noiseTags: [...DEFAULT_OPTIONS.noiseTags],
    allowedDomains: [],
    excludePatterns: [],
  };

  const iterator = args[Symbol.iterator]();
  const positionalArgs: string[] = [];
  let showHelp = false;
  let showVersion = false;

  const consumeNext = (valueFromEq: string | undefined): string | undefined => {
    if (valueFromEq !== undefined) {
      return valueFromEq;
    }
    const next = iterator.next();
    return next.done ? undefined : next.value;
  };

  const handlers: Record<string, (valueFromEq: string | undefined) => void> = {
    "--render-time": (valueFromEq) => {
      opts.renderSettleMs = parseSecondsToMs(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.renderSettleMs
      );
    },
    "--scroll-time": (valueFromEq) => {
      opts.scrollSettleMs = parseSecondsToMs(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.scrollSettleMs
      );
    },
    "--delay": (valueFromEq) => {
      opts.delayMs = parseSecondsToMs(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.delayMs
      );
    },
    "--max-pages": (valueFromEq) => {
      opts.maxPages = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.maxPages
      );
    },
    "--max-depth": (valueFromEq) => {
      opts.maxDepth = parseNonNegativeInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.maxDepth
      );
    },
    "--output-dir": (valueFromEq) => {
      opts.outDir = consumeNext(valueFromEq) || DEFAULT_OPTIONS.outDir;
    },
    "--respect-robots": () => {
      opts.respectRobots = true;
    },
    "--ignore-robots": () => {
      opts.respectRobots = false;
    },
    "--renderers": (valueFromEq) => {
      opts.concurrency = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.concurrency
      );
    },
    "--noise-profile": (valueFromEq) => {
      const profile = pickOne(
        consumeNext(valueFromEq),
        NOISE_PROFILES,
        "--noise-profile"
      );
      opts.noiseTags = [...NOISE_TAG_PROFILES[profile]];
    },
    "--noise-tags": (valueFromEq) => {
      opts.noiseTags = splitList(consumeNext(valueFromEq));
    },
    "--format": (valueFromEq) => {
      opts.outputMode = pickOne(consumeNext(valueFromEq), OUTPUT_MODES, "--format");
    },
    "--scope": (valueFromEq) => {
      opts.contentScope = pickOne(
        consumeNext(valueFromEq),
        CONTENT_SCOPES,
        "--scope"
      );
    },
    "--allow-domain": (valueFromEq) => {
      opts.allowedDomains.push(...splitList(consumeNext(valueFromEq)));
    },
    "--exclude": (valueFromEq) => {
      const pattern = consumeNext(valueFromEq);
      if (!pattern) {
        throw new Error("--exclude expects a regular expression");
      }
      try {
        new RegExp(pattern, "i");
      } catch {
        throw new Error(`--exclude pattern is not a valid regex: ${pattern}`);
      }
      opts.excludePatterns.push(pattern);
    },
    "--retries": (valueFromEq) => {
      opts.renderRetries = parseNonNegativeInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.renderRetries
      );
    },
    "--timeout": (valueFromEq) => {
      opts.navigationTimeoutMs = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.navigationTimeoutMs
      );
    },
    "--no-html": () => {
      opts.includeHtml = false;
    },
    "--verbose": () => {
      opts.verbose = true;
    },
    "--no-progress": () => {
      opts.progress = false;
    },
    "--version": () => {
      showVersion = true;
    },
    "--help": () => {
      showHelp = true;
    },
  };

  for (const arg of iterator) {
    const eqIndex = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eqIndex >= 0 ? arg.slice(0, eqIndex) : arg;
    const valueFromEq = eqIndex >= 0 ? arg.slice(eqIndex + 1) : undefined;
    const handler = handlers[flag];
    if (handler) {
      handler(valueFromEq);
    } else if (flag.startsWith("--")) {
      throw new Error(`Unknown option ${flag}`);
    } else {
      positionalArgs.push(arg);
    }
  }

  if (showVersion) {
    return { command: "version" };
  }

  const [seed, ...extras] = positionalArgs;
  if (!seed) {
    return { command: "crawl", options: opts, showHelp: true };
  }
  if (!seedToUrl(seed)) {
    throw new Error(`"${seed}" is not a valid domain or URL`);
  }
  if (extras.length > 0) {
    logger.warn(`Ignoring extra positional arguments: ${extras.join(", ")}`);
  }
  opts.seed = seed;

  return { command: "crawl", options: opts, showHelp };
}
