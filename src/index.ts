export { parseArgs, printHelp, type ParseResult } from "./args";
export { CLI_DEFAULTS, DEFAULT_OPTIONS, NOISE_TAG_PROFILES } from "./constants";
export {
  DEFAULT_CONTENT_OPTIONS,
  extractContent,
  normalizeWhitespace,
  type ContentOptions,
} from "./content";
export {
  Crawler,
  createCrawler,
  type CrawlerDeps,
  type CrawlerOverrides,
  type PageFetcher,
  type Politeness,
} from "./crawler";
export {
  CrawlError,
  describeError,
  OutputDirectoryError,
  PolicyFetchError,
  RenderFailureError,
  RendererUnavailableError,
  type CrawlErrorCode,
} from "./errors";
export { Frontier } from "./frontier";
export {
  buildCheckpointFileName,
  buildReportFileName,
  JsonFileSink,
  type PersistenceSink,
} from "./io";
export { extractLinks, isExcluded, type LinkScope } from "./links";
export { logger } from "./logger";
export { PolitenessController, type RobotsLoader } from "./politeness";
export {
  createPlaywrightFactory,
  type RendererFactory,
  type RendererSession,
} from "./renderer";
export { RendererPool, type RenderOutcome } from "./renderer-pool";
export { loadRobotsPolicy, parseRobotsTxt } from "./robots";
export type * from "./types";
export { normalizeHost, normalizeUrl, seedToUrl } from "./utils";
