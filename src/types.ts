export type OutputMode = "text" | "markdown";

export type ContentScope = "body" | "article";

export type NoiseProfile = "default" | "extended";

export interface CrawlOptions {
  seed: string;
  outDir: string;
  renderSettleMs: number;
  scrollSettleMs: number;
  delayMs: number;
  maxPages: number;
  maxDepth: number;
  respectRobots: boolean;
  concurrency: number;
  noiseTags: string[];
  outputMode: OutputMode;
  contentScope: ContentScope;
  includeHtml: boolean;
  allowedDomains: string[];
  excludePatterns: string[];
  navigationTimeoutMs: number;
  robotsTimeoutMs: number;
  renderRetries: number;
  retryBackoffMs: number;
  checkpointInterval: number;
  userAgent: string;
  verbose: boolean;
  progress: boolean;
}

export interface CrawlTask {
  readonly url: string;
  readonly depth: number;
}

export interface PageRecord {
  readonly url: string;
  readonly title: string;
  readonly content: string;
  readonly timestamp: string;
  readonly html?: string;
}

export interface CrawlReport {
  domain: string;
  crawlDate: string;
  totalPages: number;
  pages: PageRecord[];
}

export interface RobotsPolicy {
  canFetch: (agent: string, pathname: string) => boolean;
  crawlDelayMs: (agent: string) => number | undefined;
  source: string;
}

export interface HostState {
  lastAccessMs?: number;
  robotsPolicy?: RobotsPolicy;
  effectiveDelayMs: number;
}

export type CrawlState = "idle" | "running" | "draining" | "finalized";

export type StopReason = "exhausted" | "max-pages" | "interrupted" | "error";

export interface CrawlResult {
  pages: PageRecord[];
  stopReason: StopReason;
  reportPath?: string;
  error?: unknown;
}
