import { extractContent, type ContentOptions } from "./content";
import { describeError } from "./errors";
import { Frontier } from "./frontier";
import { ensureOutputDir, JsonFileSink, type PersistenceSink } from "./io";
import { compileExcludePatterns, extractLinks, type LinkScope } from "./links";
import { logger } from "./logger";
import { PolitenessController } from "./politeness";
import { createPlaywrightFactory, type RendererFactory } from "./renderer";
import { RendererPool } from "./renderer-pool";
import type {
  CrawlOptions,
  CrawlReport,
  CrawlResult,
  CrawlState,
  CrawlTask,
  PageRecord,
  StopReason,
} from "./types";
import { hostOf, normalizeHost, seedToUrl, sleep } from "./utils";

const IDLE_POLL_MS = 5;

export type PageFetcher = Pick<RendererPool, "fetch" | "close">;

export type Politeness = Pick<PolitenessController, "isAllowed" | "waitForSlot">;

export interface CrawlerDeps {
  fetcher: PageFetcher;
  politeness: Politeness;
  sink: PersistenceSink;
}

/**
 * Drives one crawl: idle → running → draining → finalized.
 *
 * `concurrency` workers share the frontier. Every exit path (frontier
 * exhausted, page cap, stop(), unexpected error) goes through drain(), which
 * writes the final report once and then closes the renderers.
 */
export class Crawler {
  private stateValue: CrawlState = "idle";
  private readonly frontier: Frontier;
  private readonly pages: PageRecord[] = [];
  private readonly failures: string[] = [];
  private readonly seedUrl: string;
  private readonly domain: string;
  private readonly scope: LinkScope;
  private readonly contentOptions: ContentOptions;
  private inFlight = 0;
  private stopRequested = false;
  private loopError: unknown;

  constructor(
    private readonly options: CrawlOptions,
    private readonly deps: CrawlerDeps
  ) {
    const seedUrl = seedToUrl(options.seed);
    const seedHost = seedUrl ? hostOf(seedUrl) : null;
    if (!(seedUrl && seedHost)) {
      throw new Error(`"${options.seed}" is not a crawlable domain or URL`);
    }
    this.seedUrl = seedUrl;
    this.domain = seedHost;

    this.frontier = new Frontier(options.maxDepth);
    this.frontier.push(seedUrl, 0);

    this.scope = {
      allowedHosts: new Set([
        seedHost,
        ...options.allowedDomains.map(normalizeHost).filter(Boolean),
      ]),
      excludePatterns: compileExcludePatterns(options.excludePatterns),
      isVisited: (url) => this.frontier.isVisited(url),
      isAllowed: (url) => deps.politeness.isAllowed(url),
    };
    this.contentOptions = {
      outputMode: options.outputMode,
      noiseTags: options.noiseTags,
      contentScope: options.contentScope,
      includeHtml: options.includeHtml,
    };
  }

  get state(): CrawlState {
    return this.stateValue;
  }

  get seed(): string {
    return this.seedUrl;
  }

  /** Ask the crawl to wind down; pages already rendering still finish. */
  stop(): void {
    if (this.stateValue !== "running" || this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    logger.info("Stop requested; finishing in-flight pages");
  }

  async run(): Promise<CrawlResult> {
    if (this.stateValue !== "idle") {
      throw new Error("A crawler can only be run once");
    }
    this.stateValue = "running";

    logger.logCrawlStart(this.seedUrl, {
      allowedHosts: [...this.scope.allowedHosts].join(", "),
      maxDepth: this.options.maxDepth,
      maxPages: this.options.maxPages,
      delay: `${this.options.delayMs}ms`,
      renderSettle: `${this.options.renderSettleMs}ms`,
      concurrency: this.options.concurrency,
      respectRobots: this.options.respectRobots,
      outputMode: this.options.outputMode,
    });
    logger.startProgress(Math.min(this.options.maxPages, 1));

    const workerCount = Math.max(
      1,
      Math.min(this.options.concurrency, this.options.maxPages)
    );
    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i += 1) {
      workers.push(this.worker());
    }
    await Promise.all(workers);

    return await this.drain();
  }

  private shouldContinue(): boolean {
    return !this.stopRequested && this.loopError === undefined;
  }

  private async worker(): Promise<void> {
    while (this.shouldContinue()) {
      if (this.pages.length >= this.options.maxPages) {
        return;
      }
      // Reserve page-cap room before taking work so parallel workers
      // cannot overshoot maxPages.
      if (this.pages.length + this.inFlight >= this.options.maxPages) {
        await sleep(IDLE_POLL_MS);
        continue;
      }

      const task = this.frontier.pop();
      if (!task) {
        if (this.inFlight === 0) {
          return;
        }
        await sleep(IDLE_POLL_MS);
        continue;
      }
      if (!this.frontier.markVisited(task.url)) {
        logger.logSkipped(`${task.url} already visited`);
        continue;
      }

      this.inFlight += 1;
      try {
        await this.processTask(task);
      } catch (error) {
        if (this.loopError === undefined) {
          this.loopError = error;
        }
        const detail =
          error instanceof Error && error.stack ? error.stack : String(error);
        logger.error(`Unexpected error while crawling ${task.url}:\n${detail}`);
      } finally {
        this.inFlight -= 1;
      }
    }
  }

  private async processTask(task: CrawlTask): Promise<void> {
    const { url, depth } = task;

    if (!(await this.deps.politeness.isAllowed(url))) {
      logger.logBlocked(url, "robots.txt");
      return;
    }
    await this.deps.politeness.waitForSlot(url);
    logger.updateProgress(this.pages.length, url);

    const outcome = await this.deps.fetcher.fetch(url);
    if (!outcome.ok) {
      this.failures.push(`${url}: ${outcome.error.message}`);
      logger.recordFailure();
      logger.warn(`Could not fetch ${url}: ${outcome.error.message}`);
      return;
    }

    const record = extractContent(outcome.html, url, this.contentOptions);
    this.pages.push(record);
    const count = this.pages.length;
    logger.logPageCaptured(url, depth, count);
    logger.updateProgress(count, url, this.progressTotal());

    if (count % this.options.checkpointInterval === 0) {
      await this.checkpoint();
    }

    if (depth < this.options.maxDepth && this.shouldContinue()) {
      const links = await extractLinks(outcome.html, url, this.scope);
      let added = 0;
      for (const link of links) {
        if (this.frontier.push(link, depth + 1)) {
          added += 1;
        }
      }
      logger.debug(`Queued ${added} link(s) from ${url}`);
      logger.setProgressTotal(this.progressTotal());
    }
  }

  private progressTotal(): number {
    return Math.min(
      this.options.maxPages,
      this.pages.length + this.inFlight + this.frontier.pendingCount
    );
  }

  private async checkpoint(): Promise<void> {
    try {
      await this.deps.sink.writeCheckpoint([...this.pages]);
    } catch (error) {
      logger.warn(`Checkpoint could not be written: ${describeError(error)}`);
    }
  }

  private stopReason(): StopReason {
    if (this.loopError !== undefined) {
      return "error";
    }
    if (this.stopRequested) {
      return "interrupted";
    }
    if (this.pages.length >= this.options.maxPages) {
      return "max-pages";
    }
    return "exhausted";
  }

  buildReport(): CrawlReport {
    return {
      domain: this.domain,
      crawlDate: new Date().toISOString(),
      totalPages: this.pages.length,
      pages: [...this.pages],
    };
  }

  private async drain(): Promise<CrawlResult> {
    this.stateValue = "draining";
    const stopReason = this.stopReason();
    const dropped = this.frontier.clear();
    if (dropped > 0) {
      logger.debug(`Discarding ${dropped} queued URL(s)`);
    }
    logger.endProgress();

    let reportPath: string | undefined;
    let error = this.loopError;
    try {
      reportPath = await this.deps.sink.writeReport(this.buildReport());
    } catch (writeError) {
      logger.error(
        `Final report could not be written: ${describeError(writeError)}`
      );
      error ??= writeError;
    } finally {
      try {
        await this.deps.fetcher.close();
      } catch (closeError) {
        logger.warn(`Renderer shutdown failed: ${describeError(closeError)}`);
      }
    }

    const skipped = this.frontier.visitedCount - this.pages.length;
    if (skipped > 0) {
      logger.debug(`${skipped} visited URL(s) produced no page`);
    }
    logger.printFailureSummary(this.failures);
    this.stateValue = "finalized";

    return {
      pages: [...this.pages],
      stopReason: error !== undefined ? "error" : stopReason,
      ...(reportPath ? { reportPath } : {}),
      ...(error !== undefined ? { error } : {}),
    };
  }
}

export interface CrawlerOverrides {
  factory?: RendererFactory;
  sink?: PersistenceSink;
  politeness?: Politeness;
}

/**
 * Wires the default collaborators: output directory, robots-aware
 * politeness, a Playwright renderer pool and a JSON file sink. Throws
 * OutputDirectoryError before anything is launched when the output
 * directory cannot be created.
 */
export async function createCrawler(
  options: CrawlOptions,
  overrides: CrawlerOverrides = {}
): Promise<Crawler> {
  const seedUrl = seedToUrl(options.seed);
  const domain = seedUrl ? hostOf(seedUrl) : null;
  if (!domain) {
    throw new Error(`"${options.seed}" is not a crawlable domain or URL`);
  }

  await ensureOutputDir(options.outDir);

  const politeness =
    overrides.politeness ??
    new PolitenessController({
      delayMs: options.delayMs,
      respectRobots: options.respectRobots,
      robotsTimeoutMs: options.robotsTimeoutMs,
      userAgent: options.userAgent,
    });
  const fetcher = await RendererPool.create(
    {
      concurrency: options.concurrency,
      renderSettleMs: options.renderSettleMs,
      scrollSettleMs: options.scrollSettleMs,
      renderRetries: options.renderRetries,
      retryBackoffMs: options.retryBackoffMs,
    },
    overrides.factory ??
      createPlaywrightFactory({
        navigationTimeoutMs: options.navigationTimeoutMs,
      })
  );
  const sink = overrides.sink ?? new JsonFileSink(options.outDir, domain);

  return new Crawler(options, { fetcher, politeness, sink });
}
