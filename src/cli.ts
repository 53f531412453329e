#!/usr/bin/env tsx
import { parseArgs, printHelp } from "./args";
import { createCrawler, type Crawler } from "./crawler";
import { describeError } from "./errors";
import { logger } from "./logger";
import { isMainModule, packageVersion } from "./runtime";
import type { CrawlResult } from "./types";

const argv = process.argv.slice(2);

const INTERRUPT_EXIT_CODE = 130;

/**
 * First SIGINT/SIGTERM asks the crawler to drain and write its report; a
 * second one exits immediately.
 */
function installSignalHandlers(crawler: Crawler): () => void {
  let interrupts = 0;
  const onSignal = (signal: NodeJS.Signals): void => {
    interrupts += 1;
    if (interrupts > 1) {
      logger.error(`Received ${signal} again; exiting without a final report`);
      process.exit(INTERRUPT_EXIT_CODE);
    }
    logger.warn(`Received ${signal}; saving progress (press again to abort)`);
    crawler.stop();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };
}

function reportOutcome(result: CrawlResult): void {
  if (result.stopReason === "error") {
    logger.error(
      `Crawl aborted after ${result.pages.length} page(s): ${describeError(result.error)}`
    );
    process.exitCode = 1;
    return;
  }
  const where = result.reportPath ? ` (${result.reportPath})` : "";
  logger.success(
    `Crawl ${result.stopReason}: ${result.pages.length} page(s) saved${where}`
  );
}

export async function main(): Promise<void> {
  try {
    const result = parseArgs(argv);

    if (result.command === "version") {
      console.log(packageVersion);
      return;
    }

    if (result.showHelp) {
      printHelp();
      return;
    }

    logger.configure({
      verbose: result.options.verbose,
      showProgress: result.options.progress,
    });

    const crawler = await createCrawler(result.options);
    const removeHandlers = installSignalHandlers(crawler);
    try {
      reportOutcome(await crawler.run());
    } finally {
      removeHandlers();
    }
  } catch (error) {
    logger.error(describeError(error));
    process.exitCode = 1;
  }
}

if (isMainModule(import.meta.url)) {
  void main();
}
