import { writeFile } from "node:fs/promises";
import path from "node:path";
import { OutputDirectoryError } from "./errors";
import { logger } from "./logger";
import type { CrawlReport, PageRecord } from "./types";
import { ensureDir, formatStamp, sanitizeSegment } from "./utils";

export interface PersistenceSink {
  /** Intermediate dump: the bare pages array, no report wrapper. */
  writeCheckpoint(pages: readonly PageRecord[]): Promise<string>;
  writeReport(report: CrawlReport): Promise<string>;
}

export async function ensureOutputDir(dir: string): Promise<void> {
  try {
    await ensureDir(dir);
  } catch (error) {
    throw new OutputDirectoryError(dir, { cause: error });
  }
}

export function buildReportFileName(domain: string, date: Date): string {
  return `crawl_${sanitizeSegment(domain)}_${formatStamp(date)}.json`;
}

export function buildCheckpointFileName(date: Date, pageCount: number): string {
  return `crawl_intermediate_${formatStamp(date)}_${pageCount}.json`;
}

export class JsonFileSink implements PersistenceSink {
  constructor(
    private readonly outDir: string,
    private readonly domain: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async writeCheckpoint(pages: readonly PageRecord[]): Promise<string> {
    const filePath = path.join(
      this.outDir,
      buildCheckpointFileName(this.clock(), pages.length)
    );
    await writeFile(filePath, JSON.stringify(pages, null, 2), "utf8");
    logger.info(`Checkpoint with ${pages.length} page(s) saved to ${filePath}`);
    return filePath;
  }

  async writeReport(report: CrawlReport): Promise<string> {
    const filePath = path.join(
      this.outDir,
      buildReportFileName(this.domain, this.clock())
    );
    await writeFile(filePath, JSON.stringify(report, null, 2), "utf8");
    logger.info(
      `Crawl finished with ${report.totalPages} page(s); report saved to ${filePath}`
    );
    return filePath;
  }
}
