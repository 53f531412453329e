/**
 * Console logger with an optional single-line progress bar.
 *
 * Log lines go through console.* so they interleave cleanly with the
 * progress line, which is redrawn after every message on a TTY.
 */

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",

  clearLine: "\x1b[2K",
  cursorToStart: "\x1b[0G",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

interface LoggerConfig {
  verbose: boolean;
  showProgress: boolean;
  quiet: boolean;
}

interface ProgressState {
  current: number;
  total: number;
  currentUrl: string;
  failures: number;
  startTime: number;
}

const PROGRESS_BAR_WIDTH = 30;
const MIN_TERMINAL_WIDTH = 80;

const levelStyles: Record<LogLevel, { color: string; prefix: string }> = {
  debug: { color: ANSI.gray, prefix: "DEBUG" },
  info: { color: ANSI.blue, prefix: "INFO" },
  success: { color: ANSI.green, prefix: "OK" },
  warn: { color: ANSI.yellow, prefix: "WARN" },
  error: { color: ANSI.red, prefix: "ERROR" },
};

class Logger {
  private config: LoggerConfig = {
    verbose: false,
    showProgress: true,
    quiet: false,
  };
  private progress: ProgressState | null = null;
  private lastProgressLine = "";
  private readonly isTerminal = process.stdout.isTTY ?? false;

  constructor() {
    // Interrupts are handled by the CLI so the crawl can drain; here we only
    // make sure the cursor comes back.
    process.on("exit", () => {
      if (this.isTerminal && this.progress) {
        process.stdout.write(ANSI.showCursor);
      }
    });
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  get verbose(): boolean {
    return this.config.verbose;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const style = levelStyles[level];
    const timestamp = this.config.verbose
      ? `${ANSI.dim}[${new Date().toISOString().slice(11, 23)}]${ANSI.reset} `
      : "";
    return `${timestamp}${style.color}${ANSI.bold}[${style.prefix}]${ANSI.reset} ${message}`;
  }

  private progressVisible(): boolean {
    return (
      this.progress !== null &&
      this.isTerminal &&
      this.config.showProgress &&
      !this.config.quiet
    );
  }

  private clearProgressLine(): void {
    if (this.isTerminal && this.lastProgressLine) {
      process.stdout.write(`${ANSI.cursorToStart}${ANSI.clearLine}`);
      this.lastProgressLine = "";
    }
  }

  private writeLog(level: LogLevel, message: string): void {
    if (this.config.quiet && level !== "warn" && level !== "error") {
      return;
    }
    this.clearProgressLine();
    const formatted = this.formatMessage(level, message);

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.info(formatted);
    }

    this.renderProgress();
  }

  debug(message: string): void {
    if (this.config.verbose) {
      this.writeLog("debug", message);
    }
  }

  info(message: string): void {
    this.writeLog("info", message);
  }

  success(message: string): void {
    this.writeLog("success", message);
  }

  warn(message: string): void {
    this.writeLog("warn", message);
  }

  error(message: string): void {
    this.writeLog("error", message);
  }

  startProgress(total: number): void {
    this.progress = {
      current: 0,
      total,
      currentUrl: "",
      failures: 0,
      startTime: Date.now(),
    };

    if (this.progressVisible()) {
      process.stdout.write(ANSI.hideCursor);
    }
    this.renderProgress();
  }

  updateProgress(current: number, url: string, total?: number): void {
    if (!this.progress) {
      return;
    }
    this.progress.current = current;
    this.progress.currentUrl = url;
    if (total !== undefined) {
      this.progress.total = total;
    }
    this.renderProgress();
  }

  setProgressTotal(total: number): void {
    if (!this.progress) {
      return;
    }
    this.progress.total = total;
    this.renderProgress();
  }

  recordFailure(): void {
    if (!this.progress) {
      return;
    }
    this.progress.failures += 1;
    this.renderProgress();
  }

  endProgress(): void {
    const visible = this.progressVisible();
    this.clearProgressLine();
    if (visible) {
      process.stdout.write(ANSI.showCursor);
    }

    if (this.progress && !this.config.quiet) {
      const elapsed = this.formatDuration(Date.now() - this.progress.startTime);
      const { current, failures } = this.progress;
      const summary =
        failures > 0
          ? `${ANSI.green}${current} captured${ANSI.reset}, ${ANSI.red}${failures} failed${ANSI.reset}`
          : `${ANSI.green}${current} captured${ANSI.reset}`;
      console.info(
        `${ANSI.cyan}${ANSI.bold}[DONE]${ANSI.reset} Completed in ${ANSI.bold}${elapsed}${ANSI.reset} (${summary})`
      );
    }

    this.progress = null;
  }

  private renderProgress(): void {
    if (!(this.progress && this.progressVisible())) {
      return;
    }

    const { current, total, currentUrl, failures } = this.progress;
    const ratio = total > 0 ? Math.min(1, current / total) : 0;
    const filled = Math.round(ratio * PROGRESS_BAR_WIDTH);
    const bar = `${ANSI.green}${"█".repeat(filled)}${ANSI.gray}${"░".repeat(PROGRESS_BAR_WIDTH - filled)}${ANSI.reset}`;
    const failureText =
      failures > 0 ? ` ${ANSI.red}(${failures} failed)${ANSI.reset}` : "";
    const elapsed = this.formatDuration(Date.now() - this.progress.startTime);

    const termWidth = process.stdout.columns ?? MIN_TERMINAL_WIDTH;
    const displayUrl = this.truncateUrl(
      currentUrl,
      Math.max(20, termWidth - 60)
    );

    const progressLine = `${ANSI.cursorToStart}${ANSI.clearLine}${bar} ${ANSI.bold}${Math.round(ratio * 100)}%${ANSI.reset} ${ANSI.dim}(${current}/${total})${ANSI.reset}${failureText} ${ANSI.dim}${elapsed}${ANSI.reset} ${ANSI.cyan}${displayUrl}${ANSI.reset}`;

    this.lastProgressLine = progressLine;
    process.stdout.write(progressLine);
  }

  private truncateUrl(url: string, maxLength: number): string {
    if (!url || url.length <= maxLength) {
      return url;
    }
    try {
      const parsed = new URL(url);
      const path = parsed.pathname + parsed.search;
      if (path.length > maxLength - 3) {
        return `...${path.slice(-(maxLength - 3))}`;
      }
      return `${`${parsed.hostname}${path}`.slice(0, maxLength - 3)}...`;
    } catch {
      return `${url.slice(0, maxLength - 3)}...`;
    }
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) {
      return `${Math.round(ms)}ms`;
    }
    const seconds = Math.floor(ms / 1000);
    if (seconds < 60) {
      return `${seconds}s`;
    }
    return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  }

  logFetch(url: string): void {
    this.debug(`Fetching ${url}`);
  }

  logRender(url: string, slotId: number, attempt: number): void {
    this.debug(`Rendering ${url} on renderer #${slotId} (attempt ${attempt})`);
  }

  logPageCaptured(url: string, depth: number, count: number): void {
    this.success(
      `Captured ${ANSI.cyan}${url}${ANSI.reset} ${ANSI.dim}(depth ${depth}, page ${count})${ANSI.reset}`
    );
  }

  logBlocked(url: string, reason: string): void {
    this.debug(`Blocked ${url} (${reason})`);
  }

  logSkipped(message: string): void {
    this.debug(`Skipped: ${message}`);
  }

  logFallback(message: string): void {
    this.debug(`Fallback: ${message}`);
  }

  printFailureSummary(failures: string[]): void {
    if (failures.length === 0 || this.config.quiet) {
      return;
    }
    console.warn(
      `\n${ANSI.yellow}${ANSI.bold}Failures (${failures.length}):${ANSI.reset}`
    );
    for (const failure of failures) {
      console.warn(`  ${ANSI.dim}•${ANSI.reset} ${failure}`);
    }
  }

  logCrawlStart(seedUrl: string, config: Record<string, unknown>): void {
    if (!this.config.verbose) {
      return;
    }
    console.info(`\n${ANSI.cyan}${ANSI.bold}Crawl Configuration:${ANSI.reset}`);
    console.info(`  ${ANSI.dim}Seed:${ANSI.reset} ${seedUrl}`);
    for (const [key, value] of Object.entries(config)) {
      console.info(`  ${ANSI.dim}${key}:${ANSI.reset} ${String(value)}`);
    }
    console.info("");
  }
}

export const logger = new Logger();
