import type { Browser, Page } from "playwright";
import { describeError } from "./errors";
import { logger } from "./logger";

/** One JavaScript-capable browsing session. Every call may reject. */
export interface RendererSession {
  navigate(url: string): Promise<void>;
  executeScript(code: string): Promise<void>;
  currentDocumentSource(): Promise<string>;
  probeLiveness(): Promise<boolean>;
  terminate(): Promise<void>;
}

export interface RendererFactory {
  create(slotId: number, userAgent: string): Promise<RendererSession>;
}

const CHROMIUM_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-extensions",
];

class PlaywrightSession implements RendererSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  async navigate(url: string): Promise<void> {
    const response = await this.page.goto(url, {
      waitUntil: "domcontentloaded",
    });
    if (response && !response.ok()) {
      logger.debug(`Navigation to ${url} answered ${response.status()}`);
    }
  }

  async executeScript(code: string): Promise<void> {
    await this.page.evaluate(code);
  }

  async currentDocumentSource(): Promise<string> {
    return await this.page.content();
  }

  async probeLiveness(): Promise<boolean> {
    if (!this.browser.isConnected() || this.page.isClosed()) {
      return false;
    }
    try {
      await this.page.title();
      return true;
    } catch (error) {
      logger.debug(`Liveness probe failed: ${describeError(error)}`);
      return false;
    }
  }

  async terminate(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Headless Chromium through Playwright, one browser per slot. Playwright is
 * imported lazily so a missing package or browser binary only surfaces as a
 * failed create().
 */
export function createPlaywrightFactory(options: {
  navigationTimeoutMs: number;
}): RendererFactory {
  return {
    async create(slotId: number, userAgent: string): Promise<RendererSession> {
      const { chromium } = await import("playwright");
      logger.debug(`Launching headless Chromium for renderer #${slotId}`);
      const browser = await chromium.launch({
        headless: true,
        args: CHROMIUM_ARGS,
      });
      try {
        const context = await browser.newContext({
          userAgent,
          viewport: { width: 1920, height: 1080 },
        });
        const page = await context.newPage();
        page.setDefaultNavigationTimeout(options.navigationTimeoutMs);
        await page.goto("about:blank");
        return new PlaywrightSession(browser, page);
      } catch (error) {
        await browser.close().catch((closeError: unknown) => {
          logger.debug(
            `Closing half-started renderer #${slotId} failed: ${describeError(closeError)}`
          );
        });
        throw error;
      }
    },
  };
}
