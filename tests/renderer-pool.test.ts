import { afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import { USER_AGENTS } from "../src/constants";
import { RendererUnavailableError, RenderFailureError } from "../src/errors";
import { logger } from "../src/logger";
import type { RendererFactory, RendererSession } from "../src/renderer";
import { RendererPool, type RendererPoolOptions } from "../src/renderer-pool";

class FakeSession implements RendererSession {
  alive = true;
  navigations: string[] = [];
  navigateFailures = 0;
  scrollFails = false;
  terminateFails = false;
  terminated = 0;
  private current = "";

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    if (this.navigateFailures > 0) {
      this.navigateFailures -= 1;
      throw new Error("navigation timed out");
    }
    this.current = url;
  }

  async executeScript(): Promise<void> {
    if (this.scrollFails) {
      throw new Error("scroll blocked");
    }
  }

  async currentDocumentSource(): Promise<string> {
    return `<html><body>${this.current}</body></html>`;
  }

  async probeLiveness(): Promise<boolean> {
    return this.alive;
  }

  async terminate(): Promise<void> {
    this.terminated += 1;
    if (this.terminateFails) {
      throw new Error("already gone");
    }
  }
}

class FakeFactory implements RendererFactory {
  readonly sessions: FakeSession[] = [];
  readonly calls: Array<{ slotId: number; userAgent: string }> = [];
  failFrom = Number.POSITIVE_INFINITY;

  async create(slotId: number, userAgent: string): Promise<RendererSession> {
    this.calls.push({ slotId, userAgent });
    if (this.calls.length >= this.failFrom) {
      throw new Error("chromium missing");
    }
    const session = new FakeSession();
    this.sessions.push(session);
    return session;
  }
}

const options: RendererPoolOptions = {
  concurrency: 1,
  renderSettleMs: 0,
  scrollSettleMs: 0,
  renderRetries: 0,
  retryBackoffMs: 0,
};

beforeAll(() => {
  logger.configure({ quiet: true, showProgress: false });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RendererPool", () => {
  test("renders a page on a live slot", async () => {
    const factory = new FakeFactory();
    const pool = await RendererPool.create(options, factory);

    const outcome = await pool.fetch("https://example.com/");

    expect(outcome).toEqual({
      ok: true,
      html: "<html><body>https://example.com/</body></html>",
      slotId: 1,
    });
    expect(factory.sessions[0]?.navigations).toEqual(["https://example.com/"]);
  });

  test("rotates user agents across slots", async () => {
    const factory = new FakeFactory();
    const pool = await RendererPool.create({ ...options, concurrency: 2 }, factory);

    expect(factory.calls).toEqual([
      { slotId: 1, userAgent: USER_AGENTS[0] },
      { slotId: 2, userAgent: USER_AGENTS[1] },
    ]);
    expect(pool.liveCount).toBe(2);
  });

  test("parallel fetches use different slots", async () => {
    const pool = await RendererPool.create(
      { ...options, concurrency: 2 },
      new FakeFactory()
    );

    const outcomes = await Promise.all([
      pool.fetch("https://example.com/a"),
      pool.fetch("https://example.com/b"),
    ]);

    const slotIds = outcomes.map((outcome) => (outcome.ok ? outcome.slotId : 0));
    expect(slotIds.sort()).toEqual([1, 2]);
  });

  test("a single slot is checked out exclusively", async () => {
    const factory = new FakeFactory();
    const pool = await RendererPool.create(options, factory);

    const outcomes = await Promise.all([
      pool.fetch("https://example.com/a"),
      pool.fetch("https://example.com/b"),
    ]);

    expect(outcomes.map((outcome) => outcome.ok)).toEqual([true, true]);
    expect(factory.sessions[0]?.navigations).toEqual([
      "https://example.com/a",
      "https://example.com/b",
    ]);
  });

  test("reports no renderer when every slot failed to start", async () => {
    const factory = new FakeFactory();
    factory.failFrom = 1;
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => {});
    vi.spyOn(logger, "warn").mockImplementation(() => {});

    const pool = await RendererPool.create(options, factory);
    const outcome = await pool.fetch("https://example.com/");

    expect(pool.liveCount).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith(
      "Renderer #1 failed to start: chromium missing"
    );
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(RendererUnavailableError);
      expect(outcome.error.message).toBe(
        "No renderer available for https://example.com/"
      );
    }
  });

  test("replaces a session that stopped responding", async () => {
    const factory = new FakeFactory();
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    const pool = await RendererPool.create(options, factory);
    const first = factory.sessions[0];
    if (first) {
      first.alive = false;
    }

    const outcome = await pool.fetch("https://example.com/");

    expect(outcome.ok).toBe(true);
    expect(factory.calls).toHaveLength(2);
    expect(first?.terminated).toBe(1);
    expect(factory.sessions[1]?.navigations).toEqual(["https://example.com/"]);
    expect(pool.describe()[0]?.state).toBe("live");
  });

  test("retires a slot whose replacement fails", async () => {
    const factory = new FakeFactory();
    factory.failFrom = 2;
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const pool = await RendererPool.create(options, factory);
    const first = factory.sessions[0];
    if (first) {
      first.alive = false;
    }

    const outcome = await pool.fetch("https://example.com/");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(RendererUnavailableError);
    }
    expect(pool.describe()[0]?.state).toBe("removed");
    expect(pool.liveCount).toBe(0);
  });

  test("a failed scroll does not fail the page", async () => {
    const factory = new FakeFactory();
    const pool = await RendererPool.create(options, factory);
    const session = factory.sessions[0];
    if (session) {
      session.scrollFails = true;
    }

    const outcome = await pool.fetch("https://example.com/long");
    expect(outcome.ok).toBe(true);
  });

  test("navigation errors become RenderFailureError", async () => {
    const factory = new FakeFactory();
    const pool = await RendererPool.create(options, factory);
    const session = factory.sessions[0];
    if (session) {
      session.navigateFailures = 1;
    }

    const outcome = await pool.fetch("https://example.com/");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(RenderFailureError);
      expect(outcome.error.message).toBe(
        "Renderer #1 failed on https://example.com/: navigation timed out"
      );
    }
    // The slot stays usable for the next page.
    expect((await pool.fetch("https://example.com/next")).ok).toBe(true);
  });

  test("retries a failed render when configured", async () => {
    const factory = new FakeFactory();
    const pool = await RendererPool.create(
      { ...options, renderRetries: 1 },
      factory
    );
    const session = factory.sessions[0];
    if (session) {
      session.navigateFailures = 1;
    }

    const outcome = await pool.fetch("https://example.com/");

    expect(outcome.ok).toBe(true);
    expect(session?.navigations).toEqual([
      "https://example.com/",
      "https://example.com/",
    ]);
  });

  test("close terminates each session once and logs teardown failures", async () => {
    const factory = new FakeFactory();
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const pool = await RendererPool.create(options, factory);
    const session = factory.sessions[0];
    if (session) {
      session.terminateFails = true;
    }

    await pool.close();
    await pool.close();

    expect(session?.terminated).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      "Renderer #1 did not shut down cleanly: already gone"
    );
    const after = await pool.fetch("https://example.com/");
    expect(after.ok).toBe(false);
  });
});
