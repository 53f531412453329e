import { SCROLL_TO_BOTTOM_SCRIPT, USER_AGENTS } from "./constants";
import {
  describeError,
  RendererUnavailableError,
  RenderFailureError,
} from "./errors";
import { logger } from "./logger";
import type { RendererFactory, RendererSession } from "./renderer";
import { sleep } from "./utils";

export type SlotState = "live" | "dead" | "recreating" | "removed";

interface RendererSlot {
  readonly id: number;
  readonly userAgent: string;
  state: SlotState;
  busy: boolean;
  session?: RendererSession;
}

export interface SlotSnapshot {
  id: number;
  userAgent: string;
  state: SlotState;
  busy: boolean;
}

export type RenderOutcome =
  | { ok: true; html: string; slotId: number }
  | { ok: false; error: RendererUnavailableError | RenderFailureError };

export interface RendererPoolOptions {
  concurrency: number;
  renderSettleMs: number;
  scrollSettleMs: number;
  renderRetries: number;
  retryBackoffMs: number;
  userAgents?: readonly string[];
}

/**
 * Fixed set of renderer slots. A slot is checked out exclusively, probed
 * before use and replaced when the probe fails; a slot whose replacement
 * also fails stays empty for the rest of the run.
 */
export class RendererPool {
  private readonly waiters: Array<() => void> = [];
  private closed = false;

  private constructor(
    private readonly options: RendererPoolOptions,
    private readonly factory: RendererFactory,
    private readonly slots: RendererSlot[]
  ) {}

  static async create(
    options: RendererPoolOptions,
    factory: RendererFactory
  ): Promise<RendererPool> {
    const agents =
      options.userAgents && options.userAgents.length > 0
        ? options.userAgents
        : USER_AGENTS;
    const slots: RendererSlot[] = [];

    for (let index = 0; index < options.concurrency; index += 1) {
      const slot: RendererSlot = {
        id: index + 1,
        userAgent: agents[index % agents.length] ?? USER_AGENTS[0],
        state: "removed",
        busy: false,
      };
      try {
        slot.session = await factory.create(slot.id, slot.userAgent);
        slot.state = "live";
        logger.debug(`Renderer #${slot.id} started`);
      } catch (error) {
        logger.error(
          `Renderer #${slot.id} failed to start: ${describeError(error)}`
        );
      }
      slots.push(slot);
    }

    const pool = new RendererPool(options, factory, slots);
    if (pool.liveCount === 0) {
      logger.warn(
        "No renderer could be started (is a Playwright Chromium build installed?); pages cannot be fetched"
      );
    }
    return pool;
  }

  get liveCount(): number {
    return this.slots.filter((slot) => slot.state === "live").length;
  }

  describe(): SlotSnapshot[] {
    return this.slots.map(({ id, userAgent, state, busy }) => ({
      id,
      userAgent,
      state,
      busy,
    }));
  }

  async fetch(url: string): Promise<RenderOutcome> {
    const attempts = this.options.renderRetries + 1;
    let lastFailure: RenderFailureError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const slot = await this.acquire();
      if (!slot) {
        return { ok: false, error: new RendererUnavailableError(url) };
      }
      try {
        logger.logRender(url, slot.id, attempt);
        const html = await this.render(slot, url);
        return { ok: true, html, slotId: slot.id };
      } catch (error) {
        lastFailure = new RenderFailureError(url, slot.id, { cause: error });
        logger.debug(lastFailure.message);
      } finally {
        this.release(slot);
      }
      if (attempt < attempts) {
        await sleep(this.options.retryBackoffMs * attempt);
      }
    }

    return {
      ok: false,
      error: lastFailure ?? new RendererUnavailableError(url),
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.wakeWaiters();

    const open = this.slots.filter((slot) => slot.session);
    if (open.length > 0) {
      logger.debug(`Closing ${open.length} renderer(s)`);
    }
    for (const slot of open) {
      try {
        await slot.session?.terminate();
      } catch (error) {
        logger.warn(
          `Renderer #${slot.id} did not shut down cleanly: ${describeError(error)}`
        );
      }
      slot.session = undefined;
      slot.state = "removed";
    }
  }

  private async render(slot: RendererSlot, url: string): Promise<string> {
    const session = slot.session;
    if (!session) {
      throw new Error(`Renderer #${slot.id} has no session`);
    }
    await session.navigate(url);
    await sleep(this.options.renderSettleMs);
    try {
      await session.executeScript(SCROLL_TO_BOTTOM_SCRIPT);
      await sleep(this.options.scrollSettleMs);
    } catch (error) {
      logger.debug(`Scroll on ${url} failed: ${describeError(error)}`);
    }
    return await session.currentDocumentSource();
  }

  private async acquire(): Promise<RendererSlot | null> {
    while (!this.closed) {
      for (const slot of this.slots) {
        if (slot.busy || slot.state === "removed") {
          continue;
        }
        slot.busy = true;
        if (await this.ensureLive(slot)) {
          return slot;
        }
        this.release(slot);
      }
      if (!this.slots.some((slot) => slot.busy)) {
        return null;
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
    return null;
  }

  private release(slot: RendererSlot): void {
    slot.busy = false;
    this.wakeWaiters();
  }

  private wakeWaiters(): void {
    for (const wake of this.waiters.splice(0)) {
      wake();
    }
  }

  private async ensureLive(slot: RendererSlot): Promise<boolean> {
    const session = slot.session;
    if (session && slot.state === "live") {
      let alive = false;
      try {
        alive = await session.probeLiveness();
      } catch (error) {
        logger.debug(
          `Renderer #${slot.id} probe threw: ${describeError(error)}`
        );
      }
      if (alive) {
        return true;
      }
      slot.state = "dead";
      logger.warn(`Renderer #${slot.id} stopped responding; replacing it`);
      try {
        await session.terminate();
      } catch (error) {
        logger.debug(
          `Terminating dead renderer #${slot.id} failed: ${describeError(error)}`
        );
      }
      slot.session = undefined;
    }

    slot.state = "recreating";
    try {
      slot.session = await this.factory.create(slot.id, slot.userAgent);
      slot.state = "live";
      logger.info(`Renderer #${slot.id} replaced`);
      return true;
    } catch (error) {
      slot.state = "removed";
      logger.error(
        `Renderer #${slot.id} could not be replaced and is retired: ${describeError(error)}`
      );
      return false;
    }
  }
}
