import { ROBOTS_AGENT } from "./constants";
import { describeError } from "./errors";
import { logger } from "./logger";
import { loadRobotsPolicy } from "./robots";
import type { HostState, RobotsPolicy } from "./types";
import { hostOf, sleep } from "./utils";

export type RobotsLoader = (host: string) => Promise<RobotsPolicy>;

export interface PolitenessOptions {
  delayMs: number;
  respectRobots: boolean;
  robotsTimeoutMs: number;
  userAgent: string;
}

export interface PolitenessDeps {
  loadRobots?: RobotsLoader;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Per-host request spacing and robots.txt enforcement.
 *
 * Each host gets at most one robots.txt load per run. waitForSlot calls for
 * the same host run one after another through a promise chain, so the
 * spacing holds no matter how many workers share the controller.
 */
export class PolitenessController {
  private readonly hosts = new Map<string, HostState>();
  private readonly policyLoads = new Map<
    string,
    Promise<RobotsPolicy | undefined>
  >();
  private readonly hostChains = new Map<string, Promise<void>>();
  private readonly loadRobots: RobotsLoader;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly options: PolitenessOptions,
    deps: PolitenessDeps = {}
  ) {
    this.loadRobots =
      deps.loadRobots ??
      ((host) =>
        loadRobotsPolicy(host, {
          timeoutMs: options.robotsTimeoutMs,
          userAgent: options.userAgent,
        }));
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
  }

  get enforcing(): boolean {
    return this.options.respectRobots;
  }

  hostState(host: string): HostState | undefined {
    return this.hosts.get(host);
  }

  async isAllowed(url: string): Promise<boolean> {
    if (!this.options.respectRobots) {
      return true;
    }
    const target = parseTarget(url);
    if (!target) {
      return false;
    }
    const policy = await this.policyFor(target.host);
    if (!policy) {
      return true;
    }
    return policy.canFetch(ROBOTS_AGENT, target.path);
  }

  async effectiveDelayMs(url: string): Promise<number> {
    const target = parseTarget(url);
    if (!(target && this.options.respectRobots)) {
      return this.options.delayMs;
    }
    const policy = await this.policyFor(target.host);
    return Math.max(
      this.options.delayMs,
      policy?.crawlDelayMs(ROBOTS_AGENT) ?? 0
    );
  }

  async waitForSlot(url: string): Promise<void> {
    const target = parseTarget(url);
    if (!target) {
      return;
    }
    const { host } = target;
    const delayMs = await this.effectiveDelayMs(url);

    const previous = this.hostChains.get(host) ?? Promise.resolve();
    const turn = previous.then(() => this.takeSlot(host, delayMs));
    // Keep the chain alive even if a sleep implementation rejects.
    this.hostChains.set(
      host,
      turn.catch((error: unknown) => {
        logger.debug(`Politeness wait for ${host} failed: ${String(error)}`);
      })
    );
    await turn;
  }

  private async takeSlot(host: string, delayMs: number): Promise<void> {
    const state = this.stateFor(host);
    state.effectiveDelayMs = delayMs;
    const last = state.lastAccessMs;
    if (last !== undefined) {
      // Timers may fire early, so re-check against the clock until the full
      // delay has passed.
      let elapsed = this.now() - last;
      while (elapsed < delayMs) {
        await this.sleep(delayMs - elapsed);
        elapsed = this.now() - last;
      }
    }
    state.lastAccessMs = this.now();
  }

  private stateFor(host: string): HostState {
    const existing = this.hosts.get(host);
    if (existing) {
      return existing;
    }
    const created: HostState = { effectiveDelayMs: this.options.delayMs };
    this.hosts.set(host, created);
    return created;
  }

  private policyFor(host: string): Promise<RobotsPolicy | undefined> {
    const pending = this.policyLoads.get(host);
    if (pending) {
      return pending;
    }
    const load = this.loadRobots(host).then(
      (policy) => {
        this.stateFor(host).robotsPolicy = policy;
        return policy;
      },
      (error: unknown) => {
        logger.warn(
          `robots.txt unavailable for ${host}, crawling without it: ${describeError(error)}`
        );
        return undefined;
      }
    );
    this.policyLoads.set(host, load);
    return load;
  }
}

function parseTarget(url: string): { host: string; path: string } | null {
  const host = hostOf(url);
  if (!host) {
    return null;
  }
  const parsed = new URL(url);
  return { host, path: `${parsed.pathname}${parsed.search}` };
}
