import { LINE_SPLIT_REGEX } from "./constants";
import { PolicyFetchError } from "./errors";
import { logger } from "./logger";
import { fetchText } from "./network";
import type { RobotsPolicy } from "./types";

interface AgentRules {
  allow: string[];
  disallow: string[];
  crawlDelayMs?: number;
}

export function buildAllowAllPolicy(source = "allow-all"): RobotsPolicy {
  return {
    canFetch: () => true,
    crawlDelayMs: () => undefined,
    source,
  };
}

export function buildDisallowAllPolicy(source = "disallow-all"): RobotsPolicy {
  return {
    canFetch: () => false,
    crawlDelayMs: () => undefined,
    source,
  };
}

export function normalizeRulePath(rule: string): string {
  if (!rule.startsWith("/")) {
    return `/${rule}`;
  }
  return rule;
}

export function selectAgentRules(
  groups: Map<string, AgentRules>,
  userAgent: string
): AgentRules | undefined {
  const lowerUA = userAgent.toLowerCase();
  const exact = groups.get(lowerUA);
  if (exact) {
    return exact;
  }
  for (const [agent, rules] of groups.entries()) {
    if (agent !== "*" && lowerUA.includes(agent)) {
      return rules;
    }
  }
  return groups.get("*");
}

// Longest matching rule wins; ties go to Allow.
function isPathAllowed(rules: AgentRules, pathname: string): boolean {
  let longestAllow = -1;
  let longestDisallow = -1;
  for (const rule of rules.allow) {
    if (pathname.startsWith(rule) && rule.length > longestAllow) {
      longestAllow = rule.length;
    }
  }
  for (const rule of rules.disallow) {
    if (pathname.startsWith(rule) && rule.length > longestDisallow) {
      longestDisallow = rule.length;
    }
  }
  if (longestDisallow < 0) {
    return true;
  }
  return longestAllow >= longestDisallow;
}

export function parseRobotsTxt(robotsText: string): RobotsPolicy {
  const groups = new Map<string, AgentRules>();
  let currentAgents: AgentRules[] = [];
  let collectingAgents = false;

  const entryFor = (agent: string): AgentRules => {
    const existing = groups.get(agent);
    if (existing) {
      return existing;
    }
    const created: AgentRules = { allow: [], disallow: [] };
    groups.set(agent, created);
    return created;
  };

  for (const rawLine of robotsText.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.split("#", 1)[0]?.trim();
    if (!line) {
      continue;
    }
    const separator = line.indexOf(":");
    if (separator < 0) {
      continue;
    }
    const directive = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (directive === "user-agent") {
      // Consecutive User-agent lines share the group that follows them.
      if (!collectingAgents) {
        currentAgents = [];
      }
      currentAgents.push(entryFor(value.toLowerCase()));
      collectingAgents = true;
      continue;
    }
    collectingAgents = false;

    if (currentAgents.length === 0) {
      currentAgents = [entryFor("*")];
    }

    if (directive === "allow" && value) {
      for (const entry of currentAgents) {
        entry.allow.push(normalizeRulePath(value));
      }
    } else if (directive === "disallow" && value) {
      for (const entry of currentAgents) {
        entry.disallow.push(normalizeRulePath(value));
      }
    } else if (directive === "crawl-delay") {
      const delaySeconds = Number.parseFloat(value);
      if (Number.isFinite(delaySeconds) && delaySeconds >= 0) {
        for (const entry of currentAgents) {
          entry.crawlDelayMs = delaySeconds * 1000;
        }
      }
    }
  }

  return {
    canFetch: (agent, pathname) => {
      const rules = selectAgentRules(groups, agent);
      return rules ? isPathAllowed(rules, pathname) : true;
    },
    crawlDelayMs: (agent) => selectAgentRules(groups, agent)?.crawlDelayMs,
    source: "robots.txt",
  };
}

/**
 * Loads `https://{host}/robots.txt`. 401/403 lock the host out, any other
 * 4xx means there are no rules. Server errors and transport failures reject
 * with PolicyFetchError so the caller can degrade to permissive.
 */
export async function loadRobotsPolicy(
  host: string,
  options: { timeoutMs: number; userAgent: string }
): Promise<RobotsPolicy> {
  const robotsUrl = `https://${host}/robots.txt`;
  let response: Awaited<ReturnType<typeof fetchText>>;
  try {
    response = await fetchText(robotsUrl, options);
  } catch (error) {
    throw new PolicyFetchError(host, { cause: error });
  }

  if (response.ok) {
    logger.debug(`Loaded robots.txt from ${robotsUrl}`);
    return parseRobotsTxt(response.body);
  }
  if (response.status === 401 || response.status === 403) {
    logger.debug(`robots.txt at ${robotsUrl} answered ${response.status}`);
    return buildDisallowAllPolicy(`robots.txt ${response.status}`);
  }
  if (response.status >= 400 && response.status < 500) {
    return buildAllowAllPolicy(`robots.txt ${response.status}`);
  }
  throw new PolicyFetchError(host, {
    cause: new Error(`HTTP ${response.status}`),
  });
}
