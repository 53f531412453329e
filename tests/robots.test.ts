import { afterEach, describe, expect, test, vi } from "vitest";
import { PolicyFetchError } from "../src/errors";
import { loadRobotsPolicy, parseRobotsTxt } from "../src/robots";

const LOAD_OPTIONS = { timeoutMs: 1000, userAgent: "sitecrawl-test" };

describe("parseRobotsTxt", () => {
  test("longest matching rule wins", () => {
    const policy = parseRobotsTxt(
      ["User-agent: *", "Disallow: /docs", "Allow: /docs/public"].join("\n")
    );
    expect(policy.canFetch("*", "/docs/private")).toBe(false);
    expect(policy.canFetch("*", "/docs/public/intro")).toBe(true);
    expect(policy.canFetch("*", "/blog")).toBe(true);
  });

  test("equal-length allow beats disallow", () => {
    const policy = parseRobotsTxt(
      ["User-agent: *", "Disallow: /a", "Allow: /a"].join("\n")
    );
    expect(policy.canFetch("*", "/a/b")).toBe(true);
  });

  test("consecutive user-agent lines share one group", () => {
    const policy = parseRobotsTxt(
      ["User-agent: alpha", "User-agent: beta", "Disallow: /x"].join("\n")
    );
    expect(policy.canFetch("beta", "/x")).toBe(false);
    expect(policy.canFetch("alpha", "/x/y")).toBe(false);
    expect(policy.canFetch("*", "/x")).toBe(true);
  });

  test("rules before any user-agent apply to everyone", () => {
    const policy = parseRobotsTxt("Disallow: /tmp\n");
    expect(policy.canFetch("*", "/tmp/file")).toBe(false);
  });

  test("strips comments and ignores an empty disallow", () => {
    const policy = parseRobotsTxt(
      ["User-agent: * # everyone", "Disallow: /a # private", "Disallow:"].join(
        "\r\n"
      )
    );
    expect(policy.canFetch("*", "/a")).toBe(false);
    expect(policy.canFetch("*", "/b")).toBe(true);
  });

  test("reads crawl-delay in seconds", () => {
    const policy = parseRobotsTxt("User-agent: *\nCrawl-delay: 1.5\n");
    expect(policy.crawlDelayMs("*")).toBe(1500);
    expect(policy.source).toBe("robots.txt");
  });
});

describe("loadRobotsPolicy", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("parses a successful response", async () => {
    const fetchMock = vi.fn(
      async () => new Response("User-agent: *\nDisallow: /x", { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const policy = await loadRobotsPolicy("example.com", LOAD_OPTIONS);

    expect(policy.canFetch("*", "/x")).toBe(false);
    expect(policy.canFetch("*", "/y")).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://example.com/robots.txt",
      expect.objectContaining({ redirect: "follow" })
    );
  });

  test("403 locks the host out", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(null, { status: 403 }))
    );
    const policy = await loadRobotsPolicy("example.com", LOAD_OPTIONS);
    expect(policy.canFetch("*", "/")).toBe(false);
    expect(policy.source).toBe("robots.txt 403");
  });

  test("404 means no rules", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(null, { status: 404 }))
    );
    const policy = await loadRobotsPolicy("example.com", LOAD_OPTIONS);
    expect(policy.canFetch("*", "/anything")).toBe(true);
  });

  test("server errors reject with PolicyFetchError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(null, { status: 503 }))
    );
    await expect(
      loadRobotsPolicy("example.com", LOAD_OPTIONS)
    ).rejects.toThrow("Could not load robots.txt for example.com: HTTP 503");
  });

  test("a body that never finishes is cut off by the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string, init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode("User-agent: *\n"));
            init?.signal?.addEventListener("abort", () => {
              controller.error(new Error("body aborted"));
            });
          },
        });
        return new Response(body, { status: 200 });
      })
    );

    await expect(
      loadRobotsPolicy("example.com", { ...LOAD_OPTIONS, timeoutMs: 20 })
    ).rejects.toBeInstanceOf(PolicyFetchError);
  });

  test("transport failures reject with PolicyFetchError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(
      loadRobotsPolicy("example.com", LOAD_OPTIONS)
    ).rejects.toBeInstanceOf(PolicyFetchError);
  });
});
