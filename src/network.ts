import { logger } from "./logger";

export interface TextResponse {
  status: number;
  ok: boolean;
  body: string;
}

async function withTimeout<T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await run(controller.signal);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * GET a text resource. Non-2xx responses resolve with their status so the
 * caller can decide; only transport failures and timeouts reject. The
 * timeout covers the body as well as the headers.
 */
export async function fetchText(
  targetUrl: string,
  options: { timeoutMs: number; userAgent: string }
): Promise<TextResponse> {
  logger.logFetch(targetUrl);
  return await withTimeout(options.timeoutMs, async (signal) => {
    const response = await fetch(targetUrl, {
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/plain,*/*;q=0.8",
      },
      signal,
      redirect: "follow",
    });
    if (!response.ok) {
      await response.body?.cancel();
      return { status: response.status, ok: false, body: "" };
    }
    return { status: response.status, ok: true, body: await response.text() };
  });
}
