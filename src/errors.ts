export type CrawlErrorCode =
  | "POLICY_FETCH_FAILED"
  | "RENDERER_UNAVAILABLE"
  | "RENDER_FAILED"
  | "OUTPUT_DIRECTORY";

export class CrawlError extends Error {
  readonly code: CrawlErrorCode;

  constructor(code: CrawlErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * robots.txt could not be loaded or parsed. The host is then crawled as if
 * no policy existed.
 */
export class PolicyFetchError extends CrawlError {
  constructor(host: string, options?: ErrorOptions) {
    super(
      "POLICY_FETCH_FAILED",
      `Could not load robots.txt for ${host}: ${describeError(options?.cause)}`,
      options
    );
  }
}

/** No live renderer session could be checked out of the pool. */
export class RendererUnavailableError extends CrawlError {
  constructor(url: string) {
    super("RENDERER_UNAVAILABLE", `No renderer available for ${url}`);
  }
}

export class RenderFailureError extends CrawlError {
  readonly slotId: number;

  constructor(url: string, slotId: number, options?: ErrorOptions) {
    super(
      "RENDER_FAILED",
      `Renderer #${slotId} failed on ${url}: ${describeError(options?.cause)}`,
      options
    );
    this.slotId = slotId;
  }
}

export class OutputDirectoryError extends CrawlError {
  constructor(dir: string, options?: ErrorOptions) {
    super(
      "OUTPUT_DIRECTORY",
      `Cannot create output directory ${dir}: ${describeError(options?.cause)}`,
      options
    );
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
