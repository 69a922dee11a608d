/**
 * Narrow contract with the upstream messaging client. The gateway never talks
 * the origin's own protocol; it only opens chunked downloads through this.
 */
export type Locator =
  | { kind: "message"; chatId: number; messageId: number }
  | { kind: "file"; fileId: string };

export interface MediaOriginClient {
  /** Fixed granularity of the chunks yielded by `openChunkedDownload`. */
  readonly chunkSize: number;

  /**
   * Re-resolves a message to a fresh locator. Clients that cannot refresh
   * locators leave this out; a rejection or `null` means "use the stored one".
   */
  resolve?(chatId: number, messageId: number): Promise<Locator | null>;

  /**
   * Yields the media bytes starting at `offsetBytes` (a multiple of
   * `chunkSize`) in `chunkSize` pieces, the last one possibly shorter.
   * Returning the iterator ends the origin session.
   */
  openChunkedDownload(locator: Locator, offsetBytes: number, limitBytes: number | null): AsyncIterable<Uint8Array>;
}

export class OriginRateLimitError extends Error {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message?: string) {
    super(message ?? `Origin rate limited. Retry after ${retryAfterSeconds} seconds.`);
    this.name = "OriginRateLimitError";
    this.retryAfterSeconds = Math.max(0, Math.ceil(retryAfterSeconds));
  }
}

export function isOriginRateLimit(err: unknown): err is OriginRateLimitError {
  return err instanceof OriginRateLimitError;
}

export function describeLocator(locator: Locator): string {
  return locator.kind === "message" ? `message:${locator.chatId}/${locator.messageId}` : `file:${locator.fileId}`;
}
