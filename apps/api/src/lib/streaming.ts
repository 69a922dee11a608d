import type { AccessTier, MediaReference, TokenStore } from "../store/types.js";
import { originWindow, remapChunks } from "./chunkRemap.js";
import { defaultFilename, formatContentDisposition, sanitizeFilename } from "./http.js";
import type { Logger } from "./logger.js";
import { describeLocator, isOriginRateLimit, type Locator, type MediaOriginClient } from "./origin.js";
import { planLength, planRange } from "./range.js";

export type StreamDeps = {
  store: TokenStore;
  origin: MediaOriginClient;
  logger: Logger;
  outputChunkSize: number;
  /** Extra age bound passed to `store.get`. */
  maxAgeSeconds?: number;
};

export type StreamOptions = {
  method?: "GET" | "HEAD";
  allowTier?: (tier: AccessTier, ref: MediaReference) => boolean;
};

export type StreamBody = {
  chunks: AsyncIterable<Uint8Array>;
  /** Ends the origin session; safe to call more than once or after completion. */
  cancel: () => Promise<void>;
};

export type StreamResult =
  | { kind: "ok"; status: 200 | 206; headers: Record<string, string>; tier: AccessTier; body: StreamBody | null }
  | { kind: "not_found" }
  | { kind: "forbidden"; tier: AccessTier }
  | { kind: "range_not_satisfiable"; size: number | null }
  | { kind: "origin_unavailable"; retryAfterSeconds: number };

function emptyBody(): StreamBody {
  return { chunks: (async function* () {})(), cancel: async () => {} };
}

async function resolveLocator(deps: StreamDeps, token: string, ref: MediaReference): Promise<Locator | null> {
  const { chatId, messageId } = ref.primaryLocator;
  if (deps.origin.resolve) {
    try {
      const fresh = await deps.origin.resolve(chatId, messageId);
      if (fresh) return fresh;
    } catch (err) {
      deps.logger.warn(
        { event: "origin.resolve.failed", token, chatId, messageId, err: err instanceof Error ? err.message : String(err) },
        "origin resolve failed; using stored locator"
      );
    }
  }
  return ref.fallbackLocator ? { kind: "file", fileId: ref.fallbackLocator } : null;
}

/**
 * Pulls the first piece before any header is sent so that an origin that
 * refuses the session still turns into a status code.
 */
async function prime(source: AsyncIterator<Uint8Array>): Promise<StreamBody> {
  const first = await source.next();
  let closed = first.done === true;
  const cancel = async () => {
    if (closed) return;
    closed = true;
    await source.return?.();
  };
  const chunks = (async function* () {
    try {
      if (first.done) return;
      yield first.value;
      while (true) {
        const next = await source.next();
        if (next.done) {
          closed = true;
          return;
        }
        yield next.value;
      }
    } finally {
      await cancel();
    }
  })();
  return { chunks, cancel };
}

function baseHeaders(ref: MediaReference): Record<string, string> {
  const name = sanitizeFilename(ref.fileName) || defaultFilename(ref.uniqueId, ref.mimeType, ref.mediaKind);
  return {
    "Accept-Ranges": "bytes",
    "Content-Type": ref.mimeType || "application/octet-stream",
    "Content-Disposition": formatContentDisposition(name, true)
  };
}

export async function openStream(
  deps: StreamDeps,
  token: string,
  rangeHeader: string | null | undefined,
  opts: StreamOptions = {}
): Promise<StreamResult> {
  const ref = await deps.store.get(token, deps.maxAgeSeconds);
  if (!ref) return { kind: "not_found" };
  if (opts.allowTier && !opts.allowTier(ref.accessTier, ref)) return { kind: "forbidden", tier: ref.accessTier };

  const size = ref.sizeBytes;
  if (size === null && rangeHeader) return { kind: "range_not_satisfiable", size };
  const plan = planRange(rangeHeader, size);
  if (plan.kind === "not_satisfiable") return { kind: "range_not_satisfiable", size };

  const headers = baseHeaders(ref);
  const start = plan.start;
  let end = plan.end;
  let status: 200 | 206 = 200;
  if (size !== null) {
    end = end ?? size - 1;
    headers["Content-Length"] = String(Math.max(0, planLength({ start, end }) ?? 0));
    if (plan.partial) {
      status = 206;
      headers["Content-Range"] = `bytes ${start}-${end}/${size}`;
    }
  }

  const result = { kind: "ok" as const, status, headers, tier: ref.accessTier };
  if (size === 0) return { ...result, body: opts.method === "HEAD" ? null : emptyBody() };

  const locator = await resolveLocator(deps, token, ref);
  if (!locator) return { kind: "not_found" };
  if (opts.method === "HEAD") return { ...result, body: null };

  const window = originWindow(start, end, deps.origin.chunkSize);
  deps.logger.info(
    { event: "stream.open", token, locator: describeLocator(locator), start, end, status, chunkIndex: window.chunkIndex },
    "opening origin download"
  );
  const remapped = remapChunks(deps.origin.openChunkedDownload(locator, window.offsetBytes, window.limitBytes), {
    start,
    end,
    originChunkSize: deps.origin.chunkSize,
    outputChunkSize: deps.outputChunkSize,
    onTruncated: ({ expected, delivered }) =>
      deps.logger.warn({ event: "stream.truncated", token, expected, delivered }, "origin ended before the requested range")
  });

  try {
    return { ...result, body: await prime(remapped) };
  } catch (err) {
    if (isOriginRateLimit(err)) return { kind: "origin_unavailable", retryAfterSeconds: err.retryAfterSeconds };
    throw err;
  }
}
