export type RangePlan =
  | { kind: "ok"; start: number; end: number | null; partial: boolean }
  | { kind: "not_satisfiable" };

const NOT_SATISFIABLE: RangePlan = { kind: "not_satisfiable" };

function isKnownSize(size: number | null | undefined): size is number {
  return typeof size === "number" && Number.isFinite(size) && size >= 0;
}

/**
 * Turns an HTTP `Range` header into a concrete byte window.
 *
 * `end` is inclusive and stays `null` when the total size is unknown and the
 * header leaves it open. Only single `bytes=` ranges are accepted.
 */
export function planRange(rangeHeader: string | null | undefined, totalSize?: number | null): RangePlan {
  if (!rangeHeader) return { kind: "ok", start: 0, end: null, partial: false };
  const trimmed = rangeHeader.trim();
  if (!trimmed.startsWith("bytes=")) return NOT_SATISFIABLE;
  const byteRange = trimmed.slice(6);
  if (!byteRange || byteRange.includes(",")) return NOT_SATISFIABLE;

  const match = byteRange.match(/^(\d*)-(\d*)$/);
  if (!match) return NOT_SATISFIABLE;

  const startRaw = match[1];
  const endRaw = match[2];
  if (!startRaw && !endRaw) return NOT_SATISFIABLE;

  const size = isKnownSize(totalSize) ? totalSize : null;

  // bytes=-N (suffix)
  if (!startRaw) {
    if (size === null) return NOT_SATISFIABLE;
    const suffix = Number(endRaw);
    if (!Number.isSafeInteger(suffix) || suffix <= 0 || size === 0) return NOT_SATISFIABLE;
    return { kind: "ok", start: Math.max(size - suffix, 0), end: size - 1, partial: true };
  }

  const start = Number(startRaw);
  if (!Number.isSafeInteger(start)) return NOT_SATISFIABLE;

  let end: number | null = null;
  if (endRaw) {
    end = Number(endRaw);
    if (!Number.isSafeInteger(end) || end < start) return NOT_SATISFIABLE;
  }

  if (size === null) return { kind: "ok", start, end, partial: true };

  if (start >= size) return NOT_SATISFIABLE;
  if (end === null || end >= size) end = size - 1;
  return { kind: "ok", start, end, partial: true };
}

/** Number of bytes a plan covers, or null when it runs to an unknown end. */
export function planLength(plan: { start: number; end: number | null }): number | null {
  if (plan.end === null) return null;
  return plan.end - plan.start + 1;
}
