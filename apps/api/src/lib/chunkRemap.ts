export type OriginWindow = {
  chunkIndex: number;
  chunkCount: number | null;
  offsetBytes: number;
  limitBytes: number | null;
  skipBytes: number;
};

export type TruncationReport = { expected: number; delivered: number };

export type RemapOptions = {
  start: number;
  end: number | null;
  originChunkSize: number;
  outputChunkSize: number;
  onTruncated?: (report: TruncationReport) => void;
};

function assertPositive(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value <= 0) throw new RangeError(`${name} must be a positive integer`);
}

/**
 * Origin-side request for the inclusive byte window `[start, end]`.
 *
 * The origin only serves whole chunks, so the request starts at the chunk
 * holding `start` and asks for one chunk more than the window spans.
 */
export function originWindow(start: number, end: number | null, originChunkSize: number): OriginWindow {
  assertPositive("originChunkSize", originChunkSize);
  const chunkIndex = Math.floor(start / originChunkSize);
  const skipBytes = start % originChunkSize;
  const chunkCount = end === null ? null : Math.ceil((end - start + 1) / originChunkSize) + 1;
  return {
    chunkIndex,
    chunkCount,
    offsetBytes: chunkIndex * originChunkSize,
    limitBytes: chunkCount === null ? null : chunkCount * originChunkSize,
    skipBytes
  };
}

export function* splitChunk(chunk: Uint8Array, maxSize: number): Generator<Uint8Array> {
  if (chunk.byteLength <= maxSize) {
    yield chunk;
    return;
  }
  for (let at = 0; at < chunk.byteLength; at += maxSize) {
    yield chunk.subarray(at, Math.min(at + maxSize, chunk.byteLength));
  }
}

/**
 * Re-slices an origin download (opened at `originWindow(...).offsetBytes`)
 * into exactly the bytes `[start, end]`, in pieces no larger than
 * `outputChunkSize`.
 *
 * Single use. The origin iterator is returned as soon as the window is
 * complete or the consumer stops early, so no further chunks are pulled.
 */
export async function* remapChunks(source: AsyncIterable<Uint8Array>, opts: RemapOptions): AsyncGenerator<Uint8Array> {
  assertPositive("outputChunkSize", opts.outputChunkSize);
  const { skipBytes } = originWindow(opts.start, opts.end, opts.originChunkSize);
  const expected = opts.end === null ? null : opts.end - opts.start + 1;

  let toSkip = skipBytes;
  let remaining = expected;
  let delivered = 0;
  let exhausted = false;

  const iterator = source[Symbol.asyncIterator]();
  try {
    while (remaining === null || remaining > 0) {
      const next = await iterator.next();
      if (next.done) {
        exhausted = true;
        break;
      }
      let chunk = next.value;
      if (toSkip > 0) {
        if (chunk.byteLength <= toSkip) {
          toSkip -= chunk.byteLength;
          continue;
        }
        chunk = chunk.subarray(toSkip);
        toSkip = 0;
      }
      if (remaining !== null) {
        if (chunk.byteLength > remaining) chunk = chunk.subarray(0, remaining);
        remaining -= chunk.byteLength;
      }
      if (chunk.byteLength === 0) continue;
      delivered += chunk.byteLength;
      yield* splitChunk(chunk, opts.outputChunkSize);
    }
  } finally {
    if (!exhausted && iterator.return) await iterator.return();
  }

  if (expected !== null && delivered < expected) {
    opts.onTruncated?.({ expected, delivered });
  }
}
