import test from "node:test";
import assert from "node:assert/strict";
import { originWindow, remapChunks, splitChunk, type TruncationReport } from "./chunkRemap.js";
import { FakeOrigin, collect, sampleBytes } from "../testing/fakeOrigin.js";

const FILE = { kind: "file", fileId: "file-1" } as const;

function remapFrom(origin: FakeOrigin, start: number, end: number | null, outputChunkSize: number, onTruncated?: (r: TruncationReport) => void) {
  const w = originWindow(start, end, origin.chunkSize);
  return remapChunks(origin.openChunkedDownload(FILE, w.offsetBytes, w.limitBytes), {
    start,
    end,
    originChunkSize: origin.chunkSize,
    outputChunkSize,
    onTruncated
  });
}

test("originWindow starts at the chunk holding start and adds one lookahead chunk", () => {
  assert.deepEqual(originWindow(500, 999, 300), {
    chunkIndex: 1,
    chunkCount: 3,
    offsetBytes: 300,
    limitBytes: 900,
    skipBytes: 200
  });
  assert.deepEqual(originWindow(0, null, 512), {
    chunkIndex: 0,
    chunkCount: null,
    offsetBytes: 0,
    limitBytes: null,
    skipBytes: 0
  });
});

test("originWindow rejects a non-positive chunk size", () => {
  assert.throws(() => originWindow(0, 10, 0), RangeError);
});

test("splitChunk bounds every piece by the output size", () => {
  const pieces = [...splitChunk(sampleBytes(10), 4)].map((p) => p.byteLength);
  assert.deepEqual(pieces, [4, 4, 2]);
  assert.deepEqual([...splitChunk(sampleBytes(3), 4)].map((p) => p.byteLength), [3]);
});

test("bytes=500- over a 1000 byte object with 300 byte origin chunks", async () => {
  const data = sampleBytes(1000);
  const origin = new FakeOrigin({ chunkSize: 300, data });
  const sizes: number[] = [];
  const parts: Uint8Array[] = [];
  for await (const part of remapFrom(origin, 500, 999, 64)) {
    sizes.push(part.byteLength);
    parts.push(part);
  }
  const body = Buffer.concat(parts);

  assert.equal(body.byteLength, 500);
  assert.deepEqual(body, Buffer.from(data.subarray(500, 1000)));
  assert.deepEqual(sizes, [64, 36, 64, 64, 64, 64, 44, 64, 36]);
  assert.equal(origin.sessions.length, 1);
  assert.equal(origin.sessions[0].offsetBytes, 300);
  assert.equal(origin.sessions[0].limitBytes, 900);
  assert.equal(origin.sessions[0].pulled, 3);
  assert.equal(origin.sessions[0].closed, true);
});

for (const [chunkSize, length, step] of [
  [1, 40, 1],
  [7, 60, 1],
  [1024, 5000, 397]
] as const) {
  test(`round trip reproduces every window (origin chunk ${chunkSize})`, async () => {
    const data = sampleBytes(length);
    for (let start = 0; start < length; start += step) {
      for (let end = start; end < length; end += step) {
        const origin = new FakeOrigin({ chunkSize, data });
        const body = await collect(remapFrom(origin, start, end, 5));
        assert.deepEqual(body, Buffer.from(data.subarray(start, end + 1)), `window ${start}-${end}`);
      }
      const last = length - 1;
      const origin = new FakeOrigin({ chunkSize, data });
      const body = await collect(remapFrom(origin, start, last, 4096));
      assert.deepEqual(body, Buffer.from(data.subarray(start)), `window ${start}-${last}`);
    }
  });
}

test("an open end streams until the origin is exhausted", async () => {
  const data = sampleBytes(2500);
  const origin = new FakeOrigin({ chunkSize: 1024, data });
  const body = await collect(remapFrom(origin, 10, null, 512));
  assert.deepEqual(body, Buffer.from(data.subarray(10)));
  assert.equal(origin.sessions[0].finished, true);
});

test("an origin that ends early yields a short sequence and reports it", async () => {
  const origin = new FakeOrigin({ chunkSize: 300, data: sampleBytes(700) });
  const reports: TruncationReport[] = [];
  const body = await collect(remapFrom(origin, 500, 999, 1024, (r) => reports.push(r)));
  assert.equal(body.byteLength, 200);
  assert.deepEqual(reports, [{ expected: 500, delivered: 200 }]);
});

test("a consumer that stops early closes the origin session", async () => {
  const origin = new FakeOrigin({ chunkSize: 100, data: sampleBytes(10_000) });
  let seen = 0;
  for await (const part of remapFrom(origin, 0, null, 100)) {
    assert.equal(part.byteLength, 100);
    seen += 1;
    if (seen === 2) break;
  }
  const session = origin.sessions[0];
  assert.equal(session.pulled, 2);
  assert.equal(session.closed, true);
  assert.equal(session.finished, false);
});
