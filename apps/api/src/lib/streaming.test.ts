import test from "node:test";
import assert from "node:assert/strict";
import { MemoryTokenStore } from "../store/memoryStore.js";
import { makeRef } from "../store/storeContract.js";
import type { MediaReference } from "../store/types.js";
import { FakeOrigin, collect, sampleBytes, type FakeOriginOptions } from "../testing/fakeOrigin.js";
import { recordingLogger } from "../testing/logger.js";
import { openStream, type StreamResult } from "./streaming.js";

const data = sampleBytes(1000);

async function setup(ref: Partial<MediaReference> = {}, origin: Partial<FakeOriginOptions> = {}) {
  const store = new MemoryTokenStore({ historyLimit: 10 });
  await store.put("tok", makeRef(ref), 0);
  const fake = new FakeOrigin({ chunkSize: 300, data, ...origin });
  const log = recordingLogger();
  const deps = { store, origin: fake, logger: log.logger, outputChunkSize: 64 };
  return { deps, fake, log };
}

async function bodyOf(result: StreamResult): Promise<Uint8Array> {
  assert.equal(result.kind, "ok");
  if (result.kind !== "ok" || !result.body) throw new Error("expected a body");
  return collect(result.body.chunks);
}

test("unknown token is not found", async () => {
  const { deps, fake } = await setup();
  assert.deepEqual(await openStream(deps, "nope", null), { kind: "not_found" });
  assert.equal(fake.sessions.length, 0);
});

test("whole resource is a 200 with its length", async () => {
  const { deps, fake } = await setup();
  const result = await openStream(deps, "tok", undefined);
  assert.equal(result.kind === "ok" && result.status, 200);
  assert.deepEqual(result.kind === "ok" && result.headers, {
    "Accept-Ranges": "bytes",
    "Content-Type": "video/mp4",
    "Content-Disposition": `inline; filename="clip.mp4"; filename*=UTF-8''clip.mp4`,
    "Content-Length": "1000"
  });
  assert.deepEqual(await bodyOf(result), Buffer.from(data));
  assert.equal(fake.sessions[0]?.offsetBytes, 0);
  assert.equal(fake.sessions[0]?.limitBytes, 1500);
});

test("closed range is a 206 over exactly the requested bytes", async () => {
  const { deps, fake } = await setup();
  const result = await openStream(deps, "tok", "bytes=500-999");
  assert.equal(result.kind === "ok" && result.status, 206);
  if (result.kind !== "ok") return;
  assert.equal(result.headers["Content-Range"], "bytes 500-999/1000");
  assert.equal(result.headers["Content-Length"], "500");
  assert.deepEqual(await bodyOf(result), Buffer.from(data.subarray(500)));
  assert.deepEqual(
    fake.sessions.map((s) => [s.offsetBytes, s.limitBytes, s.closed]),
    [[300, 900, true]]
  );
});

test("suffix range", async () => {
  const { deps } = await setup();
  const result = await openStream(deps, "tok", "bytes=-100");
  if (result.kind !== "ok") return assert.fail(`unexpected ${result.kind}`);
  assert.equal(result.headers["Content-Range"], "bytes 900-999/1000");
  assert.deepEqual(await bodyOf(result), Buffer.from(data.subarray(900)));
});

test("range past the end is not satisfiable and never opens the origin", async () => {
  const { deps, fake } = await setup();
  assert.deepEqual(await openStream(deps, "tok", "bytes=1000-"), { kind: "range_not_satisfiable", size: 1000 });
  assert.equal(fake.sessions.length, 0);
});

test("any range on an unknown size is not satisfiable", async () => {
  const { deps, fake } = await setup({ sizeBytes: null });
  assert.deepEqual(await openStream(deps, "tok", "bytes=500-599"), { kind: "range_not_satisfiable", size: null });
  assert.deepEqual(await openStream(deps, "tok", "bytes=0-"), { kind: "range_not_satisfiable", size: null });
  assert.equal(fake.sessions.length, 0);
});

test("unknown size without a range streams the whole resource as 200", async () => {
  const { deps } = await setup({ sizeBytes: null });
  const result = await openStream(deps, "tok", null);
  if (result.kind !== "ok") return assert.fail(`unexpected ${result.kind}`);
  assert.equal(result.status, 200);
  assert.equal(result.headers["Content-Length"], undefined);
  assert.equal(result.headers["Content-Range"], undefined);
  assert.deepEqual(await bodyOf(result), Buffer.from(data));
});

test("origin rate limit becomes origin_unavailable", async () => {
  const { deps } = await setup({}, { rateLimitSeconds: 6.2 });
  assert.deepEqual(await openStream(deps, "tok", null), { kind: "origin_unavailable", retryAfterSeconds: 7 });
});

test("resolve failure falls back to the stored file locator", async () => {
  const { deps, fake, log } = await setup({}, { resolveTo: new Error("peer gone") });
  await bodyOf(await openStream(deps, "tok", "bytes=0-9"));
  assert.deepEqual(fake.sessions[0]?.locator, { kind: "file", fileId: "file-abc" });
  assert.deepEqual(log.events(), ["origin.resolve.failed", "stream.open"]);
});

test("a fresh locator from resolve wins over the stored one", async () => {
  const { deps, fake } = await setup({}, { resolveTo: { kind: "message", chatId: -1001, messageId: 7 } });
  await bodyOf(await openStream(deps, "tok", "bytes=0-9"));
  assert.equal(fake.resolveCalls, 1);
  assert.deepEqual(fake.sessions[0]?.locator, { kind: "message", chatId: -1001, messageId: 7 });
});

test("no locator at all is not found, for HEAD too", async () => {
  const { deps, fake } = await setup({ fallbackLocator: "" });
  assert.deepEqual(await openStream(deps, "tok", null), { kind: "not_found" });
  assert.deepEqual(await openStream(deps, "tok", null, { method: "HEAD" }), { kind: "not_found" });
  assert.equal(fake.sessions.length, 0);
});

test("tier policy can refuse a reference", async () => {
  const { deps, fake } = await setup({ accessTier: "premium" });
  const result = await openStream(deps, "tok", null, { allowTier: (tier) => tier === "normal" });
  assert.deepEqual(result, { kind: "forbidden", tier: "premium" });
  assert.equal(fake.sessions.length, 0);
});

test("HEAD returns headers without opening the origin", async () => {
  const { deps, fake } = await setup();
  const result = await openStream(deps, "tok", "bytes=0-99", { method: "HEAD" });
  assert.equal(result.kind === "ok" && result.body, null);
  assert.equal(result.kind === "ok" && result.headers["Content-Length"], "100");
  assert.equal(fake.sessions.length, 0);
});

test("short origin logs a truncation", async () => {
  const { deps, log } = await setup({}, { data: data.subarray(0, 700) });
  const body = await bodyOf(await openStream(deps, "tok", "bytes=500-999"));
  assert.equal(body.byteLength, 200);
  const truncated = log.entries.find((e) => e.level === "warn");
  assert.deepEqual(truncated?.obj, { event: "stream.truncated", token: "tok", expected: 500, delivered: 200 });
});

test("cancel ends the origin session", async () => {
  const { deps, fake } = await setup();
  const result = await openStream(deps, "tok", null);
  if (result.kind !== "ok" || !result.body) return assert.fail("expected a body");
  const first = await result.body.chunks[Symbol.asyncIterator]().next();
  assert.equal(first.value?.byteLength, 64);
  await result.body.cancel();
  await result.body.cancel();
  assert.deepEqual(
    fake.sessions.map((s) => [s.pulled, s.finished, s.closed]),
    [[1, false, true]]
  );
});

test("empty media skips the origin", async () => {
  const { deps, fake } = await setup({ sizeBytes: 0 });
  const result = await openStream(deps, "tok", null);
  assert.equal(result.kind === "ok" && result.headers["Content-Length"], "0");
  assert.equal((await bodyOf(result)).byteLength, 0);
  assert.equal(fake.sessions.length, 0);
});
