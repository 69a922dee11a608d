import test from "node:test";
import assert from "node:assert/strict";
import { createTokenStore, scheduleExpiryPurge } from "./index.js";
import { MemoryTokenStore } from "./memoryStore.js";
import { makeRef, manualClock } from "./storeContract.js";
import { recordingLogger } from "../testing/logger.js";

test("createTokenStore uses the in-process store without a database url", async () => {
  const store = await createTokenStore({ databaseUrl: null, historyLimit: 5 });
  assert.equal(store.backend, "memory");
  await store.close();
});

test("expiry purge sweeps expired tokens and logs the count", async () => {
  const clock = manualClock();
  const store = new MemoryTokenStore({ historyLimit: 5, now: clock.now });
  await store.put("old", makeRef(), 10);
  await store.put("fresh", makeRef(), 60);
  const { logger, entries } = recordingLogger();
  const purge = scheduleExpiryPurge(store, 60_000, logger);
  try {
    assert.equal(await purge.sweep(), 0);
    clock.advance(30_000);
    assert.equal(await purge.sweep(), 1);
    assert.equal(await store.get("old"), null);
    assert.notEqual(await store.get("fresh"), null);
    assert.deepEqual(entries, [{ level: "info", obj: { event: "store.purge", removed: 1 }, msg: "expired tokens purged" }]);
  } finally {
    purge.stop();
  }
});

class BrokenPurgeStore extends MemoryTokenStore {
  override async purgeExpired(): Promise<number> {
    throw new Error("disk gone");
  }
}

test("a failed sweep is logged and reports nothing removed", async () => {
  const { logger, entries } = recordingLogger();
  const purge = scheduleExpiryPurge(new BrokenPurgeStore({ historyLimit: 5 }), 60_000, logger);
  try {
    assert.equal(await purge.sweep(), 0);
    assert.deepEqual(entries, [
      { level: "error", obj: { event: "store.purge.failed", err: "disk gone" }, msg: "token purge failed" }
    ]);
  } finally {
    purge.stop();
  }
});
