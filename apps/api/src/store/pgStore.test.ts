import test from "node:test";
import assert from "node:assert/strict";
import { newDb } from "pg-mem";
import { PgTokenStore } from "./pgStore.js";
import { makeRef, manualClock, runStoreContract, type Clock } from "./storeContract.js";

async function pgMemPool(clock: Clock) {
  const { Pool } = newDb().adapters.createPg();
  const pool = new Pool();
  const store = new PgTokenStore(pool, { historyLimit: 3, now: clock.now });
  await store.migrate();
  return { pool, store };
}

async function pgMemStore(clock: Clock) {
  return (await pgMemPool(clock)).store;
}

runStoreContract("postgres", pgMemStore);

test("postgres: migrate is repeatable", async () => {
  const store = await pgMemStore(manualClock());
  await store.migrate();
  await store.put("tok", makeRef(), 60);
  assert.equal(store.backend, "postgres");
  assert.notEqual(await store.get("tok"), null);
});

test("postgres: purgeExpired drops expired rows", async () => {
  const clock = manualClock();
  const store = await pgMemStore(clock);
  await store.put("a", makeRef(), 10);
  await store.put("b", makeRef(), 20);
  clock.advance(15_000);
  await store.purgeExpired();
  clock.advance(-15_000);
  assert.equal(await store.get("a"), null);
  assert.notEqual(await store.get("b"), null);
});

test("postgres: history rows are unique per token", async () => {
  const { pool, store } = await pgMemPool(manualClock());
  await store.createSection("Movies");
  await store.put("a", makeRef({ sectionId: "movies", sectionName: "Movies" }), 60);
  await assert.rejects(pool.query("INSERT INTO recent_tokens (token) VALUES ('a')"));
  await assert.rejects(pool.query("INSERT INTO section_members (section_id, token) VALUES ('movies', 'a')"));
  await store.put("a", makeRef({ sectionId: "movies", sectionName: "Movies" }), 60);
  assert.deepEqual(await store.listRecent(10), ["a"]);
  assert.deepEqual(await store.listSection("movies", 10), ["a"]);
});
