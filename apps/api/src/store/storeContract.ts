import test from "node:test";
import assert from "node:assert/strict";
import type { MediaReference, TokenStore } from "./types.js";

export type Clock = { now: () => number; advance: (ms: number) => void };

export function manualClock(start = 1_700_000_000_000): Clock {
  let at = start;
  return {
    now: () => at,
    advance: (ms) => {
      at += ms;
    }
  };
}

export function makeRef(overrides: Partial<MediaReference> = {}): MediaReference {
  return {
    primaryLocator: { chatId: -1001, messageId: 7 },
    fallbackLocator: "file-abc",
    uniqueId: "uniq-abc",
    fileName: "clip.mp4",
    mimeType: "video/mp4",
    sizeBytes: 1000,
    mediaKind: "video",
    accessTier: "normal",
    createdAt: 1_700_000_000_000,
    sectionId: null,
    sectionName: null,
    ...overrides
  };
}

/** Store factory with a history limit of 3 and the given clock. */
export type StoreFactory = (clock: Clock) => Promise<TokenStore>;

/** Behaviour every backend must share; run once per backend. */
export function runStoreContract(label: string, make: StoreFactory) {
  const it = (name: string, fn: (store: TokenStore, clock: Clock) => Promise<void>) =>
    test(`${label}: ${name}`, async () => {
      const clock = manualClock();
      await fn(await make(clock), clock);
    });

  it("put and get round-trip a reference", async (store) => {
    const ref = makeRef({ fileName: "a \"quoted\" name.mp4" });
    await store.put("tok-1", ref, 60);
    assert.deepEqual(await store.get("tok-1"), ref);
    assert.equal(await store.get("missing"), null);
  });

  it("stored references are not shared with callers", async (store) => {
    const ref = makeRef();
    await store.put("tok-1", ref, 60);
    ref.primaryLocator.messageId = 99;
    const first = await store.get("tok-1");
    assert.equal(first?.primaryLocator.messageId, 7);
    if (first) first.primaryLocator.chatId = 1;
    assert.deepEqual((await store.get("tok-1"))?.primaryLocator, { chatId: -1001, messageId: 7 });
  });

  it("references expire after their ttl", async (store, clock) => {
    await store.put("tok-1", makeRef(), 60);
    clock.advance(59_999);
    assert.notEqual(await store.get("tok-1"), null);
    clock.advance(1);
    assert.equal(await store.get("tok-1"), null);
  });

  it("a non-positive ttl never expires", async (store, clock) => {
    await store.put("tok-1", makeRef(), 0);
    clock.advance(365 * 86_400_000);
    assert.notEqual(await store.get("tok-1"), null);
  });

  it("put overwrites and moves the token to the front of history", async (store) => {
    await store.put("a", makeRef(), 60);
    await store.put("b", makeRef(), 60);
    await store.put("a", makeRef({ fileName: "second.mp4" }), 60);
    assert.deepEqual(await store.listRecent(10), ["a", "b"]);
    assert.equal((await store.get("a"))?.fileName, "second.mp4");
  });

  it("history is bounded newest first", async (store) => {
    for (const t of ["a", "b", "c", "d", "e"]) await store.put(t, makeRef(), 60);
    assert.deepEqual(await store.listRecent(10), ["e", "d", "c"]);
    assert.deepEqual(await store.listRecent(2), ["e", "d"]);
  });

  it("sections reject names that differ only in case or spacing", async (store) => {
    const created = await store.createSection("  Late  Movies ");
    assert.equal(created.kind, "ok");
    if (created.kind !== "ok") return;
    assert.equal(created.section.id, "late-movies");
    assert.equal(created.section.name, "Late Movies");
    assert.deepEqual(await store.createSection("late movies"), { kind: "conflict", field: "name" });
    assert.deepEqual(await store.createSection("Late-Movies"), { kind: "conflict", field: "slug" });
    assert.equal(await store.sectionExists("LATE MOVIES"), true);
    assert.equal(await store.sectionSlugExists("late-movies"), true);
    assert.equal((await store.listSections()).length, 1);
  });

  it("concurrent creates of the same name leave one section", async (store) => {
    const results = await Promise.all([store.createSection("Movies"), store.createSection("  movies ")]);
    assert.equal(results.filter((r) => r.kind === "ok").length, 1);
    assert.deepEqual(
      results.find((r) => r.kind === "conflict"),
      { kind: "conflict", field: "name" }
    );
    assert.equal((await store.listSections()).length, 1);
  });

  it("creating a section makes it current", async (store) => {
    await store.createSection("Movies");
    await store.createSection("Music");
    assert.equal((await store.getCurrentSection())?.id, "music");
    assert.equal(await store.setCurrentSection("movies"), true);
    assert.equal((await store.getCurrentSection())?.id, "movies");
    assert.equal(await store.setCurrentSection("nope"), false);
    assert.equal((await store.getCurrentSection())?.id, "movies");
    assert.equal(await store.setCurrentSection(null), true);
    assert.equal(await store.getCurrentSection(), null);
  });

  it("section members are bounded and removed with the section", async (store) => {
    await store.createSection("Movies");
    for (const t of ["a", "b", "c", "d"]) {
      await store.put(t, makeRef({ sectionId: "movies", sectionName: "Movies" }), 60);
    }
    await store.put("x", makeRef(), 60);
    assert.deepEqual(await store.listSection("movies", 10), ["d", "c", "b"]);

    assert.equal(await store.deleteSection(" MOVIES "), true);
    assert.equal(await store.deleteSection("movies"), false);
    assert.deepEqual(await store.listSection("movies", 10), []);
    assert.equal(await store.getCurrentSection(), null);
    assert.equal(await store.getSection("movies"), null);
  });

  it("credits start at zero and accumulate", async (store) => {
    assert.equal(await store.getCredits(1), 0);
    assert.equal(await store.addCredits(1, 5), 5);
    assert.equal(await store.addCredits(1, 3), 8);
    await assert.rejects(store.addCredits(1, -1), RangeError);
    await assert.rejects(store.addCredits(1, 1.5), RangeError);
    assert.equal(await store.getCredits(1), 8);
  });

  it("charges never drive a balance negative", async (store) => {
    await store.addCredits(1, 3);
    assert.deepEqual(await store.chargeCredits(1, 0), { ok: true, balance: 3 });
    assert.deepEqual(await store.chargeCredits(1, 5), { ok: false, balance: 3 });
    assert.deepEqual(await store.chargeCredits(2, 1), { ok: false, balance: 0 });

    const results = await Promise.all(Array.from({ length: 5 }, () => store.chargeCredits(1, 1)));
    assert.equal(results.filter((r) => r.ok).length, 3);
    assert.equal(await store.getCredits(1), 0);
  });

  it("charges reject fractional amounts", async (store) => {
    await store.addCredits(1, 3);
    await assert.rejects(store.chargeCredits(1, 0.5), RangeError);
    await assert.rejects(store.chargeCredits(1, 1.5), RangeError);
    assert.equal(await store.getCredits(1), 3);
    assert.deepEqual(await store.chargeCredits(1, -2), { ok: true, balance: 3 });
  });

  it("lists balances highest first", async (store) => {
    await store.addCredits(1, 5);
    await store.addCredits(2, 9);
    await store.addCredits(3, 5);
    assert.deepEqual(await store.listCreditBalances(10), [
      { userId: 2, balance: 9 },
      { userId: 1, balance: 5 },
      { userId: 3, balance: 5 }
    ]);
    assert.deepEqual(await store.listCreditBalances(1), [{ userId: 2, balance: 9 }]);
  });

  it("payment requests get increasing ids and start pending", async (store) => {
    const first = await store.createPaymentRequest({ userId: 7, amountRequested: 10, creditsGranted: 28 });
    const second = await store.createPaymentRequest({ userId: 8, amountRequested: 1.5, creditsGranted: 4 });
    assert.ok(second.id > first.id);
    assert.equal(first.status, "pending");
    assert.equal(first.note, "");
    assert.equal(first.handledByAdminId, null);
    assert.deepEqual(await store.getPaymentRequest(second.id), second);
    assert.equal(await store.getPaymentRequest(9999), null);
  });

  it("approval grants credits exactly once", async (store) => {
    const req = await store.createPaymentRequest({ userId: 7, amountRequested: 10, creditsGranted: 28 });
    const submitted = await store.setPaymentStatus(req.id, "submitted", "UTR 1234", null);
    assert.equal(submitted.kind, "ok");

    const approved = await store.setPaymentStatus(req.id, "approved", "paid", 99);
    assert.equal(approved.kind, "ok");
    if (approved.kind === "ok") {
      assert.equal(approved.balance, 28);
      assert.equal(approved.request.status, "approved");
      assert.equal(approved.request.handledByAdminId, 99);
      assert.equal(approved.request.note, "paid");
    }

    const again = await store.setPaymentStatus(req.id, "approved", "paid", 99);
    assert.equal(again.kind, "already_finalized");
    const rejected = await store.setPaymentStatus(req.id, "rejected", "oops", 99);
    assert.equal(rejected.kind, "already_finalized");
    assert.equal(await store.getCredits(7), 28);
  });

  it("rejects invalid transitions without side effects", async (store) => {
    const req = await store.createPaymentRequest({ userId: 7, amountRequested: 10, creditsGranted: 28 });
    await store.setPaymentStatus(req.id, "submitted", "", null);
    const back = await store.setPaymentStatus(req.id, "pending", "", null);
    assert.equal(back.kind, "invalid_transition");
    const twice = await store.setPaymentStatus(req.id, "submitted", "", null);
    assert.equal(twice.kind, "invalid_transition");
    assert.equal((await store.getPaymentRequest(req.id))?.status, "submitted");
    assert.deepEqual(await store.setPaymentStatus(9999, "approved", "", 1), { kind: "not_found" });

    const cancelled = await store.setPaymentStatus(req.id, "cancelled", "", 1);
    assert.equal(cancelled.kind === "ok" ? cancelled.balance : -1, null);
    assert.equal(await store.getCredits(7), 0);
  });

  it("lists payment requests by status newest first", async (store) => {
    const a = await store.createPaymentRequest({ userId: 1, amountRequested: 1, creditsGranted: 2 });
    const b = await store.createPaymentRequest({ userId: 2, amountRequested: 1, creditsGranted: 2 });
    const c = await store.createPaymentRequest({ userId: 3, amountRequested: 1, creditsGranted: 2 });
    await store.setPaymentStatus(b.id, "rejected", "", 1);
    assert.deepEqual(
      (await store.listPaymentRequests("all", 10)).map((r) => r.id),
      [c.id, b.id, a.id]
    );
    assert.deepEqual(
      (await store.listPaymentRequests("pending", 10)).map((r) => r.id),
      [c.id, a.id]
    );
    assert.deepEqual(
      (await store.listPaymentRequests("pending", 1)).map((r) => r.id),
      [c.id]
    );
  });

  it("counts views and unique viewers", async (store) => {
    assert.deepEqual(await store.getViews("tok"), { total: 0, unique: 0 });
    await store.incrementView("tok", "viewer-a");
    await store.incrementView("tok", "viewer-a");
    await store.incrementView("tok", null);
    assert.deepEqual(await store.incrementView("tok", "viewer-b"), { total: 4, unique: 2 });
    assert.deepEqual(await store.getViews("tok"), { total: 4, unique: 2 });
    assert.deepEqual(await store.getViews("other"), { total: 0, unique: 0 });
  });

  it("keeps one reaction per user", async (store) => {
    await store.setReaction("tok", 1, "like");
    await store.setReaction("tok", 2, "like");
    assert.deepEqual(await store.setReaction("tok", 1, "dislike"), { likes: 1, dislikes: 1, current: "dislike" });
    assert.deepEqual(await store.setReaction("tok", 2, "none"), { likes: 0, dislikes: 1, current: "none" });
    assert.deepEqual(await store.getReactions("tok", 1), { likes: 0, dislikes: 1, current: "dislike" });
  });

  it("premium grants expire unless lifetime", async (store, clock) => {
    assert.equal(await store.isPremium(1), false);
    const start = clock.now();
    assert.deepEqual(await store.grantPremium(1, 30), { userId: 1, expiresAt: start + 30 * 86_400_000 });
    await store.grantPremium(2, null);
    assert.equal(await store.isPremium(1), true);
    clock.advance(30 * 86_400_000 + 1);
    assert.equal(await store.isPremium(1), false);
    assert.equal(await store.isPremium(2), true);
    assert.deepEqual(await store.listPremiumUsers(), [
      { userId: 1, expiresAt: start + 30 * 86_400_000 },
      { userId: 2, expiresAt: null }
    ]);
  });

  it("pay plan and upi id settings", async (store) => {
    const defaults = { pricePerCredit: 0.35, text: "Price {price}" };
    assert.deepEqual(await store.getPayPlan(defaults), defaults);
    assert.deepEqual(await store.setPayPlan({ pricePerCredit: 0.5, text: "  New {price} " }), {
      pricePerCredit: 0.5,
      text: "New {price}"
    });
    assert.deepEqual(await store.getPayPlan(defaults), { pricePerCredit: 0.5, text: "New {price}" });
    await assert.rejects(store.setPayPlan({ pricePerCredit: 0, text: "x" }), RangeError);

    assert.equal(await store.getUpiId(), "");
    assert.equal(await store.setUpiId(" payee@bank "), "payee@bank");
    assert.equal(await store.getUpiId(), "payee@bank");
  });

  it("pending receipts expire", async (store, clock) => {
    await store.setPendingReceipt(1, 11, 600);
    assert.equal(await store.getPendingReceipt(1), 11);
    clock.advance(600_000);
    assert.equal(await store.getPendingReceipt(1), null);
    await store.setPendingReceipt(1, 12, 600);
    await store.clearPendingReceipt(1);
    assert.equal(await store.getPendingReceipt(1), null);
  });

  it("payment prompts", async (store) => {
    assert.equal(await store.getPaymentPrompt(5), null);
    await store.setPaymentPrompt(5, { chatId: -100, messageId: 42 });
    assert.deepEqual(await store.getPaymentPrompt(5), { chatId: -100, messageId: 42 });
    await store.clearPaymentPrompt(5);
    assert.equal(await store.getPaymentPrompt(5), null);
  });
}
