import { checkTransition, type PaymentRequest, type PaymentStatus, type PaymentStatusResult } from "../lib/paymentRequests.js";
import { normalizeSectionName, sectionNameKey, sectionSlug, type CreateSectionResult, type Section } from "../lib/sections.js";
import {
  assertAmount,
  clampLimit,
  expiryFor,
  type ChargeResult,
  type CreditBalance,
  type MediaReference,
  type NewPaymentRequest,
  type PayPlan,
  type PaymentPrompt,
  type PremiumGrant,
  type ReactionChoice,
  type ReactionSummary,
  type StoreOptions,
  type TokenStore,
  type ViewCounts
} from "./types.js";

type Entry<T> = { value: T; expiresAt: number | null };

function copyRef(ref: MediaReference): MediaReference {
  return { ...ref, primaryLocator: { ...ref.primaryLocator } };
}

/**
 * Process-local store. Every mutation runs without an `await` between its
 * read and its write, which makes it atomic on the event loop.
 */
export class MemoryTokenStore implements TokenStore {
  readonly backend = "memory" as const;
  private readonly historyLimit: number;
  private readonly now: () => number;

  private tokens = new Map<string, Entry<MediaReference>>();
  private recent: string[] = [];
  private sections = new Map<string, Section>();
  private members = new Map<string, string[]>();
  private currentSectionId: string | null = null;
  private credits = new Map<number, number>();
  private payments = new Map<number, PaymentRequest>();
  private paymentSeq = 0;
  private views = new Map<string, { total: number; viewers: Set<string> }>();
  private reactions = new Map<string, Map<number, Exclude<ReactionChoice, "none">>>();
  private premium = new Map<number, number | null>();
  private payPlan: PayPlan | null = null;
  private upiId = "";
  private pendingReceipts = new Map<number, Entry<number>>();
  private prompts = new Map<number, PaymentPrompt>();

  constructor(opts: StoreOptions) {
    this.historyLimit = Math.max(1, Math.floor(opts.historyLimit));
    this.now = opts.now ?? Date.now;
  }

  private pushBounded(list: string[], token: string): string[] {
    const next = [token, ...list.filter((t) => t !== token)];
    return next.length > this.historyLimit ? next.slice(0, this.historyLimit) : next;
  }

  async put(token: string, ref: MediaReference, ttlSeconds: number): Promise<void> {
    this.tokens.set(token, { value: copyRef(ref), expiresAt: expiryFor(this.now(), ttlSeconds) });
    this.recent = this.pushBounded(this.recent, token);
    if (ref.sectionId) {
      this.members.set(ref.sectionId, this.pushBounded(this.members.get(ref.sectionId) ?? [], token));
    }
  }

  async get(token: string, maxAgeSeconds?: number): Promise<MediaReference | null> {
    const entry = this.tokens.get(token);
    if (!entry) return null;
    const now = this.now();
    const expired =
      (entry.expiresAt !== null && now >= entry.expiresAt) ||
      (typeof maxAgeSeconds === "number" && maxAgeSeconds > 0 && now - entry.value.createdAt > maxAgeSeconds * 1000);
    if (expired) {
      this.tokens.delete(token);
      return null;
    }
    return copyRef(entry.value);
  }

  async purgeExpired(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const [token, entry] of this.tokens) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) {
        this.tokens.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  async listRecent(limit: number): Promise<string[]> {
    return this.recent.slice(0, clampLimit(limit));
  }

  async createSection(name: string): Promise<CreateSectionResult> {
    const display = normalizeSectionName(name);
    if (!display) throw new RangeError("section name must not be empty");
    const key = sectionNameKey(display);
    const id = sectionSlug(display);
    for (const section of this.sections.values()) {
      if (sectionNameKey(section.name) === key) return { kind: "conflict", field: "name" };
    }
    if (this.sections.has(id)) return { kind: "conflict", field: "slug" };
    const section: Section = { id, name: display, createdAt: this.now() };
    this.sections.set(id, section);
    this.currentSectionId = id;
    return { kind: "ok", section: { ...section } };
  }

  async getSection(id: string): Promise<Section | null> {
    const section = this.sections.get(id);
    return section ? { ...section } : null;
  }

  async listSections(): Promise<Section[]> {
    return [...this.sections.values()].sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id)).map((s) => ({ ...s }));
  }

  async listSection(sectionId: string, limit: number): Promise<string[]> {
    return (this.members.get(sectionId) ?? []).slice(0, clampLimit(limit));
  }

  async deleteSection(nameOrId: string): Promise<boolean> {
    const key = sectionNameKey(nameOrId);
    const target = [...this.sections.values()].find((s) => s.id === nameOrId || sectionNameKey(s.name) === key);
    if (!target) return false;
    this.sections.delete(target.id);
    this.members.delete(target.id);
    if (this.currentSectionId === target.id) this.currentSectionId = null;
    return true;
  }

  async sectionExists(name: string): Promise<boolean> {
    const key = sectionNameKey(name);
    return [...this.sections.values()].some((s) => sectionNameKey(s.name) === key);
  }

  async sectionSlugExists(slug: string): Promise<boolean> {
    return this.sections.has(slug);
  }

  async getCurrentSection(): Promise<Section | null> {
    if (!this.currentSectionId) return null;
    return this.getSection(this.currentSectionId);
  }

  async setCurrentSection(sectionId: string | null): Promise<boolean> {
    if (sectionId !== null && !this.sections.has(sectionId)) return false;
    this.currentSectionId = sectionId;
    return true;
  }

  async getCredits(userId: number): Promise<number> {
    return this.credits.get(userId) ?? 0;
  }

  async addCredits(userId: number, amount: number): Promise<number> {
    assertAmount("amount", amount);
    const balance = (this.credits.get(userId) ?? 0) + amount;
    this.credits.set(userId, balance);
    return balance;
  }

  async chargeCredits(userId: number, amount: number): Promise<ChargeResult> {
    const balance = this.credits.get(userId) ?? 0;
    if (!(amount > 0)) return { ok: true, balance };
    assertAmount("amount", amount);
    if (balance < amount) return { ok: false, balance };
    this.credits.set(userId, balance - amount);
    return { ok: true, balance: balance - amount };
  }

  async listCreditBalances(limit: number): Promise<CreditBalance[]> {
    return [...this.credits.entries()]
      .map(([userId, balance]) => ({ userId, balance }))
      .sort((a, b) => b.balance - a.balance || a.userId - b.userId)
      .slice(0, clampLimit(limit));
  }

  async createPaymentRequest(input: NewPaymentRequest): Promise<PaymentRequest> {
    assertAmount("creditsGranted", input.creditsGranted);
    if (!Number.isFinite(input.amountRequested) || input.amountRequested < 0) throw new RangeError("amountRequested must be >= 0");
    const now = this.now();
    this.paymentSeq += 1;
    const request: PaymentRequest = {
      id: this.paymentSeq,
      userId: input.userId,
      amountRequested: input.amountRequested,
      creditsGranted: input.creditsGranted,
      status: "pending",
      note: "",
      handledByAdminId: null,
      createdAt: now,
      updatedAt: now
    };
    this.payments.set(request.id, request);
    return { ...request };
  }

  async getPaymentRequest(id: number): Promise<PaymentRequest | null> {
    const request = this.payments.get(id);
    return request ? { ...request } : null;
  }

  async setPaymentStatus(id: number, status: PaymentStatus, note: string, adminId: number | null): Promise<PaymentStatusResult> {
    const current = this.payments.get(id);
    if (!current) return { kind: "not_found" };
    const rejected = checkTransition({ ...current }, status);
    if (rejected) return rejected;

    const next: PaymentRequest = { ...current, status, note, handledByAdminId: adminId, updatedAt: this.now() };
    this.payments.set(id, next);
    let balance: number | null = null;
    if (status === "approved") {
      balance = (this.credits.get(next.userId) ?? 0) + next.creditsGranted;
      this.credits.set(next.userId, balance);
    }
    return { kind: "ok", request: { ...next }, balance };
  }

  async listPaymentRequests(status: PaymentStatus | "all", limit: number): Promise<PaymentRequest[]> {
    return [...this.payments.values()]
      .filter((r) => status === "all" || r.status === status)
      .sort((a, b) => b.id - a.id)
      .slice(0, clampLimit(limit))
      .map((r) => ({ ...r }));
  }

  async incrementView(token: string, viewerFingerprint?: string | null): Promise<ViewCounts> {
    const counter = this.views.get(token) ?? { total: 0, viewers: new Set<string>() };
    counter.total += 1;
    if (viewerFingerprint) counter.viewers.add(viewerFingerprint);
    this.views.set(token, counter);
    return { total: counter.total, unique: counter.viewers.size };
  }

  async getViews(token: string): Promise<ViewCounts> {
    const counter = this.views.get(token);
    return { total: counter?.total ?? 0, unique: counter?.viewers.size ?? 0 };
  }

  async setReaction(token: string, userId: number, choice: ReactionChoice): Promise<ReactionSummary> {
    const byUser = this.reactions.get(token) ?? new Map<number, Exclude<ReactionChoice, "none">>();
    if (choice === "none") byUser.delete(userId);
    else byUser.set(userId, choice);
    this.reactions.set(token, byUser);
    return this.getReactions(token, userId);
  }

  async getReactions(token: string, userId: number): Promise<ReactionSummary> {
    const byUser = this.reactions.get(token);
    let likes = 0;
    let dislikes = 0;
    for (const choice of byUser?.values() ?? []) {
      if (choice === "like") likes += 1;
      else dislikes += 1;
    }
    return { likes, dislikes, current: byUser?.get(userId) ?? "none" };
  }

  async grantPremium(userId: number, periodDays: number | null): Promise<PremiumGrant> {
    const expiresAt = periodDays === null ? null : this.now() + Math.floor(periodDays * 86_400_000);
    this.premium.set(userId, expiresAt);
    return { userId, expiresAt };
  }

  async isPremium(userId: number): Promise<boolean> {
    if (!this.premium.has(userId)) return false;
    const expiresAt = this.premium.get(userId) ?? null;
    return expiresAt === null || this.now() <= expiresAt;
  }

  async listPremiumUsers(): Promise<PremiumGrant[]> {
    return [...this.premium.entries()].map(([userId, expiresAt]) => ({ userId, expiresAt })).sort((a, b) => a.userId - b.userId);
  }

  async getPayPlan(defaults: PayPlan): Promise<PayPlan> {
    return this.payPlan ? { ...this.payPlan } : { ...defaults };
  }

  async setPayPlan(plan: PayPlan): Promise<PayPlan> {
    if (!Number.isFinite(plan.pricePerCredit) || plan.pricePerCredit <= 0) throw new RangeError("pricePerCredit must be > 0");
    this.payPlan = { pricePerCredit: plan.pricePerCredit, text: plan.text.trim() };
    return { ...this.payPlan };
  }

  async getUpiId(): Promise<string> {
    return this.upiId;
  }

  async setUpiId(value: string): Promise<string> {
    this.upiId = value.trim();
    return this.upiId;
  }

  async setPendingReceipt(userId: number, requestId: number, ttlSeconds: number): Promise<void> {
    this.pendingReceipts.set(userId, { value: requestId, expiresAt: expiryFor(this.now(), ttlSeconds) });
  }

  async getPendingReceipt(userId: number): Promise<number | null> {
    const entry = this.pendingReceipts.get(userId);
    if (!entry) return null;
    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.pendingReceipts.delete(userId);
      return null;
    }
    return entry.value;
  }

  async clearPendingReceipt(userId: number): Promise<void> {
    this.pendingReceipts.delete(userId);
  }

  async setPaymentPrompt(requestId: number, prompt: PaymentPrompt): Promise<void> {
    this.prompts.set(requestId, { ...prompt });
  }

  async getPaymentPrompt(requestId: number): Promise<PaymentPrompt | null> {
    const prompt = this.prompts.get(requestId);
    return prompt ? { ...prompt } : null;
  }

  async clearPaymentPrompt(requestId: number): Promise<void> {
    this.prompts.delete(requestId);
  }

  async close(): Promise<void> {}
}
