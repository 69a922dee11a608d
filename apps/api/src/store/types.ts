import type { PaymentRequest, PaymentStatus, PaymentStatusResult } from "../lib/paymentRequests.js";
import type { CreateSectionResult, Section } from "../lib/sections.js";

export type AccessTier = "normal" | "premium";
export type MediaKind = "video" | "audio" | "photo" | "document" | "animation" | "voice";

export type MediaReference = {
  /** Coordinates of the message carrying the media on the origin. */
  primaryLocator: { chatId: number; messageId: number };
  /** Origin file id; used when the message can no longer be resolved. */
  fallbackLocator: string;
  uniqueId: string;
  fileName: string | null;
  mimeType: string | null;
  sizeBytes: number | null;
  mediaKind: MediaKind;
  accessTier: AccessTier;
  /** Epoch milliseconds. */
  createdAt: number;
  sectionId: string | null;
  sectionName: string | null;
};

export type ChargeResult = { ok: boolean; balance: number };
export type CreditBalance = { userId: number; balance: number };
export type ViewCounts = { total: number; unique: number };
export type ReactionChoice = "like" | "dislike" | "none";
export type ReactionSummary = { likes: number; dislikes: number; current: ReactionChoice };
export type PremiumGrant = { userId: number; expiresAt: number | null };
export type PayPlan = { pricePerCredit: number; text: string };
export type PaymentPrompt = { chatId: number; messageId: number };

export type NewPaymentRequest = { userId: number; amountRequested: number; creditsGranted: number };

export type StoreOptions = {
  /** Cap for the global history and for each section's member list. */
  historyLimit: number;
  now?: () => number;
};

/**
 * Every piece of mutable state the gateway owns. Both backends honour the
 * same contract; callers never know which one is active.
 */
export interface TokenStore {
  readonly backend: "memory" | "postgres";

  /** Overwrites `token`; `ttlSeconds <= 0` never expires. */
  put(token: string, ref: MediaReference, ttlSeconds: number): Promise<void>;
  /**
   * `maxAgeSeconds` additionally bounds the reference age on the in-process
   * backend; the Postgres backend only honours the expiry stored by `put`.
   */
  get(token: string, maxAgeSeconds?: number): Promise<MediaReference | null>;
  purgeExpired(): Promise<number>;
  listRecent(limit: number): Promise<string[]>;

  createSection(name: string): Promise<CreateSectionResult>;
  getSection(id: string): Promise<Section | null>;
  listSections(): Promise<Section[]>;
  listSection(sectionId: string, limit: number): Promise<string[]>;
  deleteSection(nameOrId: string): Promise<boolean>;
  sectionExists(name: string): Promise<boolean>;
  sectionSlugExists(slug: string): Promise<boolean>;
  getCurrentSection(): Promise<Section | null>;
  /** Returns false (and leaves the pointer alone) for an unknown section. */
  setCurrentSection(sectionId: string | null): Promise<boolean>;

  getCredits(userId: number): Promise<number>;
  addCredits(userId: number, amount: number): Promise<number>;
  chargeCredits(userId: number, amount: number): Promise<ChargeResult>;
  listCreditBalances(limit: number): Promise<CreditBalance[]>;

  createPaymentRequest(input: NewPaymentRequest): Promise<PaymentRequest>;
  getPaymentRequest(id: number): Promise<PaymentRequest | null>;
  setPaymentStatus(id: number, status: PaymentStatus, note: string, adminId: number | null): Promise<PaymentStatusResult>;
  listPaymentRequests(status: PaymentStatus | "all", limit: number): Promise<PaymentRequest[]>;

  incrementView(token: string, viewerFingerprint?: string | null): Promise<ViewCounts>;
  getViews(token: string): Promise<ViewCounts>;
  setReaction(token: string, userId: number, choice: ReactionChoice): Promise<ReactionSummary>;
  getReactions(token: string, userId: number): Promise<ReactionSummary>;

  grantPremium(userId: number, periodDays: number | null): Promise<PremiumGrant>;
  isPremium(userId: number): Promise<boolean>;
  listPremiumUsers(): Promise<PremiumGrant[]>;

  getPayPlan(defaults: PayPlan): Promise<PayPlan>;
  setPayPlan(plan: PayPlan): Promise<PayPlan>;
  getUpiId(): Promise<string>;
  setUpiId(value: string): Promise<string>;

  setPendingReceipt(userId: number, requestId: number, ttlSeconds: number): Promise<void>;
  getPendingReceipt(userId: number): Promise<number | null>;
  clearPendingReceipt(userId: number): Promise<void>;
  setPaymentPrompt(requestId: number, prompt: PaymentPrompt): Promise<void>;
  getPaymentPrompt(requestId: number): Promise<PaymentPrompt | null>;
  clearPaymentPrompt(requestId: number): Promise<void>;

  close(): Promise<void>;
}

export function assertAmount(name: string, amount: number) {
  if (!Number.isSafeInteger(amount) || amount < 0) throw new RangeError(`${name} must be a non-negative integer`);
}

export function clampLimit(limit: number, max = 100_000): number {
  if (!Number.isFinite(limit)) return 0;
  return Math.max(0, Math.min(Math.floor(limit), max));
}

export function expiryFor(nowMs: number, ttlSeconds: number): number | null {
  return ttlSeconds > 0 ? nowMs + Math.floor(ttlSeconds * 1000) : null;
}
