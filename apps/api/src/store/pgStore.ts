import fs from "node:fs/promises";
import type { Pool, PoolClient, QueryResultRow } from "pg";
import {
  checkTransition,
  parsePaymentStatus,
  sourceStatusesFor,
  type PaymentRequest,
  type PaymentStatus,
  type PaymentStatusResult
} from "../lib/paymentRequests.js";
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

const SCHEMA_URL = new URL("../../sql/schema.sql", import.meta.url);

const STATE_CURRENT_SECTION = "current_section";
const STATE_PAY_PLAN = "pay_plan";
const STATE_UPI_ID = "upi_id";

type Int = number | string;

type SectionRow = { id: string; name: string; created_at: Int };
type PaymentRow = {
  id: Int;
  user_id: Int;
  amount_requested: Int;
  credits_granted: Int;
  status: string;
  note: string;
  handled_by: Int | null;
  created_at: Int;
  updated_at: Int;
};

function toSection(row: SectionRow): Section {
  return { id: row.id, name: row.name, createdAt: Number(row.created_at) };
}

function toPaymentRequest(row: PaymentRow): PaymentRequest {
  return {
    id: Number(row.id),
    userId: Number(row.user_id),
    amountRequested: Number(row.amount_requested),
    creditsGranted: Number(row.credits_granted),
    status: parsePaymentStatus(row.status) ?? "pending",
    note: row.note,
    handledByAdminId: row.handled_by === null ? null : Number(row.handled_by),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at)
  };
}

function parseReference(raw: string): MediaReference | null {
  try {
    const parsed: MediaReference = JSON.parse(raw);
    return parsed && typeof parsed === "object" ? parsed : null;
  } catch {
    return null;
  }
}

function parsePayPlan(raw: string | null): PayPlan | null {
  if (!raw) return null;
  try {
    const parsed: Partial<PayPlan> = JSON.parse(raw);
    const price = Number(parsed?.pricePerCredit);
    if (!Number.isFinite(price) || price <= 0) return null;
    return { pricePerCredit: price, text: String(parsed?.text ?? "") };
  } catch {
    return null;
  }
}

export async function readSchemaStatements(): Promise<string[]> {
  const sql = await fs.readFile(SCHEMA_URL, "utf8");
  return sql
    .split(/;\s*(?:\n|$)/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Durable store on Postgres. Shared by every server process; each rule
 * that needs atomicity is a single conditional statement or one transaction.
 */
export class PgTokenStore implements TokenStore {
  readonly backend = "postgres" as const;
  private readonly historyLimit: number;
  private readonly now: () => number;

  constructor(private readonly pool: Pool, opts: StoreOptions) {
    this.historyLimit = Math.max(1, Math.floor(opts.historyLimit));
    this.now = opts.now ?? Date.now;
  }

  async migrate(): Promise<void> {
    for (const statement of await readSchemaStatements()) {
      await this.pool.query(statement);
    }
  }

  private async query<R extends QueryResultRow>(text: string, values: unknown[] = []): Promise<R[]> {
    const res = await this.pool.query<R>(text, values);
    return res.rows;
  }

  private async tx<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const out = await fn(client);
      await client.query("COMMIT");
      return out;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  private async setState(key: string, value: string | null): Promise<void> {
    if (value === null) {
      await this.query("DELETE FROM app_state WHERE state_key = $1", [key]);
      return;
    }
    await this.query(
      "INSERT INTO app_state (state_key, state_value) VALUES ($1, $2) ON CONFLICT (state_key) DO UPDATE SET state_value = EXCLUDED.state_value",
      [key, value]
    );
  }

  private async getState(key: string): Promise<string | null> {
    const rows = await this.query<{ state_value: string }>("SELECT state_value FROM app_state WHERE state_key = $1", [key]);
    return rows[0]?.state_value ?? null;
  }

  private async pushRecent(client: PoolClient, token: string) {
    await client.query("DELETE FROM recent_tokens WHERE token = $1", [token]);
    await client.query("INSERT INTO recent_tokens (token) VALUES ($1) ON CONFLICT DO NOTHING", [token]);
    const cut = await client.query<{ pos: Int }>("SELECT pos FROM recent_tokens ORDER BY pos DESC LIMIT 1 OFFSET $1", [
      this.historyLimit
    ]);
    if (cut.rows[0]) await client.query("DELETE FROM recent_tokens WHERE pos <= $1", [cut.rows[0].pos]);
  }

  private async pushMember(client: PoolClient, sectionId: string, token: string) {
    await client.query("DELETE FROM section_members WHERE section_id = $1 AND token = $2", [sectionId, token]);
    await client.query("INSERT INTO section_members (section_id, token) VALUES ($1, $2) ON CONFLICT DO NOTHING", [sectionId, token]);
    const cut = await client.query<{ pos: Int }>(
      "SELECT pos FROM section_members WHERE section_id = $1 ORDER BY pos DESC LIMIT 1 OFFSET $2",
      [sectionId, this.historyLimit]
    );
    if (cut.rows[0]) {
      await client.query("DELETE FROM section_members WHERE section_id = $1 AND pos <= $2", [sectionId, cut.rows[0].pos]);
    }
  }

  async put(token: string, ref: MediaReference, ttlSeconds: number): Promise<void> {
    const now = this.now();
    await this.tx(async (client) => {
      await client.query(
        `INSERT INTO media_tokens (token, ref, created_at, expires_at) VALUES ($1, $2, $3, $4)
         ON CONFLICT (token) DO UPDATE SET ref = EXCLUDED.ref, created_at = EXCLUDED.created_at, expires_at = EXCLUDED.expires_at`,
        [token, JSON.stringify(ref), ref.createdAt, expiryFor(now, ttlSeconds)]
      );
      await this.pushRecent(client, token);
      if (ref.sectionId) await this.pushMember(client, ref.sectionId, token);
    });
  }

  async get(token: string): Promise<MediaReference | null> {
    const rows = await this.query<{ ref: string }>(
      "SELECT ref FROM media_tokens WHERE token = $1 AND (expires_at IS NULL OR expires_at > $2)",
      [token, this.now()]
    );
    return rows[0] ? parseReference(rows[0].ref) : null;
  }

  async purgeExpired(): Promise<number> {
    const res = await this.pool.query("DELETE FROM media_tokens WHERE expires_at IS NOT NULL AND expires_at <= $1", [this.now()]);
    return res.rowCount ?? 0;
  }

  async listRecent(limit: number): Promise<string[]> {
    const rows = await this.query<{ token: string }>("SELECT token FROM recent_tokens ORDER BY pos DESC LIMIT $1", [
      clampLimit(limit)
    ]);
    return rows.map((r) => r.token);
  }

  async createSection(name: string): Promise<CreateSectionResult> {
    const display = normalizeSectionName(name);
    if (!display) throw new RangeError("section name must not be empty");
    const key = sectionNameKey(display);
    const id = sectionSlug(display);
    const rows = await this.query<SectionRow>(
      "INSERT INTO sections (id, name, name_key, created_at) VALUES ($1, $2, $3, $4) ON CONFLICT DO NOTHING RETURNING id, name, created_at",
      [id, display, key, this.now()]
    );
    if (!rows[0]) {
      const byName = await this.query<{ id: string }>("SELECT id FROM sections WHERE name_key = $1", [key]);
      return { kind: "conflict", field: byName[0] ? "name" : "slug" };
    }
    await this.setState(STATE_CURRENT_SECTION, id);
    return { kind: "ok", section: toSection(rows[0]) };
  }

  async getSection(id: string): Promise<Section | null> {
    const rows = await this.query<SectionRow>("SELECT id, name, created_at FROM sections WHERE id = $1", [id]);
    return rows[0] ? toSection(rows[0]) : null;
  }

  async listSections(): Promise<Section[]> {
    const rows = await this.query<SectionRow>("SELECT id, name, created_at FROM sections ORDER BY created_at ASC, id ASC");
    return rows.map(toSection);
  }

  async listSection(sectionId: string, limit: number): Promise<string[]> {
    const rows = await this.query<{ token: string }>(
      "SELECT token FROM section_members WHERE section_id = $1 ORDER BY pos DESC LIMIT $2",
      [sectionId, clampLimit(limit)]
    );
    return rows.map((r) => r.token);
  }

  async deleteSection(nameOrId: string): Promise<boolean> {
    return this.tx(async (client) => {
      const res = await client.query<{ id: string }>("DELETE FROM sections WHERE id = $1 OR name_key = $2 RETURNING id", [
        nameOrId,
        sectionNameKey(nameOrId)
      ]);
      const id = res.rows[0]?.id;
      if (!id) return false;
      await client.query("DELETE FROM section_members WHERE section_id = $1", [id]);
      await client.query("DELETE FROM app_state WHERE state_key = $1 AND state_value = $2", [STATE_CURRENT_SECTION, id]);
      return true;
    });
  }

  async sectionExists(name: string): Promise<boolean> {
    const rows = await this.query<{ id: string }>("SELECT id FROM sections WHERE name_key = $1", [sectionNameKey(name)]);
    return rows.length > 0;
  }

  async sectionSlugExists(slug: string): Promise<boolean> {
    const rows = await this.query<{ id: string }>("SELECT id FROM sections WHERE id = $1", [slug]);
    return rows.length > 0;
  }

  async getCurrentSection(): Promise<Section | null> {
    const id = await this.getState(STATE_CURRENT_SECTION);
    return id ? this.getSection(id) : null;
  }

  async setCurrentSection(sectionId: string | null): Promise<boolean> {
    if (sectionId !== null && !(await this.sectionSlugExists(sectionId))) return false;
    await this.setState(STATE_CURRENT_SECTION, sectionId);
    return true;
  }

  async getCredits(userId: number): Promise<number> {
    const rows = await this.query<{ balance: Int }>("SELECT balance FROM credits WHERE user_id = $1", [userId]);
    return rows[0] ? Number(rows[0].balance) : 0;
  }

  async addCredits(userId: number, amount: number): Promise<number> {
    assertAmount("amount", amount);
    const rows = await this.query<{ balance: Int }>(
      `INSERT INTO credits (user_id, balance) VALUES ($1, $2)
       ON CONFLICT (user_id) DO UPDATE SET balance = credits.balance + EXCLUDED.balance RETURNING balance`,
      [userId, amount]
    );
    return Number(rows[0]?.balance ?? 0);
  }

  async chargeCredits(userId: number, amount: number): Promise<ChargeResult> {
    if (!(amount > 0)) return { ok: true, balance: await this.getCredits(userId) };
    assertAmount("amount", amount);
    const rows = await this.query<{ balance: Int }>(
      "UPDATE credits SET balance = balance - $2 WHERE user_id = $1 AND balance >= $2 RETURNING balance",
      [userId, amount]
    );
    if (rows[0]) return { ok: true, balance: Number(rows[0].balance) };
    return { ok: false, balance: await this.getCredits(userId) };
  }

  async listCreditBalances(limit: number): Promise<CreditBalance[]> {
    const rows = await this.query<{ user_id: Int; balance: Int }>(
      "SELECT user_id, balance FROM credits ORDER BY balance DESC, user_id ASC LIMIT $1",
      [clampLimit(limit)]
    );
    return rows.map((r) => ({ userId: Number(r.user_id), balance: Number(r.balance) }));
  }

  async createPaymentRequest(input: NewPaymentRequest): Promise<PaymentRequest> {
    assertAmount("creditsGranted", input.creditsGranted);
    if (!Number.isFinite(input.amountRequested) || input.amountRequested < 0) throw new RangeError("amountRequested must be >= 0");
    const now = this.now();
    const rows = await this.query<PaymentRow>(
      `INSERT INTO payment_requests (user_id, amount_requested, credits_granted, status, note, handled_by, created_at, updated_at)
       VALUES ($1, $2, $3, 'pending', '', NULL, $4, $4) RETURNING *`,
      [input.userId, input.amountRequested, input.creditsGranted, now]
    );
    if (!rows[0]) throw new Error("payment request insert returned no row");
    return toPaymentRequest(rows[0]);
  }

  async getPaymentRequest(id: number): Promise<PaymentRequest | null> {
    const rows = await this.query<PaymentRow>("SELECT * FROM payment_requests WHERE id = $1", [id]);
    return rows[0] ? toPaymentRequest(rows[0]) : null;
  }

  async setPaymentStatus(id: number, status: PaymentStatus, note: string, adminId: number | null): Promise<PaymentStatusResult> {
    const sources = sourceStatusesFor(status);
    const applied = await this.tx(async (client) => {
      if (!sources.length) return null;
      const placeholders = sources.map((_, i) => `$${i + 6}`).join(", ");
      const res = await client.query<PaymentRow>(
        `UPDATE payment_requests SET status = $2, note = $3, handled_by = $4, updated_at = $5
         WHERE id = $1 AND status IN (${placeholders}) RETURNING *`,
        [id, status, note, adminId, this.now(), ...sources]
      );
      if (!res.rows[0]) return null;
      const request = toPaymentRequest(res.rows[0]);
      let balance: number | null = null;
      if (status === "approved") {
        const credited = await client.query<{ balance: Int }>(
          `INSERT INTO credits (user_id, balance) VALUES ($1, $2)
           ON CONFLICT (user_id) DO UPDATE SET balance = credits.balance + EXCLUDED.balance RETURNING balance`,
          [request.userId, request.creditsGranted]
        );
        balance = Number(credited.rows[0]?.balance ?? 0);
      }
      return { request, balance };
    });
    if (applied) return { kind: "ok", request: applied.request, balance: applied.balance };

    const current = await this.getPaymentRequest(id);
    if (!current) return { kind: "not_found" };
    return checkTransition(current, status) ?? { kind: "invalid_transition", request: current };
  }

  async listPaymentRequests(status: PaymentStatus | "all", limit: number): Promise<PaymentRequest[]> {
    const rows =
      status === "all"
        ? await this.query<PaymentRow>("SELECT * FROM payment_requests ORDER BY id DESC LIMIT $1", [clampLimit(limit)])
        : await this.query<PaymentRow>("SELECT * FROM payment_requests WHERE status = $1 ORDER BY id DESC LIMIT $2", [
            status,
            clampLimit(limit)
          ]);
    return rows.map(toPaymentRequest);
  }

  async incrementView(token: string, viewerFingerprint?: string | null): Promise<ViewCounts> {
    const rows = await this.query<{ total: Int }>(
      `INSERT INTO token_views (token, total) VALUES ($1, 1)
       ON CONFLICT (token) DO UPDATE SET total = token_views.total + 1 RETURNING total`,
      [token]
    );
    if (viewerFingerprint) {
      await this.query("INSERT INTO token_viewers (token, fingerprint) VALUES ($1, $2) ON CONFLICT DO NOTHING", [
        token,
        viewerFingerprint
      ]);
    }
    return { total: Number(rows[0]?.total ?? 0), unique: await this.countViewers(token) };
  }

  private async countViewers(token: string): Promise<number> {
    const rows = await this.query<{ n: Int }>("SELECT COUNT(*) AS n FROM token_viewers WHERE token = $1", [token]);
    return Number(rows[0]?.n ?? 0);
  }

  async getViews(token: string): Promise<ViewCounts> {
    const rows = await this.query<{ total: Int }>("SELECT total FROM token_views WHERE token = $1", [token]);
    return { total: Number(rows[0]?.total ?? 0), unique: await this.countViewers(token) };
  }

  async setReaction(token: string, userId: number, choice: ReactionChoice): Promise<ReactionSummary> {
    if (choice === "none") {
      await this.query("DELETE FROM token_reactions WHERE token = $1 AND user_id = $2", [token, userId]);
    } else {
      await this.query(
        `INSERT INTO token_reactions (token, user_id, choice) VALUES ($1, $2, $3)
         ON CONFLICT (token, user_id) DO UPDATE SET choice = EXCLUDED.choice`,
        [token, userId, choice]
      );
    }
    return this.getReactions(token, userId);
  }

  async getReactions(token: string, userId: number): Promise<ReactionSummary> {
    const counts = await this.query<{ choice: string; n: Int }>(
      "SELECT choice, COUNT(*) AS n FROM token_reactions WHERE token = $1 GROUP BY choice",
      [token]
    );
    const mine = await this.query<{ choice: string }>("SELECT choice FROM token_reactions WHERE token = $1 AND user_id = $2", [
      token,
      userId
    ]);
    const countOf = (choice: string) => Number(counts.find((c) => c.choice === choice)?.n ?? 0);
    const current = mine[0]?.choice;
    return {
      likes: countOf("like"),
      dislikes: countOf("dislike"),
      current: current === "like" || current === "dislike" ? current : "none"
    };
  }

  async grantPremium(userId: number, periodDays: number | null): Promise<PremiumGrant> {
    const expiresAt = periodDays === null ? null : this.now() + Math.floor(periodDays * 86_400_000);
    await this.query(
      "INSERT INTO premium_users (user_id, expires_at) VALUES ($1, $2) ON CONFLICT (user_id) DO UPDATE SET expires_at = EXCLUDED.expires_at",
      [userId, expiresAt]
    );
    return { userId, expiresAt };
  }

  async isPremium(userId: number): Promise<boolean> {
    const rows = await this.query<{ expires_at: Int | null }>("SELECT expires_at FROM premium_users WHERE user_id = $1", [userId]);
    if (!rows[0]) return false;
    const expiresAt = rows[0].expires_at;
    return expiresAt === null || this.now() <= Number(expiresAt);
  }

  async listPremiumUsers(): Promise<PremiumGrant[]> {
    const rows = await this.query<{ user_id: Int; expires_at: Int | null }>(
      "SELECT user_id, expires_at FROM premium_users ORDER BY user_id ASC"
    );
    return rows.map((r) => ({ userId: Number(r.user_id), expiresAt: r.expires_at === null ? null : Number(r.expires_at) }));
  }

  async getPayPlan(defaults: PayPlan): Promise<PayPlan> {
    return parsePayPlan(await this.getState(STATE_PAY_PLAN)) ?? { ...defaults };
  }

  async setPayPlan(plan: PayPlan): Promise<PayPlan> {
    if (!Number.isFinite(plan.pricePerCredit) || plan.pricePerCredit <= 0) throw new RangeError("pricePerCredit must be > 0");
    const next: PayPlan = { pricePerCredit: plan.pricePerCredit, text: plan.text.trim() };
    await this.setState(STATE_PAY_PLAN, JSON.stringify(next));
    return next;
  }

  async getUpiId(): Promise<string> {
    return (await this.getState(STATE_UPI_ID)) ?? "";
  }

  async setUpiId(value: string): Promise<string> {
    const next = value.trim();
    await this.setState(STATE_UPI_ID, next);
    return next;
  }

  async setPendingReceipt(userId: number, requestId: number, ttlSeconds: number): Promise<void> {
    await this.query(
      `INSERT INTO pending_receipts (user_id, request_id, expires_at) VALUES ($1, $2, $3)
       ON CONFLICT (user_id) DO UPDATE SET request_id = EXCLUDED.request_id, expires_at = EXCLUDED.expires_at`,
      [userId, requestId, expiryFor(this.now(), ttlSeconds)]
    );
  }

  async getPendingReceipt(userId: number): Promise<number | null> {
    const rows = await this.query<{ request_id: Int }>(
      "SELECT request_id FROM pending_receipts WHERE user_id = $1 AND (expires_at IS NULL OR expires_at > $2)",
      [userId, this.now()]
    );
    return rows[0] ? Number(rows[0].request_id) : null;
  }

  async clearPendingReceipt(userId: number): Promise<void> {
    await this.query("DELETE FROM pending_receipts WHERE user_id = $1", [userId]);
  }

  async setPaymentPrompt(requestId: number, prompt: PaymentPrompt): Promise<void> {
    await this.query(
      `INSERT INTO payment_prompts (request_id, chat_id, message_id) VALUES ($1, $2, $3)
       ON CONFLICT (request_id) DO UPDATE SET chat_id = EXCLUDED.chat_id, message_id = EXCLUDED.message_id`,
      [requestId, prompt.chatId, prompt.messageId]
    );
  }

  async getPaymentPrompt(requestId: number): Promise<PaymentPrompt | null> {
    const rows = await this.query<{ chat_id: Int; message_id: Int }>(
      "SELECT chat_id, message_id FROM payment_prompts WHERE request_id = $1",
      [requestId]
    );
    return rows[0] ? { chatId: Number(rows[0].chat_id), messageId: Number(rows[0].message_id) } : null;
  }

  async clearPaymentPrompt(requestId: number): Promise<void> {
    await this.query("DELETE FROM payment_prompts WHERE request_id = $1", [requestId]);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
