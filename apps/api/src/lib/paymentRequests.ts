export const PAYMENT_STATUSES = ["pending", "submitted", "approved", "rejected", "cancelled"] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type OpenPaymentStatus = "pending" | "submitted";
export type FinalPaymentStatus = Exclude<PaymentStatus, OpenPaymentStatus>;

export type PaymentRequest = {
  id: number;
  userId: number;
  amountRequested: number;
  creditsGranted: number;
  status: PaymentStatus;
  note: string;
  handledByAdminId: number | null;
  createdAt: number;
  updatedAt: number;
};

export type PaymentStatusResult =
  | { kind: "ok"; request: PaymentRequest; balance: number | null }
  | { kind: "not_found" }
  | { kind: "already_finalized"; request: PaymentRequest }
  | { kind: "invalid_transition"; request: PaymentRequest };

/**
 * Target statuses reachable from each status. Terminal statuses map to an
 * empty list; anything not listed is rejected without side effects.
 */
const TRANSITIONS: { readonly [S in PaymentStatus]: readonly PaymentStatus[] } = {
  pending: ["submitted", "approved", "rejected", "cancelled"],
  submitted: ["approved", "rejected", "cancelled"],
  approved: [],
  rejected: [],
  cancelled: []
};

export function isFinalStatus(status: PaymentStatus): status is FinalPaymentStatus {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: PaymentStatus, to: PaymentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Statuses a request must currently be in for `to` to be applied. */
export function sourceStatusesFor(to: PaymentStatus): PaymentStatus[] {
  return PAYMENT_STATUSES.filter((from) => canTransition(from, to));
}

export function parsePaymentStatus(value: unknown): PaymentStatus | null {
  const v = String(value ?? "").trim().toLowerCase();
  return PAYMENT_STATUSES.find((s) => s === v) ?? null;
}

/**
 * Decides the outcome of a transition against the request's current status.
 * Shared by both store backends so they report identical results.
 */
export function checkTransition(
  request: PaymentRequest,
  to: PaymentStatus
): Exclude<PaymentStatusResult, { kind: "ok" } | { kind: "not_found" }> | null {
  if (isFinalStatus(request.status)) return { kind: "already_finalized", request };
  if (!canTransition(request.status, to)) return { kind: "invalid_transition", request };
  return null;
}

export function creditsForAmount(amount: number, pricePerCredit: number): number {
  if (!Number.isFinite(amount) || !Number.isFinite(pricePerCredit) || pricePerCredit <= 0 || amount <= 0) return 0;
  // floor over whole cents
  const cents = Math.round(amount * 100);
  const priceCents = Math.round(pricePerCredit * 100);
  if (priceCents <= 0) return 0;
  return Math.floor(cents / priceCents);
}

export const DEFAULT_PAY_PLAN = {
  pricePerCredit: 0.35,
  text: "Price per credit: INR {price}\nTo add credits, contact admin."
} as const;

/** Admins type `\n` literally in chat commands. */
export function normalizePlanText(raw: string): string {
  return raw.replace(/\\r\\n|\\n|\\r/g, "\n").trim();
}

/**
 * Fills `{price}` with the price at two decimals. A template with any other
 * brace keeps its text and gets the price appended on its own line.
 */
export function renderPayText(template: string, price: number): string {
  const formatted = price.toFixed(2);
  if (/[{}]/.test(template.split("{price}").join(""))) return `${template}\nPrice per credit: INR ${formatted}`;
  return template.split("{price}").join(formatted);
}
