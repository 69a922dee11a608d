import test from "node:test";
import assert from "node:assert/strict";
import {
  canTransition,
  checkTransition,
  creditsForAmount,
  isFinalStatus,
  normalizePlanText,
  parsePaymentStatus,
  renderPayText,
  sourceStatusesFor,
  type PaymentRequest
} from "./paymentRequests.js";

function request(status: PaymentRequest["status"]): PaymentRequest {
  return {
    id: 1,
    userId: 42,
    amountRequested: 10,
    creditsGranted: 28,
    status,
    note: "",
    handledByAdminId: null,
    createdAt: 0,
    updatedAt: 0
  };
}

test("transition table", () => {
  assert.equal(canTransition("pending", "submitted"), true);
  assert.equal(canTransition("pending", "approved"), true);
  assert.equal(canTransition("submitted", "rejected"), true);
  assert.equal(canTransition("submitted", "submitted"), false);
  assert.equal(canTransition("submitted", "pending"), false);
  assert.equal(canTransition("approved", "rejected"), false);
  assert.equal(isFinalStatus("cancelled"), true);
  assert.equal(isFinalStatus("submitted"), false);
});

test("sourceStatusesFor lists the open statuses", () => {
  assert.deepEqual(sourceStatusesFor("approved"), ["pending", "submitted"]);
  assert.deepEqual(sourceStatusesFor("submitted"), ["pending"]);
  assert.deepEqual(sourceStatusesFor("pending"), []);
});

test("checkTransition reports final and invalid moves", () => {
  const approved = request("approved");
  assert.deepEqual(checkTransition(approved, "rejected"), { kind: "already_finalized", request: approved });
  const submitted = request("submitted");
  assert.deepEqual(checkTransition(submitted, "pending"), { kind: "invalid_transition", request: submitted });
  assert.equal(checkTransition(request("pending"), "approved"), null);
});

test("parsePaymentStatus", () => {
  assert.equal(parsePaymentStatus(" Approved "), "approved");
  assert.equal(parsePaymentStatus("paid"), null);
  assert.equal(parsePaymentStatus(undefined), null);
});

test("creditsForAmount floors in whole cents", () => {
  assert.equal(creditsForAmount(1.05, 0.35), 3);
  assert.equal(creditsForAmount(10, 0.35), 28);
  assert.equal(creditsForAmount(10, 0), 0);
  assert.equal(creditsForAmount(-5, 0.35), 0);
});

test("renderPayText fills the price placeholder", () => {
  assert.equal(renderPayText("Price per credit: INR {price}", 0.35), "Price per credit: INR 0.35");
  assert.equal(renderPayText("No placeholder", 1), "No placeholder");
  assert.equal(renderPayText("Bad {amount}", 2), "Bad {amount}\nPrice per credit: INR 2.00");
});

test("normalizePlanText turns escaped newlines into real ones", () => {
  assert.equal(normalizePlanText("  line one\\nline two\\r\\nline three  "), "line one\nline two\nline three");
});
