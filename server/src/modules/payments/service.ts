// src/modules/payments/service.ts
import crypto from "crypto";

import type { PaymentProcessor, VerifyData } from "./gateway.js";
import type { PaymentRecord, PaymentStore } from "./store.js";
import { logger } from "../../config/logger.js";
import type { PaymentStatus } from "../../domain/enums.js";
import {
  ConflictError,
  GatewayError,
  NotFoundError,
  ValidationError,
} from "../../domain/errors.js";
import { toCents, toDecimalString } from "../../domain/money.js";
import type { BookingStore } from "../bookings/store.js";
import type { ListingDirectory } from "../listings/service.js";

export type PaymentServiceDeps = {
  payments: PaymentStore;
  bookings: Pick<BookingStore, "findById">;
  listings: ListingDirectory;
  processor: PaymentProcessor;
  newTxRef: () => string;
  urls: { callbackUrl: string; returnUrl: string };
  defaultCurrency: string;
  /** HMAC-SHA256 key for webhook signatures; empty disables the check */
  webhookSecret?: string;
  /** Runs on every verification that finds the payment paid; must be idempotent. */
  onPaid?: (payment: PaymentRecord) => Promise<unknown>;
  now?: () => Date;
};

export type InitializePaymentInput = {
  bookingId: string;
  customer: { name: string; email: string; phone?: string | null };
  currency?: string;
};

const FAILED = new Set(["failed", "failure", "cancelled", "reversed"]);

/** Processor vocabulary -> ours. Anything unrecognised is still pending. */
export function mapProcessorStatus(raw: string): PaymentStatus {
  const s = raw.trim().toLowerCase();
  if (s === "success") return "success";
  if (FAILED.has(s)) return "failed";
  return "pending";
}

function splitName(name: string): { firstName: string; lastName: string } {
  const [firstName = "", ...rest] = name.trim().split(/\s+/);
  return { firstName, lastName: rest.join(" ") };
}

function sameAmount(reported: string, expectedCents: number): boolean {
  try {
    return toCents(reported) === expectedCents;
  } catch (err) {
    logger.warn("payments.amount_unparseable", { reported, err: String(err) });
    return false;
  }
}

/** A reported success only counts when it settles the exact amount in the stored currency. */
function settles(payment: PaymentRecord, reported: VerifyData): boolean {
  if (reported.amount === null || reported.currency === null) return false;
  if (reported.currency.trim().toUpperCase() !== payment.currency) return false;
  return sameAmount(reported.amount, payment.amountCents);
}

/** Constant-time compare of a hex HMAC-SHA256 of the raw body. */
export function verifyWebhookSignature(rawBody: Buffer | string, signature: string, secret: string): boolean {
  const expected = crypto.createHmac("sha256", secret).update(rawBody).digest("hex");
  const given = signature.trim().toLowerCase();
  if (given.length !== expected.length) return false;
  return crypto.timingSafeEqual(Buffer.from(given), Buffer.from(expected));
}

export function createPaymentService(deps: PaymentServiceDeps) {
  const { payments, bookings, listings, processor } = deps;
  const now = deps.now ?? (() => new Date());

  async function initializePayment(input: InitializePaymentInput): Promise<PaymentRecord> {
    const booking = await bookings.findById(input.bookingId);
    if (!booking) throw new ValidationError("Booking not found", { bookingId: input.bookingId });
    if (booking.status === "cancelled") {
      throw new ValidationError("Cancelled bookings cannot be paid", { bookingId: booking.id });
    }

    const existing = await payments.findByBookingId(booking.id);
    if (existing?.status === "success") {
      throw new ValidationError("Booking is already paid", { bookingId: booking.id }, "ALREADY_PAID");
    }
    if (existing && (existing.status === "initialized" || existing.status === "pending")) {
      return existing;
    }

    const listing = await listings.get(booking.listingId);
    const txRef = deps.newTxRef();
    const currency = (input.currency ?? deps.defaultCurrency).toUpperCase();
    const { firstName, lastName } = splitName(input.customer.name);

    const result = await processor.initialize({
      amount: toDecimalString(booking.totalCents),
      currency,
      email: input.customer.email,
      firstName,
      lastName,
      phone: input.customer.phone ?? "",
      txRef,
      callbackUrl: deps.urls.callbackUrl,
      returnUrl: deps.urls.returnUrl,
      description: `Booking payment for ${listing?.title ?? "listing"}`,
      meta: { bookingId: booking.id, listingId: booking.listingId },
    });
    if (result.status === "error") {
      throw new GatewayError(result.message, { bookingId: booking.id, txRef });
    }

    if (existing) {
      // failed attempt: kept for the record, retired in favour of the fresh reference
      await payments.supersede(existing.id, txRef);
      logger.info("payments.retry", { bookingId: booking.id, previousTxRef: existing.txRef, txRef });
    }

    try {
      return await payments.create({
        bookingId: booking.id,
        amountCents: booking.totalCents,
        currency,
        txRef,
        transactionId: result.data.transactionId,
        checkoutUrl: result.data.checkoutUrl,
        customer: {
          name: input.customer.name.trim(),
          email: input.customer.email,
          phone: input.customer.phone ?? null,
        },
      });
    } catch (err) {
      if (err instanceof ConflictError) {
        throw new ValidationError("A payment for this booking is already in progress", {
          bookingId: booking.id,
        });
      }
      throw err;
    }
  }

  async function verifyPayment(txRef: string): Promise<PaymentRecord> {
    const payment = await payments.findByTxRef(txRef);
    if (!payment) throw new NotFoundError("Payment not found", { txRef });

    const result = await processor.verify(txRef);
    const at = now();

    if (result.status === "error") {
      await payments.recordVerification(txRef, { status: null, processorStatus: null, at });
      throw new GatewayError(result.message, { txRef });
    }

    let next = mapProcessorStatus(result.data.status);
    if (next === "success" && !settles(payment, result.data)) {
      logger.warn("payments.amount_mismatch", {
        code: "AMOUNT_MISMATCH",
        txRef,
        expected: { amount: toDecimalString(payment.amountCents), currency: payment.currency },
        reported: { amount: result.data.amount, currency: result.data.currency },
      });
      next = "failed";
    }

    const updated = await payments.recordVerification(txRef, {
      status: next,
      processorStatus: result.data.status,
      at,
    });
    if (!updated) throw new NotFoundError("Payment not found", { txRef });

    if (!updated.current && next === "success") {
      logger.warn("payments.superseded_paid", { txRef, bookingId: updated.bookingId, supersededBy: updated.supersededBy });
    }
    if (payment.status !== updated.status) {
      logger.info(`payments.${updated.status}`, { txRef, bookingId: updated.bookingId, from: payment.status });
    }
    // repeated on every paid verification so a confirmation that failed once is retried
    if (updated.status === "success" && deps.onPaid) {
      await deps.onPaid(updated);
    }
    return updated;
  }

  /**
   * Processor notification. The payload is only a pointer: the outcome always comes
   * from a fresh verify, so replays and forged statuses change nothing.
   */
  async function handleWebhook(input: {
    txRef: string | null;
    rawBody?: Buffer | string;
    signature?: string | null;
  }): Promise<PaymentRecord> {
    const secret = deps.webhookSecret;
    if (secret && input.rawBody !== undefined) {
      if (!input.signature || !verifyWebhookSignature(input.rawBody, input.signature, secret)) {
        logger.warn("payments.webhook_bad_signature", { txRef: input.txRef });
        throw new ValidationError("Invalid webhook signature", undefined, "INVALID_SIGNATURE");
      }
    }
    if (!input.txRef) throw new ValidationError("Missing tx_ref");
    return verifyPayment(input.txRef);
  }

  async function listBanks() {
    const result = await processor.listBanks();
    if (result.status === "error") throw new GatewayError(result.message);
    return result.data;
  }

  async function getPayment(txRef: string): Promise<PaymentRecord> {
    const p = await payments.findByTxRef(txRef);
    if (!p) throw new NotFoundError("Payment not found", { txRef });
    return p;
  }

  /** Every attempt for the booking, newest first. */
  function listPaymentsForBooking(bookingId: string): Promise<PaymentRecord[]> {
    return payments.listByBookingId(bookingId);
  }

  async function getPaymentForBooking(bookingId: string): Promise<PaymentRecord> {
    const p = await payments.findByBookingId(bookingId);
    if (!p) throw new NotFoundError("Payment not found", { bookingId });
    return p;
  }

  function toPublicPayment(p: PaymentRecord) {
    return {
      id: p.id,
      bookingId: p.bookingId,
      amount: toDecimalString(p.amountCents),
      amountCents: p.amountCents,
      currency: p.currency,
      txRef: p.txRef,
      transactionId: p.transactionId,
      checkoutUrl: p.checkoutUrl,
      status: p.status,
      verificationAttempts: p.verificationAttempts,
      verifiedAt: p.verifiedAt,
      supersededBy: p.supersededBy,
      customer: p.customer,
      createdAt: p.createdAt,
      updatedAt: p.updatedAt,
    };
  }

  return {
    initializePayment,
    verifyPayment,
    handleWebhook,
    listBanks,
    getPayment,
    getPaymentForBooking,
    listPaymentsForBooking,
    toPublicPayment,
  };
}

export type PaymentService = ReturnType<typeof createPaymentService>;
