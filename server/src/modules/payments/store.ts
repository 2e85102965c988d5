import mongoose from "mongoose";

import { Payment, type PaymentDoc } from "./model.js";
import { connectMongo, isDuplicateKeyError } from "../../config/db.js";
import { PAYMENT_STATUSES, type PaymentStatus } from "../../domain/enums.js";
import { ConflictError } from "../../domain/errors.js";

export type PaymentRecord = {
  id: string;
  bookingId: string;
  amountCents: number;
  currency: string;
  txRef: string;
  transactionId: string | null;
  checkoutUrl: string;
  status: PaymentStatus;
  lastProcessorStatus: string | null;
  verificationAttempts: number;
  verifiedAt: Date | null;
  current: boolean;
  supersededBy: string | null;
  customer: { name: string; email: string; phone: string | null };
  createdAt: Date;
  updatedAt: Date;
};

export type NewPayment = Pick<
  PaymentRecord,
  "bookingId" | "amountCents" | "currency" | "txRef" | "transactionId" | "checkoutUrl" | "customer"
>;

/** status null: the processor could not be asked; only the attempt is recorded. */
export type VerificationUpdate = {
  status: PaymentStatus | null;
  processorStatus: string | null;
  at: Date;
};

export type PaymentStatusCounts = Record<PaymentStatus, number>;

export interface PaymentStore {
  /** Throws ConflictError when the booking already has a current payment. */
  create(input: NewPayment): Promise<PaymentRecord>;
  findByTxRef(txRef: string): Promise<PaymentRecord | null>;
  /** The booking's current payment. */
  findByBookingId(bookingId: string): Promise<PaymentRecord | null>;
  /** Every attempt for the booking, newest first. */
  listByBookingId(bookingId: string): Promise<PaymentRecord[]>;
  /** Retires a current payment in favour of `byTxRef`; false when it was already retired. */
  supersede(id: string, byTxRef: string): Promise<boolean>;
  /**
   * Bumps verificationAttempts and verifiedAt, and applies `status`.
   * A stored `success` is never replaced; a superseded payment keeps its status.
   */
  recordVerification(txRef: string, update: VerificationUpdate): Promise<PaymentRecord | null>;
  countByStatus(): Promise<PaymentStatusCounts>;
}

export function emptyPaymentCounts(): PaymentStatusCounts {
  return { initialized: 0, pending: 0, success: 0, failed: 0 };
}

export function toPaymentRecord(p: PaymentDoc): PaymentRecord {
  return {
    id: p.id,
    bookingId: p.bookingId.toString(),
    amountCents: p.amountCents,
    currency: p.currency,
    txRef: p.txRef,
    transactionId: p.transactionId ?? null,
    checkoutUrl: p.checkoutUrl,
    status: p.status,
    lastProcessorStatus: p.lastProcessorStatus ?? null,
    verificationAttempts: p.verificationAttempts,
    verifiedAt: p.verifiedAt ?? null,
    current: p.current,
    supersededBy: p.supersededBy ?? null,
    customer: { name: p.customer.name, email: p.customer.email, phone: p.customer.phone ?? null },
    createdAt: p.createdAt,
    updatedAt: p.updatedAt,
  };
}

export const mongoPaymentStore: PaymentStore = {
  async create(input) {
    await connectMongo();
    try {
      const doc = await Payment.create({
        ...input,
        bookingId: new mongoose.Types.ObjectId(input.bookingId),
        status: "initialized",
      });
      return toPaymentRecord(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new ConflictError("Booking already has a current payment", { bookingId: input.bookingId });
      }
      throw err;
    }
  },

  async findByTxRef(txRef) {
    await connectMongo();
    const doc = await Payment.findOne({ txRef }).exec();
    return doc ? toPaymentRecord(doc) : null;
  },

  async findByBookingId(bookingId) {
    if (!mongoose.isValidObjectId(bookingId)) return null;
    await connectMongo();
    const doc = await Payment.findOne({ bookingId: new mongoose.Types.ObjectId(bookingId), current: true }).exec();
    return doc ? toPaymentRecord(doc) : null;
  },

  async listByBookingId(bookingId) {
    if (!mongoose.isValidObjectId(bookingId)) return [];
    await connectMongo();
    const docs = await Payment.find({ bookingId: new mongoose.Types.ObjectId(bookingId) })
      .sort({ createdAt: -1, _id: -1 })
      .exec();
    return docs.map(toPaymentRecord);
  },

  async supersede(id, byTxRef) {
    if (!mongoose.isValidObjectId(id)) return false;
    await connectMongo();
    const res = await Payment.updateOne(
      { _id: new mongoose.Types.ObjectId(id), current: true },
      { $set: { current: false, supersededBy: byTxRef } }
    ).exec();
    return res.modifiedCount === 1;
  },

  async recordVerification(txRef, update) {
    await connectMongo();
    const stamp = { verifiedAt: update.at, ...(update.processorStatus ? { lastProcessorStatus: update.processorStatus } : {}) };
    const inc = { verificationAttempts: 1 };

    if (update.status) {
      // conditional write: a concurrent or earlier success always wins
      const filter =
        update.status === "success"
          ? { txRef, current: true }
          : { txRef, current: true, status: { $ne: "success" } };
      const doc = await Payment.findOneAndUpdate(
        filter,
        { $set: { ...stamp, status: update.status }, $inc: inc },
        { new: true }
      ).exec();
      if (doc) return toPaymentRecord(doc);
    }

    const doc = await Payment.findOneAndUpdate({ txRef }, { $set: stamp, $inc: inc }, { new: true }).exec();
    return doc ? toPaymentRecord(doc) : null;
  },

  async countByStatus() {
    await connectMongo();
    const rows = await Payment.aggregate<{ _id: string; n: number }>([
      { $group: { _id: "$status", n: { $sum: 1 } } },
    ]);
    const out = emptyPaymentCounts();
    for (const r of rows) {
      const status = PAYMENT_STATUSES.find((s) => s === r._id);
      if (status) out[status] = r.n;
    }
    return out;
  },
};
