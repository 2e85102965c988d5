import mongoose, { Schema, type Model } from "mongoose";

import { PAYMENT_STATUSES, type PaymentStatus } from "../../domain/enums.js";

const CustomerSchema = new Schema(
  {
    name: { type: String, required: true, trim: true },
    email: { type: String, required: true, trim: true, lowercase: true },
    phone: { type: String, trim: true, default: null },
  },
  { _id: false }
);

export interface PaymentDoc extends mongoose.Document {
  bookingId: mongoose.Types.ObjectId;
  amountCents: number;
  currency: string;

  /** Our reference, sent to the processor as tx_ref. Set once. */
  txRef: string;
  /** Processor-side id, when the processor returns one. Set once. */
  transactionId: string | null;
  checkoutUrl: string;

  status: PaymentStatus;
  lastProcessorStatus: string | null;
  verificationAttempts: number;
  verifiedAt: Date | null;

  /** false once a retry replaced this attempt; its status is then frozen */
  current: boolean;
  supersededBy: string | null;

  customer: { name: string; email: string; phone: string | null };
  createdAt: Date;
  updatedAt: Date;
}

const PaymentSchema = new Schema<PaymentDoc>(
  {
    bookingId: { type: Schema.Types.ObjectId, ref: "Booking", required: true },
    amountCents: { type: Number, required: true, min: 1 },
    currency: { type: String, required: true, uppercase: true, minlength: 3, maxlength: 3 },

    txRef: { type: String, required: true, immutable: true },
    transactionId: { type: String, default: null, immutable: true },
    checkoutUrl: { type: String, required: true, immutable: true },

    status: { type: String, enum: PAYMENT_STATUSES, default: "initialized", index: true },
    lastProcessorStatus: { type: String, default: null },
    verificationAttempts: { type: Number, default: 0, min: 0 },
    verifiedAt: { type: Date, default: null },

    current: { type: Boolean, default: true },
    supersededBy: { type: String, default: null },

    customer: { type: CustomerSchema, required: true },
  },
  { timestamps: true }
);

/** One live payment per booking; replaced attempts stay for the record */
PaymentSchema.index({ bookingId: 1 }, { unique: true, partialFilterExpression: { current: true } });
PaymentSchema.index({ bookingId: 1, createdAt: -1 });
PaymentSchema.index({ txRef: 1 }, { unique: true });

export const Payment: Model<PaymentDoc> =
  mongoose.models.Payment || mongoose.model<PaymentDoc>("Payment", PaymentSchema);
