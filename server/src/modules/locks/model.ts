import mongoose, { Schema, type Model } from "mongoose";

/**
 * BookingLock
 * - One row per (listingId, night)
 * - night is a day bucket "YYYY-MM-DD"; a stay from 09-01 to 09-03 holds 09-01 and 09-02
 * - reason is "hold:<uuid>" while a booking is being written, "booking:<id>" afterwards
 * - holdUntil is set only on holds; the TTL index drops a hold that was never retagged
 */
export interface BookingLockDoc extends mongoose.Document {
  listingId: mongoose.Types.ObjectId;
  night: string;
  reason: string;
  holdUntil?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const BookingLockSchema = new Schema<BookingLockDoc>(
  {
    listingId: { type: Schema.Types.ObjectId, ref: "Listing", required: true },
    night: { type: String, required: true, trim: true },
    reason: { type: String, required: true },
    holdUntil: { type: Date },
  },
  { timestamps: true }
);

/** Prevent double-booking a night for a listing */
BookingLockSchema.index({ listingId: 1, night: 1 }, { unique: true });

BookingLockSchema.index({ listingId: 1, reason: 1 });

/** TTL: Mongo removes expired holds about once a minute */
BookingLockSchema.index({ holdUntil: 1 }, { expireAfterSeconds: 0 });

export const BookingLock: Model<BookingLockDoc> =
  mongoose.models.BookingLock || mongoose.model<BookingLockDoc>("BookingLock", BookingLockSchema);
