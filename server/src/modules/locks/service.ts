import mongoose from "mongoose";

import { BookingLock } from "./model.js";
import { connectMongo, isDuplicateKeyError } from "../../config/db.js";
import { ConflictError } from "../../domain/errors.js";

export type LockNightsInput = {
  listingId: string;
  nights: string[]; // "YYYY-MM-DD"
  reason: string;
  /** temporary hold: expires unless retagged first */
  holdUntil?: Date;
};

/**
 * Per-listing calendar. lock() is all-or-nothing: when any night is already held it
 * releases whatever it wrote under `reason` and throws ConflictError. retag() makes
 * a hold permanent.
 */
export interface CalendarLocks {
  lock(input: LockNightsInput): Promise<void>;
  release(listingId: string, reason: string): Promise<number>;
  retag(listingId: string, fromReason: string, toReason: string): Promise<number>;
}

export const mongoCalendarLocks: CalendarLocks = {
  async lock(input) {
    await connectMongo();
    const listingId = new mongoose.Types.ObjectId(input.listingId);
    const docs = input.nights.map((night) => ({
      listingId,
      night,
      reason: input.reason,
      ...(input.holdUntil ? { holdUntil: input.holdUntil } : {}),
    }));

    // a lapsed hold may still be waiting for the TTL sweep
    await BookingLock.deleteMany({ listingId, night: { $in: input.nights }, holdUntil: { $lte: new Date() } });

    try {
      await BookingLock.insertMany(docs, { ordered: true });
    } catch (err) {
      if (!isDuplicateKeyError(err)) throw err;
      // ordered insert stops at the first duplicate; drop the partial hold
      await BookingLock.deleteMany({ listingId, reason: input.reason });
      throw new ConflictError("Requested dates are no longer available", {
        listingId: input.listingId,
      });
    }
  },

  async release(listingId, reason) {
    await connectMongo();
    const res = await BookingLock.deleteMany({
      listingId: new mongoose.Types.ObjectId(listingId),
      reason,
    });
    return res.deletedCount ?? 0;
  },

  async retag(listingId, fromReason, toReason) {
    await connectMongo();
    const res = await BookingLock.updateMany(
      { listingId: new mongoose.Types.ObjectId(listingId), reason: fromReason },
      { $set: { reason: toReason }, $unset: { holdUntil: "" } }
    );
    return res.modifiedCount ?? 0;
  },
};
