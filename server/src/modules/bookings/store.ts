import mongoose from "mongoose";

import { Booking, type BookingDoc } from "./model.js";
import { connectMongo } from "../../config/db.js";
import {
  ACTIVE_BOOKING_STATUSES,
  BOOKING_STATUSES,
  type BookingStatus,
} from "../../domain/enums.js";
import { dayBucket, dayToDate } from "../../utils/dates.js";

/** Plain booking record; days are "YYYY-MM-DD". */
export type BookingRecord = {
  id: string;
  listingId: string;
  guestId: string;
  checkIn: string;
  checkOut: string;
  guests: number;
  totalCents: number;
  status: BookingStatus;
  specialRequest: string | null;
  contact: { email: string; phone: string | null };
  createdAt: Date;
  updatedAt: Date;
};

export type NewBooking = Omit<BookingRecord, "id" | "status" | "createdAt" | "updatedAt">;

export type Page = { page: number; limit: number };

export type StatusCounts = Record<BookingStatus, number>;

export interface BookingStore {
  create(input: NewBooking): Promise<BookingRecord>;
  findById(id: string): Promise<BookingRecord | null>;
  /** pending/confirmed bookings on the listing whose [checkIn, checkOut) intersects the range */
  findActiveOverlapping(listingId: string, checkIn: string, checkOut: string): Promise<BookingRecord[]>;
  /** Compare-and-set: writes `to` only while the stored status is still `from`. */
  updateStatus(id: string, from: BookingStatus, to: BookingStatus): Promise<BookingRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Newest first. */
  listByListing(listingId: string, page: Page): Promise<BookingRecord[]>;
  /** Newest first. */
  listByGuest(guestId: string, page: Page): Promise<BookingRecord[]>;
  countByStatus(filter?: { listingId?: string }): Promise<StatusCounts>;
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, confirmed: 0, cancelled: 0, completed: 0 };
}

export function toBookingRecord(b: BookingDoc): BookingRecord {
  return {
    id: b.id,
    listingId: b.listingId.toString(),
    guestId: b.guestId.toString(),
    checkIn: dayBucket(b.checkIn),
    checkOut: dayBucket(b.checkOut),
    guests: b.guests,
    totalCents: b.totalCents,
    status: b.status,
    specialRequest: b.specialRequest ?? null,
    contact: { email: b.contact.email, phone: b.contact.phone ?? null },
    createdAt: b.createdAt,
    updatedAt: b.updatedAt,
  };
}

const oid = (id: string) => new mongoose.Types.ObjectId(id);

export const mongoBookingStore: BookingStore = {
  async create(input) {
    await connectMongo();
    const doc = await Booking.create({
      listingId: oid(input.listingId),
      guestId: oid(input.guestId),
      checkIn: dayToDate(input.checkIn),
      checkOut: dayToDate(input.checkOut),
      guests: input.guests,
      totalCents: input.totalCents,
      status: "pending",
      specialRequest: input.specialRequest,
      contact: input.contact,
    });
    return toBookingRecord(doc);
  },

  async findById(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    await connectMongo();
    const doc = await Booking.findById(id).exec();
    return doc ? toBookingRecord(doc) : null;
  },

  async findActiveOverlapping(listingId, checkIn, checkOut) {
    await connectMongo();
    const docs = await Booking.find({
      listingId: oid(listingId),
      status: { $in: ACTIVE_BOOKING_STATUSES },
      checkIn: { $lt: dayToDate(checkOut) },
      checkOut: { $gt: dayToDate(checkIn) },
    }).exec();
    return docs.map(toBookingRecord);
  },

  async updateStatus(id, from, to) {
    if (!mongoose.isValidObjectId(id)) return null;
    await connectMongo();
    const doc = await Booking.findOneAndUpdate(
      { _id: oid(id), status: from },
      { $set: { status: to } },
      { new: true }
    ).exec();
    return doc ? toBookingRecord(doc) : null;
  },

  async delete(id) {
    if (!mongoose.isValidObjectId(id)) return false;
    await connectMongo();
    const res = await Booking.deleteOne({ _id: oid(id) }).exec();
    return res.deletedCount === 1;
  },

  async listByListing(listingId, { page, limit }) {
    if (!mongoose.isValidObjectId(listingId)) return [];
    await connectMongo();
    const docs = await Booking.find({ listingId: oid(listingId) })
      .sort({ createdAt: -1, _id: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .exec();
    return docs.map(toBookingRecord);
  },

  async listByGuest(guestId, { page, limit }) {
    if (!mongoose.isValidObjectId(guestId)) return [];
    await connectMongo();
    const docs = await Booking.find({ guestId: oid(guestId) })
      .sort({ createdAt: -1, _id: -1 })
      .skip((page - 1) * limit)
      .limit(limit)
      .exec();
    return docs.map(toBookingRecord);
  },

  async countByStatus(filter) {
    await connectMongo();
    const match: Record<string, unknown> = {};
    if (filter?.listingId) {
      if (!mongoose.isValidObjectId(filter.listingId)) return emptyStatusCounts();
      match.listingId = oid(filter.listingId);
    }
    const rows = await Booking.aggregate<{ _id: string; n: number }>([
      { $match: match },
      { $group: { _id: "$status", n: { $sum: 1 } } },
    ]);
    const out = emptyStatusCounts();
    for (const r of rows) {
      const status = BOOKING_STATUSES.find((s) => s === r._id);
      if (status) out[status] = r.n;
    }
    return out;
  },
};
