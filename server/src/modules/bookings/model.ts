import mongoose, { Schema, type Model } from "mongoose";

import { BOOKING_STATUSES, type BookingStatus } from "../../domain/enums.js";

const ContactSchema = new Schema(
  {
    email: { type: String, required: true, trim: true, lowercase: true },
    phone: { type: String, trim: true, maxlength: 20, default: null },
  },
  { _id: false }
);

export interface BookingDoc extends mongoose.Document {
  listingId: mongoose.Types.ObjectId;
  guestId: mongoose.Types.ObjectId;

  /** UTC midnight of the first night */
  checkIn: Date;
  /** UTC midnight of the departure day (exclusive) */
  checkOut: Date;
  guests: number;

  /** nights x nightly price, frozen when the booking is written */
  totalCents: number;

  status: BookingStatus;
  specialRequest: string | null;
  contact: { email: string; phone: string | null };

  createdAt: Date;
  updatedAt: Date;
}

const BookingSchema = new Schema<BookingDoc>(
  {
    listingId: { type: Schema.Types.ObjectId, ref: "Listing", required: true },
    guestId: { type: Schema.Types.ObjectId, ref: "User", required: true },

    checkIn: { type: Date, required: true },
    checkOut: { type: Date, required: true },
    guests: { type: Number, required: true, min: 1 },

    totalCents: { type: Number, required: true, min: 0 },

    status: { type: String, enum: BOOKING_STATUSES, default: "pending", index: true },
    specialRequest: { type: String, maxlength: 2000, default: null },
    contact: { type: ContactSchema, required: true },
  },
  { timestamps: true }
);

BookingSchema.pre("validate", function (next) {
  if (this.checkIn >= this.checkOut) {
    return next(new Error("checkOut must be after checkIn"));
  }
  next();
});

// Overlap probe + calendar views
BookingSchema.index({ listingId: 1, status: 1, checkIn: 1, checkOut: 1 });
// "my trips", newest first
BookingSchema.index({ guestId: 1, createdAt: -1 });
BookingSchema.index({ listingId: 1, createdAt: -1 });

export const Booking: Model<BookingDoc> =
  mongoose.models.Booking || mongoose.model<BookingDoc>("Booking", BookingSchema);
