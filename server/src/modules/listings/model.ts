import mongoose, { Schema, type Model } from "mongoose";

import { PROPERTY_TYPES, type PropertyType } from "../../domain/enums.js";

export interface ListingDoc extends mongoose.Document {
  hostId: mongoose.Types.ObjectId;
  title: string;
  description: string;
  location: string;
  propertyType: PropertyType;

  /** Nightly price in integer cents, e.g. 10000 => 100.00/night */
  pricePerNightCents: number;
  maxGuests: number;
  bedrooms: number;
  bathrooms: number;
  amenities: string[];
  houseRules?: string;

  latitude?: number;
  longitude?: number;

  available: boolean;
  instantBook: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const ListingSchema = new Schema<ListingDoc>(
  {
    hostId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    title: { type: String, required: true, trim: true, maxlength: 200 },
    description: { type: String, required: true },
    location: { type: String, required: true, trim: true, maxlength: 200 },
    propertyType: { type: String, enum: PROPERTY_TYPES, default: "apartment" },

    pricePerNightCents: {
      type: Number,
      required: true,
      min: 1,
      validate: { validator: Number.isInteger, message: "pricePerNightCents must be an integer" },
    },
    maxGuests: { type: Number, required: true, min: 1, max: 50 },
    bedrooms: { type: Number, default: 1, min: 1 },
    bathrooms: { type: Number, default: 1, min: 1 },
    amenities: { type: [String], default: [] },
    houseRules: { type: String },

    latitude: { type: Number, min: -90, max: 90 },
    longitude: { type: Number, min: -180, max: 180 },

    available: { type: Boolean, default: true, index: true },
    instantBook: { type: Boolean, default: false },
  },
  { timestamps: true, toJSON: { virtuals: true }, toObject: { virtuals: true } }
);

/** Amenities arrive as "WiFi, Kitchen" from older clients; keep them as a clean list. */
ListingSchema.pre("validate", function (next) {
  this.amenities = (this.amenities ?? []).map((a) => a.trim()).filter(Boolean);
  next();
});

ListingSchema.index({ location: 1 });
ListingSchema.index({ pricePerNightCents: 1 });
ListingSchema.index({ propertyType: 1 });

export const Listing: Model<ListingDoc> =
  mongoose.models.Listing || mongoose.model<ListingDoc>("Listing", ListingSchema);
