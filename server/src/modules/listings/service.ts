import mongoose from "mongoose";

import { Listing, type ListingDoc } from "./model.js";
import { connectMongo } from "../../config/db.js";

/** What the booking engine needs to know about a listing. Read-only from its side. */
export type ListingSummary = {
  id: string;
  hostId: string;
  title: string;
  pricePerNightCents: number;
  maxGuests: number;
  available: boolean;
};

export interface ListingDirectory {
  get(id: string): Promise<ListingSummary | null>;
}

export function toListingSummary(l: ListingDoc): ListingSummary {
  return {
    id: l.id,
    hostId: l.hostId.toString(),
    title: l.title,
    pricePerNightCents: l.pricePerNightCents,
    maxGuests: l.maxGuests,
    available: l.available,
  };
}

export const mongoListingDirectory: ListingDirectory = {
  async get(id) {
    if (!mongoose.isValidObjectId(id)) return null;
    await connectMongo();
    const doc = await Listing.findById(id).exec();
    return doc ? toListingSummary(doc) : null;
  },
};
