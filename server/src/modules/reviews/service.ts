import mongoose from "mongoose";

import { Review } from "./model.js";
import { connectMongo } from "../../config/db.js";
import { NotFoundError } from "../../domain/errors.js";
import type { ListingDirectory } from "../listings/service.js";

export type RatingAggregate = { reviewCount: number; ratingSum: number };

/** Read side of the review collection. Aggregates are computed per query, never cached. */
export interface ReviewCollection {
  /** All reviews when listingId is omitted. */
  aggregate(listingId?: string): Promise<RatingAggregate>;
}

export type RatingSummary = { listingId: string; reviewCount: number; averageRating: number };

/** Mean of 1..5 star ratings, two decimals; 0 when there is nothing to average. */
export function averageOf(agg: RatingAggregate): number {
  if (agg.reviewCount === 0) return 0;
  return Math.round((agg.ratingSum / agg.reviewCount) * 100) / 100;
}

export const mongoReviewCollection: ReviewCollection = {
  async aggregate(listingId) {
    if (listingId !== undefined && !mongoose.isValidObjectId(listingId)) {
      return { reviewCount: 0, ratingSum: 0 };
    }
    await connectMongo();
    const match = listingId ? { listingId: new mongoose.Types.ObjectId(listingId) } : {};
    const [row] = await Review.aggregate<{ n: number; sum: number }>([
      { $match: match },
      { $group: { _id: null, n: { $sum: 1 }, sum: { $sum: "$rating" } } },
    ]);
    return { reviewCount: row?.n ?? 0, ratingSum: row?.sum ?? 0 };
  },
};

export function createReviewService(deps: { reviews: ReviewCollection; listings: ListingDirectory }) {
  async function ratingSummary(listingId: string): Promise<RatingSummary> {
    const listing = await deps.listings.get(listingId);
    if (!listing) throw new NotFoundError("Listing not found", { listingId });
    const agg = await deps.reviews.aggregate(listing.id);
    return { listingId: listing.id, reviewCount: agg.reviewCount, averageRating: averageOf(agg) };
  }

  return { ratingSummary };
}

export type ReviewService = ReturnType<typeof createReviewService>;
