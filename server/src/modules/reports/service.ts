// src/modules/reports/service.ts
/** Admin read models: booking/payment/review counts, computed at query time. */
import { NotFoundError } from "../../domain/errors.js";
import type { BookingStore, StatusCounts } from "../bookings/store.js";
import type { ListingDirectory } from "../listings/service.js";
import type { PaymentStatusCounts, PaymentStore } from "../payments/store.js";
import { averageOf, type ReviewCollection } from "../reviews/service.js";

export type ReportDeps = {
  bookings: Pick<BookingStore, "countByStatus">;
  payments: Pick<PaymentStore, "countByStatus">;
  reviews: ReviewCollection;
  listings: ListingDirectory;
};

export type ListingReport = {
  listingId: string;
  bookingCount: number;
  bookingsByStatus: StatusCounts;
  reviewCount: number;
  averageRating: number;
};

export type Overview = {
  bookingCount: number;
  bookingsByStatus: StatusCounts;
  paymentsByStatus: PaymentStatusCounts;
  reviewCount: number;
  averageRating: number;
};

const sum = (counts: Record<string, number>) => Object.values(counts).reduce((a, n) => a + n, 0);

export function createReportService(deps: ReportDeps) {
  async function listingReport(listingId: string): Promise<ListingReport> {
    const listing = await deps.listings.get(listingId);
    if (!listing) throw new NotFoundError("Listing not found", { listingId });

    const [bookingsByStatus, reviews] = await Promise.all([
      deps.bookings.countByStatus({ listingId: listing.id }),
      deps.reviews.aggregate(listing.id),
    ]);
    return {
      listingId: listing.id,
      bookingCount: sum(bookingsByStatus),
      bookingsByStatus,
      reviewCount: reviews.reviewCount,
      averageRating: averageOf(reviews),
    };
  }

  async function overview(): Promise<Overview> {
    const [bookingsByStatus, paymentsByStatus, reviews] = await Promise.all([
      deps.bookings.countByStatus(),
      deps.payments.countByStatus(),
      deps.reviews.aggregate(),
    ]);
    return {
      bookingCount: sum(bookingsByStatus),
      bookingsByStatus,
      paymentsByStatus,
      reviewCount: reviews.reviewCount,
      averageRating: averageOf(reviews),
    };
  }

  return { listingReport, overview };
}

export type ReportService = ReturnType<typeof createReportService>;
