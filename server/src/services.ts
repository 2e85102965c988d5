// server/src/services.ts
/** Composition root: stores -> services. Routers only ever see the Services bag. */
import { env, paymentCallbackUrl, paymentReturnUrl } from "./config/env.js";
import { createBookingService, type BookingService } from "./modules/bookings/service.js";
import { mongoBookingStore, type BookingStore } from "./modules/bookings/store.js";
import { mongoListingDirectory, type ListingDirectory } from "./modules/listings/service.js";
import { mongoCalendarLocks, type CalendarLocks } from "./modules/locks/service.js";
import { createHttpProcessor, type PaymentProcessor } from "./modules/payments/gateway.js";
import { createPaymentService, type PaymentService } from "./modules/payments/service.js";
import { mongoPaymentStore, type PaymentStore } from "./modules/payments/store.js";
import { createReportService, type ReportService } from "./modules/reports/service.js";
import {
  createReviewService,
  mongoReviewCollection,
  type ReviewCollection,
  type ReviewService,
} from "./modules/reviews/service.js";
import type { IdempotencyCache } from "./utils/idempotency.js";
import { newTxRef } from "./utils/ids.js";

export type Stores = {
  bookings: BookingStore;
  listings: ListingDirectory;
  locks: CalendarLocks;
  payments: PaymentStore;
  reviews: ReviewCollection;
};

export type Services = {
  listings: ListingDirectory;
  bookings: BookingService;
  payments: PaymentService;
  reviews: ReviewService;
  reports: ReportService;
  /** Replay store for X-Idempotency-Key; Redis when absent. */
  idempotency?: IdempotencyCache;
};

export type ServiceOptions = {
  processor?: PaymentProcessor;
  idempotency?: IdempotencyCache;
  now?: () => Date;
  webhookSecret?: string;
};

export function createServices(stores: Stores, opts: ServiceOptions = {}): Services {
  const bookings = createBookingService({
    bookings: stores.bookings,
    listings: stores.listings,
    locks: stores.locks,
    now: opts.now,
  });

  const payments = createPaymentService({
    payments: stores.payments,
    bookings: stores.bookings,
    listings: stores.listings,
    processor:
      opts.processor ??
      createHttpProcessor({
        baseUrl: env.PAYMENT_BASE_URL,
        secretKey: env.PAYMENT_SECRET_KEY,
        timeoutMs: env.PAYMENT_TIMEOUT_MS,
      }),
    newTxRef,
    urls: { callbackUrl: paymentCallbackUrl(), returnUrl: paymentReturnUrl() },
    defaultCurrency: env.PAYMENT_DEFAULT_CURRENCY,
    webhookSecret: opts.webhookSecret ?? env.PAYMENT_WEBHOOK_SECRET,
    // paid -> confirmed
    onPaid: (p) => bookings.confirmIfPending(p.bookingId),
    now: opts.now,
  });

  return {
    listings: stores.listings,
    bookings,
    payments,
    reviews: createReviewService({ reviews: stores.reviews, listings: stores.listings }),
    reports: createReportService(stores),
    idempotency: opts.idempotency,
  };
}

export function mongoServices(opts: ServiceOptions = {}): Services {
  return createServices(
    {
      bookings: mongoBookingStore,
      listings: mongoListingDirectory,
      locks: mongoCalendarLocks,
      payments: mongoPaymentStore,
      reviews: mongoReviewCollection,
    },
    opts
  );
}
