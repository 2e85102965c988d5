// src/modules/bookings/service.ts
import { randomUUID } from "crypto";

import {
  canCancel,
  canTransition,
  isCurrent,
  isPast,
  nightsOf,
  priceStay,
  todayOf,
} from "./policy.js";
import type { BookingRecord, BookingStore, Page } from "./store.js";
import { logger } from "../../config/logger.js";
import type { BookingStatus } from "../../domain/enums.js";
import {
  ConflictError,
  NotFoundError,
  PolicyError,
  UnavailableError,
  ValidationError,
} from "../../domain/errors.js";
import { toDecimalString } from "../../domain/money.js";
import { enumerateNights, isDay } from "../../utils/dates.js";
import type { ListingDirectory } from "../listings/service.js";
import type { CalendarLocks } from "../locks/service.js";

export type CreateBookingInput = {
  listingId: string;
  guestId: string;
  checkIn: string; // "YYYY-MM-DD"
  checkOut: string; // "YYYY-MM-DD"
  guests: number;
  contact: { email: string; phone?: string | null };
  specialRequest?: string | null;
};

export type BookingServiceDeps = {
  bookings: BookingStore;
  listings: ListingDirectory;
  locks: CalendarLocks;
  now?: () => Date;
};

export type BookingPage = { page: number; limit: number; items: BookingRecord[]; hasMore: boolean };

const lockReason = (bookingId: string) => `booking:${bookingId}`;

/** How long nights stay held if a create never reaches retag. */
export const HOLD_TTL_MS = 10 * 60 * 1000;

function logTransition(b: BookingRecord, from: BookingStatus | null, actorId?: string) {
  logger.info(`booking.${b.status}`, {
    bookingId: b.id,
    listingId: b.listingId,
    from,
    to: b.status,
    actorId,
  });
}

export function createBookingService(deps: BookingServiceDeps) {
  const { bookings, listings, locks } = deps;
  const now = deps.now ?? (() => new Date());
  const today = () => todayOf(now());

  async function getBooking(id: string): Promise<BookingRecord> {
    const b = await bookings.findById(id);
    if (!b) throw new NotFoundError("Booking not found", { bookingId: id });
    return b;
  }

  function findBooking(id: string): Promise<BookingRecord | null> {
    return bookings.findById(id);
  }

  async function createBooking(input: CreateBookingInput): Promise<BookingRecord> {
    const { listingId, checkIn, checkOut } = input;

    if (!isDay(checkIn) || !isDay(checkOut)) {
      throw new ValidationError("Dates must be calendar days (YYYY-MM-DD)", { checkIn, checkOut });
    }
    if (checkOut <= checkIn) {
      throw new ValidationError("Check-out date must be after check-in date", { checkIn, checkOut });
    }
    if (checkIn < today()) {
      throw new ValidationError("Check-in date cannot be in the past", { checkIn });
    }

    const listing = await listings.get(listingId);
    if (!listing) throw new NotFoundError("Listing not found", { listingId });
    if (!listing.available) throw new UnavailableError(undefined, { listingId });

    if (!Number.isInteger(input.guests) || input.guests < 1) {
      throw new ValidationError("Number of guests must be a positive integer", { guests: input.guests });
    }
    if (input.guests > listing.maxGuests) {
      throw new ValidationError(
        `Number of guests (${input.guests}) exceeds maximum capacity (${listing.maxGuests})`,
        { guests: input.guests, maxGuests: listing.maxGuests }
      );
    }

    const clashes = await bookings.findActiveOverlapping(listingId, checkIn, checkOut);
    if (clashes.length) {
      throw new ConflictError("Listing is already booked for the selected dates", {
        listingId,
        conflicts: clashes.map((c) => ({ checkIn: c.checkIn, checkOut: c.checkOut })),
      });
    }

    const { totalCents } = priceStay(listing.pricePerNightCents, { checkIn, checkOut });

    // lock rows are unique per (listing, night): of two writers past the probe, one wins
    const hold = `hold:${randomUUID()}`;
    const nights = enumerateNights(checkIn, checkOut);
    await locks.lock({ listingId, nights, reason: hold, holdUntil: new Date(now().getTime() + HOLD_TTL_MS) });

    let created: BookingRecord;
    try {
      created = await bookings.create({
        listingId,
        guestId: input.guestId,
        checkIn,
        checkOut,
        guests: input.guests,
        totalCents,
        specialRequest: input.specialRequest?.trim() || null,
        contact: { email: input.contact.email, phone: input.contact.phone ?? null },
      });
    } catch (err) {
      await locks.release(listingId, hold);
      throw err;
    }

    // a booking never outlives its calendar rows
    try {
      const kept = await locks.retag(listingId, hold, lockReason(created.id));
      if (kept !== nights.length) {
        throw new ConflictError("Requested dates are no longer available", { listingId, held: kept });
      }
    } catch (err) {
      await bookings.delete(created.id);
      await locks.release(listingId, hold);
      await locks.release(listingId, lockReason(created.id));
      throw err;
    }

    logTransition(created, null, input.guestId);
    return created;
  }

  async function cancelBooking(id: string, actorId?: string): Promise<BookingRecord> {
    const b = await getBooking(id);
    if (!canCancel(b, today())) {
      throw new PolicyError(
        "Booking can only be cancelled while pending or confirmed and more than 24 hours before check-in",
        { bookingId: b.id, status: b.status, checkIn: b.checkIn }
      );
    }

    const updated = await bookings.updateStatus(b.id, b.status, "cancelled");
    if (!updated) throw new ConflictError("Booking status changed concurrently", { bookingId: b.id });

    await locks.release(b.listingId, lockReason(b.id));
    logTransition(updated, b.status, actorId);
    return updated;
  }

  async function transitionStatus(
    id: string,
    target: BookingStatus,
    actorId?: string
  ): Promise<BookingRecord> {
    const b = await getBooking(id);
    if (!canTransition(b.status, target)) {
      throw new ValidationError(
        `Cannot move booking from ${b.status} to ${target}`,
        { from: b.status, to: target },
        "INVALID_TRANSITION"
      );
    }
    if (target === "cancelled") return cancelBooking(id, actorId);

    const updated = await bookings.updateStatus(b.id, b.status, target);
    if (!updated) throw new ConflictError("Booking status changed concurrently", { bookingId: b.id });

    // a concluded stay no longer holds the calendar
    if (target === "completed") await locks.release(b.listingId, lockReason(b.id));

    logTransition(updated, b.status, actorId);
    return updated;
  }

  /** Confirms a pending booking; anything else is left as it is. */
  async function confirmIfPending(id: string): Promise<BookingRecord | null> {
    const b = await bookings.findById(id);
    if (!b || b.status !== "pending") return null;
    const updated = await bookings.updateStatus(b.id, "pending", "confirmed");
    if (updated) logTransition(updated, "pending");
    return updated;
  }

  async function deleteBooking(id: string, actorId?: string): Promise<void> {
    const b = await getBooking(id);
    await bookings.delete(b.id);
    await locks.release(b.listingId, lockReason(b.id));
    logger.info("booking.deleted", { bookingId: b.id, listingId: b.listingId, actorId });
  }

  async function listForListing(listingId: string, page: Page): Promise<BookingPage> {
    const listing = await listings.get(listingId);
    if (!listing) throw new NotFoundError("Listing not found", { listingId });
    const items = await bookings.listByListing(listingId, page);
    return { ...page, items, hasMore: items.length === page.limit };
  }

  async function listForGuest(guestId: string, page: Page): Promise<BookingPage> {
    const items = await bookings.listByGuest(guestId, page);
    return { ...page, items, hasMore: items.length === page.limit };
  }

  /** Public shape for API responses; predicates are computed against `now`. */
  function toPublicBooking(b: BookingRecord) {
    const day = today();
    return {
      id: b.id,
      listingId: b.listingId,
      guestId: b.guestId,
      checkIn: b.checkIn,
      checkOut: b.checkOut,
      nights: nightsOf(b),
      guests: b.guests,
      totalPrice: toDecimalString(b.totalCents),
      totalCents: b.totalCents,
      status: b.status,
      specialRequest: b.specialRequest,
      contact: b.contact,
      isPast: isPast(b, day),
      isCurrent: isCurrent(b, day),
      canCancel: canCancel(b, day),
      createdAt: b.createdAt,
      updatedAt: b.updatedAt,
    };
  }

  return {
    findBooking,
    getBooking,
    createBooking,
    cancelBooking,
    transitionStatus,
    confirmIfPending,
    deleteBooking,
    listForListing,
    listForGuest,
    toPublicBooking,
  };
}

export type BookingService = ReturnType<typeof createBookingService>;
