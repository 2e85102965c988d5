import type { BookingRecord } from "./store.js";
import { ForbiddenError } from "../../domain/errors.js";
import type { AuthContext } from "../../middlewares/auth.js";
import type { Services } from "../../services.js";

export type BookingActor = {
  booking: BookingRecord;
  isGuest: boolean;
  isHost: boolean;
  isAdmin: boolean;
};

/** Loads a booking for the caller: its guest, the listing's host, or an admin. 404 before 403. */
export async function loadBookingFor(services: Services, bookingId: string, auth: AuthContext): Promise<BookingActor> {
  const booking = await services.bookings.getBooking(bookingId);
  const isAdmin = auth.role === "admin";
  const isGuest = booking.guestId === auth.userId;
  const listing = isAdmin ? null : await services.listings.get(booking.listingId);
  const isHost = listing !== null && listing.hostId === auth.userId;

  if (!isAdmin && !isGuest && !isHost) throw new ForbiddenError("Not a party to this booking");
  return { booking, isGuest, isHost, isAdmin };
}
