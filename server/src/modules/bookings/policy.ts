// src/modules/bookings/policy.ts
/** Pure booking rules: transition graph, pricing, overlap and the derived date predicates. */
import { ACTIVE_BOOKING_STATUSES, type BookingStatus } from "../../domain/enums.js";
import { multiplyCents } from "../../domain/money.js";
import { addDays, dayBucket, diffDays } from "../../utils/dates.js";

export const TRANSITIONS: Readonly<Record<BookingStatus, readonly BookingStatus[]>> = {
  pending: ["confirmed", "cancelled"],
  confirmed: ["cancelled", "completed"],
  cancelled: [],
  completed: [],
};

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: BookingStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isActive(status: BookingStatus): boolean {
  return ACTIVE_BOOKING_STATUSES.includes(status);
}

type Stay = { checkIn: string; checkOut: string };

/** Half-open ranges: a checkout on day N and a check-in on day N do not collide. */
export function rangesOverlap(a: Stay, b: Stay): boolean {
  return a.checkIn < b.checkOut && a.checkOut > b.checkIn;
}

export function nightsOf(stay: Stay): number {
  return diffDays(stay.checkIn, stay.checkOut);
}

export function priceStay(pricePerNightCents: number, stay: Stay) {
  const nights = nightsOf(stay);
  return { nights, totalCents: multiplyCents(pricePerNightCents, nights) };
}

/** Calendar day (UTC) of an instant. */
export function todayOf(now: Date): string {
  return dayBucket(now);
}

export function isPast(stay: Stay, today: string): boolean {
  return stay.checkOut < today;
}

export function isCurrent(stay: Stay, today: string): boolean {
  return stay.checkIn <= today && today <= stay.checkOut;
}

/** Cancellable while active and check-in is more than a day away. */
export function canCancel(b: Stay & { status: BookingStatus }, today: string): boolean {
  return isActive(b.status) && b.checkIn > addDays(today, 1);
}
