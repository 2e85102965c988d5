/** Domain enums (string unions keep JSON clean and easy to index) */

export const PROPERTY_TYPES = ["apartment", "house", "villa", "cabin", "condo", "other"] as const;
export type PropertyType = (typeof PROPERTY_TYPES)[number];

/** Booking lifecycle. cancelled/completed are terminal. */
export const BOOKING_STATUSES = ["pending", "confirmed", "cancelled", "completed"] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

/** Statuses that still hold the listing's calendar. */
export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = ["pending", "confirmed"];

export const PAYMENT_STATUSES = ["initialized", "pending", "success", "failed"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const ROLES = ["guest", "host", "admin"] as const;
export type Role = (typeof ROLES)[number];
