import { describe, expect, it } from "vitest";

import {
  canCancel,
  canTransition,
  isCurrent,
  isPast,
  isTerminal,
  priceStay,
  rangesOverlap,
} from "../../modules/bookings/policy.js";
import { day, TODAY } from "../world.js";

describe("transition graph", () => {
  it("allows only the documented edges", () => {
    expect(canTransition("pending", "confirmed")).toBe(true);
    expect(canTransition("pending", "cancelled")).toBe(true);
    expect(canTransition("confirmed", "completed")).toBe(true);
    expect(canTransition("confirmed", "cancelled")).toBe(true);

    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("confirmed", "pending")).toBe(false);
    expect(canTransition("cancelled", "confirmed")).toBe(false);
    expect(canTransition("completed", "cancelled")).toBe(false);
  });

  it("treats cancelled and completed as terminal", () => {
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("pending")).toBe(false);
  });
});

describe("stays", () => {
  it("overlap is half-open", () => {
    expect(rangesOverlap({ checkIn: day(7), checkOut: day(10) }, { checkIn: day(8), checkOut: day(11) })).toBe(true);
    expect(rangesOverlap({ checkIn: day(7), checkOut: day(10) }, { checkIn: day(10), checkOut: day(12) })).toBe(false);
    expect(rangesOverlap({ checkIn: day(7), checkOut: day(10) }, { checkIn: day(5), checkOut: day(7) })).toBe(false);
    expect(rangesOverlap({ checkIn: day(7), checkOut: day(10) }, { checkIn: day(5), checkOut: day(12) })).toBe(true);
  });

  it("prices nights times the nightly rate", () => {
    expect(priceStay(10_000, { checkIn: day(7), checkOut: day(10) })).toEqual({ nights: 3, totalCents: 30_000 });
  });
});

describe("date predicates", () => {
  it("canCancel needs an active status and check-in more than a day out", () => {
    expect(canCancel({ status: "confirmed", checkIn: day(3), checkOut: day(5) }, TODAY)).toBe(true);
    expect(canCancel({ status: "pending", checkIn: day(2), checkOut: day(5) }, TODAY)).toBe(true);
    expect(canCancel({ status: "confirmed", checkIn: day(1), checkOut: day(5) }, TODAY)).toBe(false);
    expect(canCancel({ status: "confirmed", checkIn: TODAY, checkOut: day(2) }, TODAY)).toBe(false);
    expect(canCancel({ status: "cancelled", checkIn: day(10), checkOut: day(12) }, TODAY)).toBe(false);
  });

  it("isCurrent includes both ends, isPast starts after check-out", () => {
    const stay = { checkIn: day(-2), checkOut: TODAY };
    expect(isCurrent(stay, TODAY)).toBe(true);
    expect(isPast(stay, TODAY)).toBe(false);
    expect(isPast(stay, day(1))).toBe(true);
    expect(isCurrent({ checkIn: day(1), checkOut: day(3) }, TODAY)).toBe(false);
  });
});
