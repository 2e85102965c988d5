/**
 * Money helpers: store money as integer cents.
 * Never store floats in Mongo. Convert at the edges.
 */

export type MoneyCents = number;

/** Parse "$1,234.56" | "1234.56" | 1234.56 into integer cents. */
export function toCents(input: string | number): MoneyCents {
  if (typeof input === "number") {
    if (!Number.isFinite(input)) throw new Error(`Invalid money input: ${input}`);
    return Math.round(input * 100);
  }
  const normalized = input.trim().replace(/[^0-9.-]/g, "");
  const n = Number(normalized);
  if (!normalized || !Number.isFinite(n)) throw new Error(`Invalid money input: ${input}`);
  return Math.round(n * 100);
}

/** Convert integer cents to a decimal amount (number). */
export function fromCents(cents: MoneyCents): number {
  return Math.round(cents) / 100;
}

/** Fixed two-decimal string, e.g. 30000 -> "300.00". */
export function toDecimalString(cents: MoneyCents): string {
  return fromCents(cents).toFixed(2);
}

/** Multiply a per-unit cent amount by a whole number of units. */
export function multiplyCents(unitCents: MoneyCents, units: number): MoneyCents {
  if (!Number.isInteger(units) || units < 0) throw new Error("units must be a non-negative integer");
  return Math.round(unitCents) * units;
}
