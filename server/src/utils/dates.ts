/**
 * Date helpers, all in UTC.
 * Stays are calendar days: "YYYY-MM-DD" (e.g., 2026-09-01), one bucket per night.
 */

const DAY_MS = 86_400_000;
const DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number) {
  return n < 10 ? `0${n}` : String(n);
}

export function toDate(d: Date | string | number): Date {
  return d instanceof Date ? d : new Date(d);
}

/** Day bucket (UTC): "YYYY-MM-DD" */
export function dayBucket(d: Date | string | number): string {
  const dt = toDate(d);
  const y = dt.getUTCFullYear();
  const m = pad2(dt.getUTCMonth() + 1);
  const day = pad2(dt.getUTCDate());
  return `${y}-${m}-${day}`;
}

export function isDay(s: string): boolean {
  const m = DAY_RE.exec(s);
  if (!m) return false;
  const dt = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return dayBucket(dt) === s;
}

/** "YYYY-MM-DD" -> UTC midnight. Throws on impossible dates like 2026-02-30. */
export function dayToDate(day: string): Date {
  if (!isDay(day)) throw new Error(`Invalid calendar day: ${day}`);
  return new Date(`${day}T00:00:00.000Z`);
}

export function addDays(day: string, n: number): string {
  return dayBucket(dayToDate(day).getTime() + n * DAY_MS);
}

/** Whole days from a to b (negative when b is earlier). */
export function diffDays(a: string, b: string): number {
  return Math.round((dayToDate(b).getTime() - dayToDate(a).getTime()) / DAY_MS);
}

/** Nights of a stay: every day from checkIn inclusive to checkOut exclusive. */
export function enumerateNights(checkIn: string, checkOut: string): string[] {
  const out: string[] = [];
  let t = dayToDate(checkIn).getTime();
  const e = dayToDate(checkOut).getTime();
  while (t < e) {
    out.push(dayBucket(t));
    t += DAY_MS;
  }
  return out;
}
