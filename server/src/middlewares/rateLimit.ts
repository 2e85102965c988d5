// server/src/middlewares/rateLimit.ts
/** In-memory fixed-window limiter per client IP and scope. One process only. */

import type { RequestHandler } from "express";

type Bucket = { count: number; resetAt: number };
const buckets = new Map<string, Bucket>();

let lastSweep = 0;
function sweep(now: number) {
  if (now - lastSweep < 60_000) return;
  lastSweep = now;
  for (const [k, b] of buckets) if (b.resetAt < now) buckets.delete(k);
}

export const rateLimit = (opts?: { windowMs?: number; max?: number; scope?: string }): RequestHandler => {
  const windowMs = opts?.windowMs ?? 15_000; // 15s window
  const max = opts?.max ?? 100; // 100 reqs per window
  const scope = opts?.scope ?? "all";
  return (req, res, next) => {
    const client = req.ip || req.get("x-forwarded-for") || "unknown";
    const key = `${scope}:${client}`;
    const now = Date.now();
    sweep(now);

    let b = buckets.get(key);
    if (!b || b.resetAt < now) {
      b = { count: 0, resetAt: now + windowMs };
      buckets.set(key, b);
    }
    b.count += 1;
    res.setHeader("x-ratelimit-limit", String(max));
    res.setHeader("x-ratelimit-remaining", String(Math.max(0, max - b.count)));
    res.setHeader("x-ratelimit-reset", String(Math.floor(b.resetAt / 1000)));
    if (b.count > max) {
      res.setHeader("retry-after", String(Math.ceil((b.resetAt - now) / 1000)));
      return res
        .status(429)
        .json({ error: { code: "RATE_LIMITED", message: "Too many requests", requestId: res.locals.requestId } });
    }
    next();
  };
};
