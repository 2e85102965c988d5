// server/src/utils/idempotency.ts
// Header-based idempotency with Redis.
// Stores the exact {status, body} returned the first time, and replays it on repeats.

import type { Response } from "express";

import { key, redisClient } from "../config/redis.js";

export type Stored<T> = { status: number; body: T };

type SetOpts = { NX: true; PX: number } | { EX: number };

/** The slice of a Redis client this helper needs. */
export interface IdempotencyCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts: SetOpts): Promise<string | null>;
  del(key: string): Promise<number>;
}

async function redisCache(): Promise<IdempotencyCache> {
  const c = await redisClient();
  return {
    get: (k) => c.get(k),
    set: (k, v, o) => c.set(k, v, o),
    del: (k) => c.del(k),
  };
}

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

function decode<T>(raw: string): Stored<T> {
  const stored: Stored<T> = JSON.parse(raw);
  return stored;
}

/**
 * Idempotent get-or-compute with a small in-flight lock to avoid double-compute.
 * - key: fully-namespaced Redis key (use key() from config/redis in the caller)
 * - ttlSecs: cache TTL for the stored result
 * - compute: returns { status, body } to persist on first success; errors are not cached
 * - lockMs: in-flight lock lifetime; must outlast the slowest compute
 */
export async function getOrSetIdempotent<T>(
  key: string,
  ttlSecs: number,
  compute: () => Promise<Stored<T>>,
  opts: { waitForMs?: number; lockMs?: number; cache?: IdempotencyCache } = {}
): Promise<{ value: Stored<T>; replay: boolean }> {
  const client: IdempotencyCache = opts.cache ?? (await redisCache());
  const waitForMs = opts.waitForMs ?? 1500;

  const cached = await client.get(key);
  if (cached) return { value: decode<T>(cached), replay: true };

  const lockKey = `${key}:lock`;
  const lockOk = await client.set(lockKey, "1", { NX: true, PX: opts.lockMs ?? 5000 });
  if (lockOk) {
    try {
      // another process might have written between get() and set(NX)
      const again = await client.get(key);
      if (again) return { value: decode<T>(again), replay: true };

      const value = await compute();
      await client.set(key, JSON.stringify(value), { EX: ttlSecs });
      return { value, replay: false };
    } finally {
      await client.del(lockKey);
    }
  }

  // someone else is computing -> wait briefly for the result
  const start = Date.now();
  while (Date.now() - start < waitForMs) {
    const got = await client.get(key);
    if (got) return { value: decode<T>(got), replay: true };
    await sleep(75);
  }

  const value = await compute();
  await client.set(key, JSON.stringify(value), { EX: ttlSecs });
  return { value, replay: false };
}

/**
 * Route-level wrapper: with an X-Idempotency-Key header the first response is stored
 * for a day and replayed verbatim (plus `idempotent-replay: true`); without one the
 * handler just runs. `inFlightMs` bounds how long a repeat waits on the first request
 * (and how long that request holds the lock).
 */
export async function respondIdempotent<T>(
  res: Response,
  opts: { scope: string[]; header: string; cache?: IdempotencyCache; ttlSecs?: number; inFlightMs?: number },
  compute: () => Promise<Stored<T>>
): Promise<void> {
  if (!opts.header) {
    const { status, body } = await compute();
    res.status(status).json(body);
    return;
  }
  const cacheKey = key("idemp", ...opts.scope, opts.header);
  const { value, replay } = await getOrSetIdempotent(cacheKey, opts.ttlSecs ?? 24 * 60 * 60, compute, {
    cache: opts.cache,
    ...(opts.inFlightMs ? { lockMs: opts.inFlightMs, waitForMs: opts.inFlightMs } : {}),
  });
  if (replay) res.setHeader("idempotent-replay", "true");
  res.status(value.status).json(value.body);
}
