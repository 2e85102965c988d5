import { describe, expect, it, vi } from "vitest";

import { getOrSetIdempotent } from "../../utils/idempotency.js";
import { MemoryIdempotencyCache } from "../memory.js";

describe("getOrSetIdempotent", () => {
  it("computes once and replays the stored response", async () => {
    const cache = new MemoryIdempotencyCache();
    const compute = vi.fn(async () => ({ status: 201, body: { id: "b1" } }));

    const first = await getOrSetIdempotent("k1", 60, compute, { cache });
    const second = await getOrSetIdempotent("k1", 60, compute, { cache });

    expect(first).toEqual({ value: { status: 201, body: { id: "b1" } }, replay: false });
    expect(second).toEqual({ value: { status: 201, body: { id: "b1" } }, replay: true });
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.data.has("k1:lock")).toBe(false);
  });

  it("does not store failures", async () => {
    const cache = new MemoryIdempotencyCache();
    const compute = vi
      .fn<() => Promise<{ status: number; body: string }>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce({ status: 200, body: "ok" });

    await expect(getOrSetIdempotent("k2", 60, compute, { cache })).rejects.toThrow("boom");
    expect(await getOrSetIdempotent("k2", 60, compute, { cache })).toEqual({
      value: { status: 200, body: "ok" },
      replay: false,
    });
  });

  it("waits for a concurrent holder of the lock", async () => {
    const cache = new MemoryIdempotencyCache();
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    const slow = vi.fn(async () => {
      await gate;
      return { status: 201, body: { id: "b2" } };
    });

    const first = getOrSetIdempotent("k3", 60, slow, { cache });
    const second = getOrSetIdempotent("k3", 60, slow, { cache, waitForMs: 2_000 });
    release();

    expect(await first).toEqual({ value: { status: 201, body: { id: "b2" } }, replay: false });
    expect(await second).toEqual({ value: { status: 201, body: { id: "b2" } }, replay: true });
    expect(slow).toHaveBeenCalledTimes(1);
  });

  it("holds the in-flight lock for as long as asked", async () => {
    const cache = new MemoryIdempotencyCache();
    const set = vi.spyOn(cache, "set");

    await getOrSetIdempotent("k4", 60, async () => ({ status: 201, body: {} }), { cache, lockMs: 35_000 });
    expect(set).toHaveBeenNthCalledWith(1, "k4:lock", "1", { NX: true, PX: 35_000 });
  });
});
