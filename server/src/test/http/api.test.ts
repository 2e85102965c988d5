import { createServer, type Server } from "http";

import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import { createApp } from "../../app.js";
import type { ListingSummary } from "../../modules/listings/service.js";
import { signAccessToken } from "../../modules/auth/tokens.js";
import { fakeId } from "../memory.js";
import { day, makeWorld } from "../world.js";

const w = makeWorld();
let server: Server;
let base = "";

const guest = { id: fakeId(), token: "" };
const otherGuest = { id: fakeId(), token: "" };
const host = { id: fakeId(), token: "" };
const admin = { id: fakeId(), token: "" };

beforeAll(async () => {
  guest.token = signAccessToken({ sub: guest.id, role: "guest" });
  otherGuest.token = signAccessToken({ sub: otherGuest.id, role: "guest" });
  host.token = signAccessToken({ sub: host.id, role: "host" });
  admin.token = signAccessToken({ sub: admin.id, role: "admin" });

  server = createServer(createApp(w.services));
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

type Call = { token?: string; body?: unknown; raw?: string; headers?: Record<string, string> };

async function call(method: string, path: string, opts: Call = {}) {
  const hasBody = opts.body !== undefined || opts.raw !== undefined;
  const res = await fetch(`${base}${path}`, {
    method,
    headers: {
      ...(hasBody ? { "content-type": "application/json" } : {}),
      ...(opts.token ? { authorization: `Bearer ${opts.token}` } : {}),
      ...opts.headers,
    },
    body: opts.raw ?? (opts.body === undefined ? undefined : JSON.stringify(opts.body)),
  });
  const text = await res.text();
  const json: unknown = text ? JSON.parse(text) : null;
  return { status: res.status, headers: res.headers, json };
}

function field(v: unknown, name: string): string {
  if (v && typeof v === "object" && name in v) {
    const value: unknown = Reflect.get(v, name);
    if (typeof value === "string") return value;
  }
  throw new Error(`response has no string "${name}"`);
}

function newListing(): ListingSummary {
  return w.listings.add({ hostId: host.id, pricePerNightCents: 10_000, maxGuests: 4 });
}

const bookingBody = (listingId: string, from: number, to: number) => ({
  listingId,
  checkIn: day(from),
  checkOut: day(to),
  guests: 2,
  contact: { email: "guest@example.com" },
});

describe("bookings API", () => {
  it("creates a booking for the caller", async () => {
    const listing = newListing();
    const res = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });

    expect(res.status).toBe(201);
    expect(res.json).toMatchObject({
      listingId: listing.id,
      guestId: guest.id,
      checkIn: "2030-01-17",
      checkOut: "2030-01-20",
      nights: 3,
      totalPrice: "300.00",
      status: "pending",
      canCancel: true,
    });
  });

  it("answers an overlap with 409 and the shared error shape", async () => {
    const listing = newListing();
    await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });

    const res = await call("POST", "/bookings", { token: otherGuest.token, body: bookingBody(listing.id, 8, 11) });
    expect(res.status).toBe(409);
    expect(res.json).toMatchObject({
      error: {
        code: "CONFLICT",
        message: "Listing is already booked for the selected dates",
        requestId: res.headers.get("x-request-id"),
      },
    });
  });

  it("replays a request carrying the same idempotency key", async () => {
    const listing = newListing();
    const headers = { "X-Idempotency-Key": "create-once" };

    const first = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10), headers });
    const second = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10), headers });

    expect(first.status).toBe(201);
    expect(second.status).toBe(201);
    expect(second.headers.get("idempotent-replay")).toBe("true");
    expect(field(second.json, "id")).toBe(field(first.json, "id"));
    expect(await w.bookings.countByStatus({ listingId: listing.id })).toMatchObject({ pending: 1 });
  });

  it("requires a token", async () => {
    const res = await call("GET", "/bookings");
    expect(res.status).toBe(401);
    expect(res.json).toEqual({ error: { code: "UNAUTHORIZED", message: "Missing Bearer token" } });
  });

  it("rejects a malformed body with 422", async () => {
    const listing = newListing();
    const res = await call("POST", "/bookings", {
      token: guest.token,
      body: { ...bookingBody(listing.id, 7, 10), guests: "two" },
    });
    expect(res.status).toBe(422);
    expect(res.json).toMatchObject({ error: { code: "UNPROCESSABLE_ENTITY", message: "Invalid request body" } });
  });

  it("rejects unparseable JSON with 400", async () => {
    const res = await call("POST", "/bookings", { token: guest.token, raw: "{not json" });
    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({ error: { code: "BAD_REQUEST" } });
  });

  it("shows a booking to its guest, the host and admins only", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const path = `/bookings/${field(created.json, "id")}`;

    expect((await call("GET", path, { token: guest.token })).status).toBe(200);
    expect((await call("GET", path, { token: host.token })).status).toBe(200);
    expect((await call("GET", path, { token: admin.token })).status).toBe(200);

    const denied = await call("GET", path, { token: otherGuest.token });
    expect(denied.status).toBe(403);
    expect(denied.json).toMatchObject({ error: { code: "FORBIDDEN" } });

    expect((await call("GET", `/bookings/${fakeId()}`, { token: guest.token })).status).toBe(404);
  });

  it("lets the host confirm and the guest only cancel", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const id = field(created.json, "id");

    const byGuest = await call("POST", `/bookings/${id}/status`, { token: guest.token, body: { status: "confirmed" } });
    expect(byGuest.status).toBe(403);

    const byHost = await call("POST", `/bookings/${id}/status`, { token: host.token, body: { status: "confirmed" } });
    expect(byHost.status).toBe(200);
    expect(byHost.json).toMatchObject({ status: "confirmed" });

    const bad = await call("POST", `/bookings/${id}/status`, { token: host.token, body: { status: "pending" } });
    expect(bad.status).toBe(422);
    expect(bad.json).toMatchObject({ error: { code: "INVALID_TRANSITION" } });

    const cancelled = await call("POST", `/bookings/${id}/cancel`, { token: guest.token });
    expect(cancelled.status).toBe(200);
    expect(cancelled.json).toMatchObject({ status: "cancelled", canCancel: false });
  });

  it("refuses cancellation inside the window", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 1, 3) });

    const res = await call("POST", `/bookings/${field(created.json, "id")}/cancel`, { token: guest.token });
    expect(res.status).toBe(403);
    expect(res.json).toMatchObject({ error: { code: "CANCELLATION_WINDOW_CLOSED" } });
  });

  it("lets only admins delete", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const path = `/bookings/${field(created.json, "id")}`;

    expect((await call("DELETE", path, { token: guest.token })).status).toBe(403);
    expect((await call("DELETE", path, { token: admin.token })).status).toBe(204);
    expect((await call("GET", path, { token: admin.token })).status).toBe(404);
  });
});

describe("listings API", () => {
  it("lists a listing's bookings for its host", async () => {
    const listing = newListing();
    await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    await call("POST", "/bookings", { token: otherGuest.token, body: bookingBody(listing.id, 10, 12) });

    const res = await call("GET", `/listings/${listing.id}/bookings?limit=1`, { token: host.token });
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ page: 1, limit: 1, hasMore: true, items: [{ guestId: otherGuest.id }] });

    expect((await call("GET", `/listings/${listing.id}/bookings`, { token: guest.token })).status).toBe(403);
  });

  it("serves the rating summary without a token", async () => {
    const listing = newListing();
    w.reviews.add(listing.id, 5, 4, 4);

    const res = await call("GET", `/listings/${listing.id}/rating`);
    expect(res.status).toBe(200);
    expect(res.json).toEqual({ listingId: listing.id, reviewCount: 3, averageRating: 4.33 });
  });
});

describe("payments API", () => {
  it("pays through the redirect callback and confirms the booking", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const bookingId = field(created.json, "id");

    const init = await call("POST", "/payments/initialize", {
      token: guest.token,
      body: { bookingId, customer: { name: "Test Guest", email: "guest@example.com" } },
    });
    expect(init.status).toBe(201);
    expect(init.json).toMatchObject({ bookingId, amount: "300.00", status: "initialized" });
    const txRef = field(init.json, "txRef");

    w.processor.verify.mockResolvedValueOnce({
      status: "success",
      message: "Payment details",
      data: { status: "success", amount: "300.00", currency: "ETB" },
    });
    const hook = await call("GET", `/webhooks/payments?trx_ref=${txRef}&status=success`);
    expect(hook.status).toBe(200);
    expect(hook.json).toEqual({ received: true, txRef, status: "success" });

    const booking = await call("GET", `/bookings/${bookingId}`, { token: guest.token });
    expect(booking.json).toMatchObject({ status: "confirmed" });

    const payment = await call("GET", `/bookings/${bookingId}/payment`, { token: host.token });
    expect(payment.json).toMatchObject({ txRef, status: "success", verificationAttempts: 1 });

    const again = await call("POST", "/payments/initialize", {
      token: guest.token,
      body: { bookingId, customer: { name: "Test Guest", email: "guest@example.com" } },
    });
    expect(again.status).toBe(422);
    expect(again.json).toMatchObject({ error: { code: "ALREADY_PAID" } });
  });

  it("reads the reference from a posted body", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const init = await call("POST", "/payments/initialize", {
      token: guest.token,
      body: { bookingId: field(created.json, "id"), customer: { name: "Test Guest", email: "guest@example.com" } },
    });
    const txRef = field(init.json, "txRef");

    const hook = await call("POST", "/webhooks/payments", { body: { tx_ref: txRef, status: "success" } });
    expect(hook.status).toBe(200);
    // the stub processor still reports pending
    expect(hook.json).toEqual({ received: true, txRef, status: "pending" });
  });

  it("keeps other users away from someone else's payment", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const bookingId = field(created.json, "id");

    const init = await call("POST", "/payments/initialize", {
      token: otherGuest.token,
      body: { bookingId, customer: { name: "Someone Else", email: "other@example.com" } },
    });
    expect(init.status).toBe(403);

    const missing = await call("POST", "/payments/initialize", {
      token: guest.token,
      body: { bookingId: fakeId(), customer: { name: "Test Guest", email: "guest@example.com" } },
    });
    expect(missing.status).toBe(422);
    expect(missing.json).toMatchObject({ error: { code: "VALIDATION_ERROR", message: "Booking not found" } });
  });

  it("locks a keyed initialize for longer than the processor timeout", async () => {
    const listing = newListing();
    const created = await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });
    const set = vi.spyOn(w.idempotency, "set");

    const res = await call("POST", "/payments/initialize", {
      token: guest.token,
      body: { bookingId: field(created.json, "id"), customer: { name: "Test Guest", email: "guest@example.com" } },
      headers: { "X-Idempotency-Key": "pay-once" },
    });
    expect(res.status).toBe(201);
    // PAYMENT_TIMEOUT_MS is 200 under test
    expect(set).toHaveBeenCalledWith(expect.stringMatching(/:pay-once:lock$/), "1", { NX: true, PX: 5_200 });
    set.mockRestore();
  });

  it("maps processor outages to 502", async () => {
    w.processor.listBanks.mockResolvedValueOnce({ status: "error", message: "Bank listing failed: HTTP 503 down" });

    const res = await call("GET", "/payments/banks", { token: guest.token });
    expect(res.status).toBe(502);
    expect(res.json).toMatchObject({ error: { code: "GATEWAY_ERROR", message: "Bank listing failed: HTTP 503 down" } });
  });
});

describe("admin reports API", () => {
  it("is admin only", async () => {
    expect((await call("GET", "/admin/reports/overview", { token: host.token })).status).toBe(403);

    const res = await call("GET", "/admin/reports/overview", { token: admin.token });
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ bookingsByStatus: expect.any(Object), paymentsByStatus: expect.any(Object) });
  });

  it("reports on one listing", async () => {
    const listing = newListing();
    await call("POST", "/bookings", { token: guest.token, body: bookingBody(listing.id, 7, 10) });

    const res = await call("GET", `/admin/reports/listings/${listing.id}`, { token: admin.token });
    expect(res.json).toEqual({
      listingId: listing.id,
      bookingCount: 1,
      bookingsByStatus: { pending: 1, confirmed: 0, cancelled: 0, completed: 0 },
      reviewCount: 0,
      averageRating: 0,
    });
  });
});

describe("plumbing", () => {
  it("answers /health", async () => {
    const res = await call("GET", "/health");
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ status: "ok" });
  });

  it("404s unknown routes", async () => {
    const res = await call("GET", "/nope");
    expect(res.status).toBe(404);
    expect(res.json).toMatchObject({ error: { code: "NOT_FOUND", message: "Route GET /nope not found" } });
  });
});
