import { Router } from "express";
import { z } from "zod";

import { loadBookingFor } from "./access.js";
import { BOOKING_STATUSES } from "../../domain/enums.js";
import { ForbiddenError } from "../../domain/errors.js";
import { requireAuth, requireRole, getAuth } from "../../middlewares/auth.js";
import type { Services } from "../../services.js";
import { asyncHandler, headerOf, jsonOk } from "../../utils/http.js";
import { respondIdempotent } from "../../utils/idempotency.js";

const Day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const CreateSchema = z.object({
  listingId: z.string().min(1),
  checkIn: Day,
  checkOut: Day,
  guests: z.number().int(),
  contact: z.object({
    email: z.string().trim().email(),
    phone: z.string().trim().max(32).optional(),
  }),
  specialRequest: z.string().trim().max(2000).optional(),
});

export const PageQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(50).default(20),
});

const IdParam = z.object({ id: z.string().min(1) });

const StatusSchema = z.object({ status: z.enum(BOOKING_STATUSES) });

export function bookingsRouter(services: Services): Router {
  const router = Router();
  const { bookings, payments } = services;

  router.post(
    "/",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = CreateSchema.parse(req.body);

      await respondIdempotent(
        res,
        {
          scope: ["bookings", "create", userId],
          header: headerOf(req, "X-Idempotency-Key"),
          cache: services.idempotency,
        },
        async () => {
          const b = await bookings.createBooking({ ...body, guestId: userId });
          return { status: 201, body: bookings.toPublicBooking(b) };
        }
      );
    })
  );

  // the caller's own stays, newest first
  router.get(
    "/",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const page = PageQuery.parse(req.query);
      const out = await bookings.listForGuest(userId, page);
      jsonOk(res, { ...out, items: out.items.map(bookings.toPublicBooking) });
    })
  );

  router.get(
    "/:id",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const { booking } = await loadBookingFor(services, id, getAuth(req));
      jsonOk(res, bookings.toPublicBooking(booking));
    })
  );

  router.post(
    "/:id/cancel",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const auth = getAuth(req);
      const { booking } = await loadBookingFor(services, id, auth);
      const b = await bookings.cancelBooking(booking.id, auth.userId);
      jsonOk(res, bookings.toPublicBooking(b));
    })
  );

  // hosts and admins drive the lifecycle; a guest may only cancel
  router.post(
    "/:id/status",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const { status } = StatusSchema.parse(req.body);
      const auth = getAuth(req);
      const actor = await loadBookingFor(services, id, auth);
      if (!actor.isAdmin && !actor.isHost && status !== "cancelled") {
        throw new ForbiddenError("Only the host can change this booking's status");
      }
      const b = await bookings.transitionStatus(actor.booking.id, status, auth.userId);
      jsonOk(res, bookings.toPublicBooking(b));
    })
  );

  router.delete(
    "/:id",
    requireAuth,
    requireRole("admin"),
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      await bookings.deleteBooking(id, getAuth(req).userId);
      res.status(204).end();
    })
  );

  router.get(
    "/:id/payment",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const { booking } = await loadBookingFor(services, id, getAuth(req));
      const p = await payments.getPaymentForBooking(booking.id);
      jsonOk(res, payments.toPublicPayment(p));
    })
  );

  // every attempt, retried ones included
  router.get(
    "/:id/payments",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const { booking } = await loadBookingFor(services, id, getAuth(req));
      const items = await payments.listPaymentsForBooking(booking.id);
      jsonOk(res, { items: items.map(payments.toPublicPayment) });
    })
  );

  return router;
}
