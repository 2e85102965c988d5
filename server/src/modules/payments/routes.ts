import { Router } from "express";
import { z } from "zod";

import { env } from "../../config/env.js";
import { ForbiddenError } from "../../domain/errors.js";
import { requireAuth, getAuth } from "../../middlewares/auth.js";
import type { Services } from "../../services.js";
import { asyncHandler, headerOf, jsonOk } from "../../utils/http.js";
import { respondIdempotent } from "../../utils/idempotency.js";
import { loadBookingFor } from "../bookings/access.js";

const InitializeSchema = z.object({
  bookingId: z.string().min(1),
  customer: z.object({
    name: z.string().trim().min(1).max(200),
    email: z.string().trim().email(),
    phone: z.string().trim().max(32).optional(),
  }),
  currency: z.string().trim().length(3).optional(),
});

const TxRefParam = z.object({ txRef: z.string().min(1).max(100) });

export function paymentsRouter(services: Services): Router {
  const router = Router();
  const { payments } = services;

  router.post(
    "/initialize",
    requireAuth,
    asyncHandler(async (req, res) => {
      const auth = getAuth(req);
      const body = InitializeSchema.parse(req.body);

      // a missing booking is the service's ValidationError, not a 404 here
      const existing = await services.bookings.findBooking(body.bookingId);
      if (existing && existing.guestId !== auth.userId && auth.role !== "admin") {
        throw new ForbiddenError("Only the guest can pay for this booking");
      }

      await respondIdempotent(
        res,
        {
          scope: ["payments", "initialize", auth.userId],
          header: headerOf(req, "X-Idempotency-Key"),
          cache: services.idempotency,
          // the processor call may take the whole timeout
          inFlightMs: env.PAYMENT_TIMEOUT_MS + 5_000,
        },
        async () => {
          const p = await payments.initializePayment(body);
          return { status: 201, body: payments.toPublicPayment(p) };
        }
      );
    })
  );

  router.post(
    "/verify/:txRef",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { txRef } = TxRefParam.parse(req.params);
      const current = await payments.getPayment(txRef);
      await loadBookingFor(services, current.bookingId, getAuth(req));
      const p = await payments.verifyPayment(txRef);
      jsonOk(res, payments.toPublicPayment(p));
    })
  );

  router.get(
    "/banks",
    requireAuth,
    asyncHandler(async (_req, res) => {
      jsonOk(res, { items: await payments.listBanks() });
    })
  );

  return router;
}
