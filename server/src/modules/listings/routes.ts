import { Router } from "express";
import { z } from "zod";

import { ForbiddenError, NotFoundError } from "../../domain/errors.js";
import { requireAuth, getAuth } from "../../middlewares/auth.js";
import type { Services } from "../../services.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { PageQuery } from "../bookings/routes.js";

const IdParam = z.object({ id: z.string().min(1) });

export function listingsRouter(services: Services): Router {
  const router = Router();

  /**
   * GET /listings/:id/bookings
   * Host calendar view: every booking on the listing, newest first. Host or admin.
   */
  router.get(
    "/:id/bookings",
    requireAuth,
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      const { userId, role } = getAuth(req);
      const page = PageQuery.parse(req.query);

      const listing = await services.listings.get(id);
      if (!listing) throw new NotFoundError("Listing not found", { listingId: id });
      if (role !== "admin" && listing.hostId !== userId) {
        throw new ForbiddenError("Only the host can see this listing's bookings");
      }

      const out = await services.bookings.listForListing(listing.id, page);
      jsonOk(res, { ...out, items: out.items.map(services.bookings.toPublicBooking) });
    })
  );

  // GET /listings/:id/rating (public)
  router.get(
    "/:id/rating",
    asyncHandler(async (req, res) => {
      const { id } = IdParam.parse(req.params);
      jsonOk(res, await services.reviews.ratingSummary(id));
    })
  );

  return router;
}
