import { Router } from "express";
import { z } from "zod";

import { requireAuth, requireRole } from "../../middlewares/auth.js";
import type { Services } from "../../services.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

export function reportsRouter(services: Services): Router {
  const router = Router();

  // all report routes require admin role
  router.use(requireAuth, requireRole("admin"));

  router.get(
    "/overview",
    asyncHandler(async (_req, res) => {
      jsonOk(res, await services.reports.overview());
    })
  );

  router.get(
    "/listings/:id",
    asyncHandler(async (req, res) => {
      const { id } = z.object({ id: z.string().min(1) }).parse(req.params);
      jsonOk(res, await services.reports.listingReport(id));
    })
  );

  return router;
}
