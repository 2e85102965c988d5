// server/src/routes.ts
/** API surface: health endpoints plus the feature routers, all built over one Services bag. */
import { Router } from "express";

import { pingMongo } from "./config/db.js";
import { pingRedis } from "./config/redis.js";
import { bookingsRouter } from "./modules/bookings/routes.js";
import { listingsRouter } from "./modules/listings/routes.js";
import { paymentsRouter } from "./modules/payments/routes.js";
import { reportsRouter } from "./modules/reports/routes.js";
import type { Services } from "./services.js";
import { asyncHandler, jsonOk } from "./utils/http.js";

export function buildRouter(services: Services): Router {
  const router = Router();

  // Feature mounts
  router.use("/bookings", bookingsRouter(services)); // also GET /bookings/:id/payment
  router.use("/listings", listingsRouter(services)); // GET /listings/:id/bookings, /rating
  router.use("/payments", paymentsRouter(services));
  router.use("/admin/reports", reportsRouter(services));

  // Basic health (no deps)
  router.get("/health", (_req, res) => {
    const uptime = process.uptime();
    const version = process.env.npm_package_version || "0.0.0";
    jsonOk(res, { status: "ok", uptime, version });
  });

  // Dependencies health (actual pings)
  router.get(
    "/health/deps",
    asyncHandler(async (_req, res) => {
      const [mongo, redis] = await Promise.all([pingMongo(), pingRedis()]);
      const ok = mongo.status === "ok" && redis.status === "ok";
      jsonOk(
        res,
        {
          mongo: mongo.status,
          redis: redis.status,
          ...(ok ? {} : { details: { mongo: mongo.message, redis: redis.message } }),
        },
        ok ? 200 : 503
      );
    })
  );

  return router;
}
