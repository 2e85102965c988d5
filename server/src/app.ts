// server/src/app.ts
/** Express app wiring: security (helmet), CORS allowlist, parsers, logging, rate limit, routes, 404 + error. */
import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import morgan from "morgan";

import { corsOrigins, env } from "./config/env.js";
import { httpLogStream } from "./config/logger.js";
import { errorHandler } from "./middlewares/error.js";
import { notFound } from "./middlewares/notFound.js";
import { rateLimit } from "./middlewares/rateLimit.js";
import { paymentWebhookRouter } from "./modules/webhooks/payments.js";
import { buildRouter } from "./routes.js";
import type { Services } from "./services.js";
import { requestId } from "./utils/ids.js";

export function createApp(services: Services): Express {
  const app = express();

  // security
  app.use(helmet());

  // request id first
  app.use(requestId);

  // processor webhooks need the raw bytes for signature checks, so they sit before express.json
  app.use("/webhooks", express.raw({ type: "*/*", limit: "256kb" }), paymentWebhookRouter(services));

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  // CORS allowlist
  app.use(
    cors({
      origin(origin, cb) {
        if (!origin) return cb(null, true); // allow same-origin/local tools
        if (corsOrigins.includes(origin)) return cb(null, true);
        return cb(new Error("CORS not allowed"), false);
      },
      credentials: true,
    })
  );

  // dev http logs
  if (env.NODE_ENV === "development") {
    app.use(morgan("tiny", { stream: httpLogStream }));
  }

  // basic rate limit; tighter on the money path
  app.use("/payments", rateLimit({ windowMs: 60_000, max: 30, scope: "payments" }));
  app.use(rateLimit());

  // mount routes
  app.use("/", buildRouter(services));

  // 404 + error
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
