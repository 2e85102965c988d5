import express, { type Request } from "express";

import { logger } from "../../config/logger.js";
import type { Services } from "../../services.js";
import { asyncHandler, headerOf, jsonOk } from "../../utils/http.js";

/** tx_ref (or trx_ref on redirects) from the query or a JSON body. */
export function referenceOf(query: Request["query"], body: unknown): string | null {
  const pick = (v: unknown) => (typeof v === "string" && v.trim() ? v.trim() : null);
  const fromQuery = pick(query.tx_ref) ?? pick(query.trx_ref);
  if (fromQuery) return fromQuery;
  if (body && typeof body === "object") {
    const fromBody = ("tx_ref" in body ? pick(body.tx_ref) : null) ?? ("trx_ref" in body ? pick(body.trx_ref) : null);
    if (fromBody) return fromBody;
  }
  return null;
}

function parseJson(raw: Buffer): unknown {
  if (!raw.length) return null;
  try {
    return JSON.parse(raw.toString("utf8"));
  } catch (err) {
    // the query string may still carry the reference
    logger.warn("payments.webhook_unparseable_body", { message: err instanceof Error ? err.message : String(err) });
    return null;
  }
}

/**
 * Processor notifications. Must be mounted with express.raw() so the signature is
 * computed over the exact bytes received.
 */
export function paymentWebhookRouter(services: Services) {
  const router = express.Router();

  router.post(
    "/payments",
    asyncHandler(async (req, res) => {
      const raw = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const signature = headerOf(req, "x-chapa-signature") || headerOf(req, "chapa-signature");
      const p = await services.payments.handleWebhook({
        txRef: referenceOf(req.query, parseJson(raw)),
        rawBody: raw,
        signature: signature || null,
      });
      jsonOk(res, { received: true, txRef: p.txRef, status: p.status });
    })
  );

  // redirect-style callbacks carry only query params and no signature
  router.get(
    "/payments",
    asyncHandler(async (req, res) => {
      const p = await services.payments.handleWebhook({ txRef: referenceOf(req.query, null) });
      jsonOk(res, { received: true, txRef: p.txRef, status: p.status });
    })
  );

  return router;
}
