// server/src/utils/ids.ts
/** Request correlation ids and generated payment references. */

import { randomUUID } from "crypto";

import type { RequestHandler } from "express";
import { customAlphabet } from "nanoid";

export const requestId: RequestHandler = (req, res, next) => {
  // honour an upstream id (load balancer / gateway) when it looks sane
  const incoming = String(req.get("x-request-id") ?? "");
  const id = /^[A-Za-z0-9-]{8,64}$/.test(incoming) ? incoming : randomUUID();
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};

const refAlphabet = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 20);

/** Processor transaction reference: unique per payment attempt, safe in URLs. */
export function newTxRef(): string {
  return `stay-${refAlphabet()}`;
}
