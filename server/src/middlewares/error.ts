// server/src/middlewares/error.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { logger } from "../config/logger.js";
import { AppError } from "../domain/errors.js";

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const requestId: unknown = res.locals.requestId;

  if (err instanceof ZodError) {
    const details = err.flatten();
    logger.warn("Validation error", { requestId, details });
    return res.status(422).json({
      error: { code: "UNPROCESSABLE_ENTITY", message: "Invalid request body", details, requestId },
    });
  }

  if (err instanceof AppError) {
    const level = err.status >= 500 ? "error" : "warn";
    logger.log(level, err.message, { requestId, status: err.status, code: err.code, details: err.details });
    return res.status(err.status).json({
      error: { code: err.code, message: err.message, details: err.details, requestId },
    });
  }

  // body-parser and friends attach an http status to their errors
  const status =
    err && typeof err === "object" && "status" in err && typeof err.status === "number" && err.status >= 400
      ? err.status
      : 500;
  const message = err instanceof Error ? err.message : "Internal server error";

  // always log stack if present
  logger.error(message || "Unhandled error", {
    requestId,
    status,
    path: req.originalUrl,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(status).json({
    error: {
      code: status === 500 ? "INTERNAL_ERROR" : "BAD_REQUEST",
      message: status === 500 ? "Internal server error" : message,
      requestId,
    },
  });
};
