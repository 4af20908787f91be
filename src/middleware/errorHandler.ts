// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import { httpStatusFor, isCoreError, RateLimitedError } from "../services/errors";
import { sendError } from "./responseHelper";

/**
 * Final error middleware: core errors keep their status mapping, everything else is a 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isCoreError(err)) {
    const status = httpStatusFor(err);
    if (err instanceof RateLimitedError) {
      res.setHeader("Retry-After", String(err.retryAfterSeconds));
    }
    if (status >= 500) {
      console.error(`[http] ${req.method} ${req.originalUrl} failed (${status}):`, err.message);
    }
    sendError(res, err.message, status, { kind: err.kind });
    return;
  }

  // body-parser rejects malformed JSON with a 400 status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    sendError(res, "Malformed JSON body", 400);
    return;
  }

  console.error("Unhandled error:", err);
  sendError(res, err instanceof Error ? err.message : "Internal server error", 500);
}

export default errorHandler;
