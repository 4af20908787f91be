// src/middleware/responseHelper.ts
import { Response } from "express";
import type { TriggerResponse } from "../services/triggerRouter";

/**
 * Standardized API response format.
 */
export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  meta?: Record<string, unknown>;
}

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): Response {
  const body: ApiResponse<T> = { ok: true, data };
  return res.status(statusCode).json(body);
}

export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  meta?: Record<string, unknown>
): Response {
  const response: ApiResponse = {
    ok: false,
    error,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

export function sendNotFound(res: Response, message: string = "Resource not found"): Response {
  return sendError(res, message, 404);
}

/**
 * Write a router result: status, optional headers (Retry-After), JSON body.
 */
export function sendTriggerResponse(res: Response, result: TriggerResponse): Response {
  if (result.headers) {
    for (const [name, value] of Object.entries(result.headers)) {
      res.setHeader(name, value);
    }
  }
  return res.status(result.status).json(result.body);
}
