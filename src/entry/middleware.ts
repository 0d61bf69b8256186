// src/entry/middleware.ts

import crypto from "crypto";
import type { NextFunction, Request, Response } from "express";
import { HttpError, toHttpError } from "../core/errors";
import { logger } from "../core/logging/logger";

const REQUEST_ID_HEADER = "x-request-id";

function incomingRequestId(req: Request): string {
  const v = req.header(REQUEST_ID_HEADER);
  const s = typeof v === "string" ? v.trim() : "";
  // nur übernehmen, wenn es halbwegs nach ID aussieht
  return s && s.length <= 128 ? s : crypto.randomUUID();
}

/** Tags each request with an id and writes one access log line when it finishes. */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const requestId = incomingRequestId(req);
  const startedAt = process.hrtime.bigint();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.info(
      {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 100) / 100,
      },
      "http_request"
    );
  });

  next();
}

export function notFound(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Not found"));
}

// Express erkennt Error-Middleware an den vier Parametern
export function errorResponder(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const httpError = toHttpError(err);
  if (httpError.status >= 500) {
    logger.error(
      { method: req.method, path: req.path, error: String(err) },
      "http_request_failed"
    );
  }

  res.status(httpError.status).json({ ok: false, error: httpError.message });
}
