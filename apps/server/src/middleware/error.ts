import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import multer from "multer";

import { logger } from "../logger";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, "NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

// body-parser and similar middleware attach an HTTP status to their errors
function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    res.status(400).json({
      ok: false,
      error: { code: "VALIDATION_ERROR", message: "Invalid request", issues: err.errors },
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({ ok: false, error: { code: err.code, message: err.message } });
    return;
  }

  const status = statusOf(err);
  const code = err instanceof HttpError ? err.code : status >= 500 ? "INTERNAL_ERROR" : "BAD_REQUEST";
  const message = err instanceof Error ? err.message : "Unexpected server error";

  if (status >= 500) {
    logger.error({ err, path: req.path, method: req.method }, "[API Error]");
  }

  res.status(status).json({
    ok: false,
    error: {
      code,
      message: status >= 500 ? "Unexpected server error" : message,
    },
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
