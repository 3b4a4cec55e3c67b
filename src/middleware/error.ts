import type { Request, Response, NextFunction } from "express";
import { AppError, errorMessage } from "../errors";
import { logger } from "../utils/logger";

function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  // body-parser attaches a status to malformed JSON errors
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = status >= 500 && !(err instanceof AppError) ? "Internal error" : errorMessage(err);
  logger.error("request_error", { status, message: errorMessage(err) });
  res.status(status).json({ error: message });
}
