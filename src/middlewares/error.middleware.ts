import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError } from "../utils/errors";
import { sendAppError, sendError } from "../utils/response";

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  logger.error("Unhandled error", err);
  if (err instanceof AppError) {
    return sendAppError(res, err);
  }
  // body-parser errors (malformed JSON, payload too large) carry a status
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return sendError(res, err.message, err.status);
  }
  return sendAppError(res, err);
}

export function notFoundMiddleware(req: Request, res: Response) {
  sendError(res, `Route ${req.method} ${req.originalUrl} not found`, 404);
}
