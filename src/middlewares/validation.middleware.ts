import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import { AppConfig } from "../configs/environment";
import { sendError } from "../utils/response";

/**
 * Every generate call spends completion tokens, so the whole API sits
 * behind one limiter.
 */
export const createRateLimiter = (config: AppConfig["api"]["rateLimit"]) =>
  rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    message: {
      success: false,
      message: "Rate limit exceeded. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.method === "POST" || req.method === "PUT") {
    if (!req.is("application/json")) {
      sendError(res, "Content-Type must be application/json", 415);
      return;
    }
  }
  next();
};
