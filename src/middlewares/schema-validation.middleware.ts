import { Request, Response, NextFunction } from "express";
import { ZodTypeAny } from "zod";
import { sendError } from "../utils/response";
import { errorMessage } from "../utils/errors";

type Schemas = {
  body: ZodTypeAny;
};

export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schemas.body.safeParse(req.body ?? {});
      if (!parsed.success) {
        const message = parsed.error.errors.map((e) => e.message).join(", ");
        return sendError(res, message, 400);
      }
      req.body = parsed.data;

      return next();
    } catch (err) {
      return sendError(res, "Invalid request", 400, errorMessage(err));
    }
  };
