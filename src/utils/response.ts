import { Response } from "express";
import { AppError } from "./errors";

/** Envelope of every JSON body the API writes. */
export type ApiPayload<T> =
  | { success: true; message: string; data?: T }
  | { success: false; message: string; error?: string };

const send = <T>(res: Response, status: number, payload: ApiPayload<T>) =>
  res.status(status).json(payload);

export const sendSuccess = <T>(
  res: Response,
  message: string,
  data?: T,
  status = 200
) => send(res, status, { success: true, message, data });

/** `error` carries extra detail next to the user-facing message. */
export const sendError = (
  res: Response,
  message: string,
  status = 400,
  error?: string
) => send(res, status, { success: false, message, error });

/** Answers with the error's own status; anything that is not an AppError is a 500. */
export const sendAppError = (res: Response, err: unknown) =>
  err instanceof AppError
    ? sendError(res, err.message, err.status)
    : sendError(res, "Internal Server Error", 500);
