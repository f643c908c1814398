import { Response } from "express";
import { ErrorCode, isAppError } from "../domain/errors";

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  validation: 400,
  authentication: 401,
  authorization: 403,
  not_found: 404,
  conflict: 409,
};

export function statusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Send an error response. Domain errors keep their message and get their own
 * status; anything else is logged and reported as a 500 with `fallback`.
 */
export function sendError(res: Response, error: unknown, fallback = "Something went wrong"): void {
  if (isAppError(error)) {
    res.status(statusFor(error.code)).json({ error: error.message, code: error.code });
    return;
  }

  console.error(`${fallback}:`, error);
  res.status(500).json({ error: fallback });
}
