import type { Response } from "express";
import type { Logger } from "../config/logger.js";
import { AppError, ValidationError } from "../errors.js";

/**
 * Map a thrown error to a JSON response: domain errors keep their status,
 * anything else is logged and reported as a 500.
 */
export function sendError(res: Response, err: unknown, log: Logger, message: string): void {
  if (err instanceof ValidationError) {
    res.status(err.statusCode).json({ error: err.message, details: err.details });
    return;
  }
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  log.error({ err }, message);
  res.status(500).json({ error: message });
}
