/**
 * Shared request-validation helpers.
 * Every route answers a failed parse with the same 400 shape:
 *   { error: "Validation failed", code: "VALIDATION_ERROR", details }
 */

import type { Response } from "express";
import type { ZodError } from "zod";

interface ValidationError {
  field: string;
  message: string;
}

function toValidationErrors(error: ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "body",
    message: issue.message,
  }));
}

function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: "Validation failed",
    code: "VALIDATION_ERROR",
    details: toValidationErrors(error),
  });
}

/** Largest value a PostgreSQL INTEGER / SERIAL column holds. */
const PG_INTEGER_MAX = 2_147_483_647;

/**
 * Parse a `:id` route parameter. Anything other than a positive integer in
 * SERIAL range yields null, which routes treat as "not found".
 */
function parseId(raw: string): number | null {
  if (!/^[1-9]\d*$/.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return id <= PG_INTEGER_MAX ? id : null;
}

export { sendValidationError, parseId, PG_INTEGER_MAX };
export type { ValidationError };
