/**
 * Input sanitization for account routes.
 *
 * Trims whitespace and strips HTML tags from the identity fields of a
 * top-level JSON body (username, name, email). Every other field, the
 * password included, is left exactly as sent. Length limits are enforced by
 * the route schemas, which reject an overlong value rather than shorten it.
 *
 * Mount on the auth router only: product fields are stored verbatim.
 */

import type { Request, Response, NextFunction } from "express";

const IDENTITY_FIELDS = new Set(["username", "name", "email"]);

function stripHtmlTags(value: string): string {
  return value.replace(/<[^>]*>/g, "");
}

function sanitizeString(key: string, value: string): string {
  return IDENTITY_FIELDS.has(key) ? stripHtmlTags(value.trim()) : value;
}

function sanitizeBody(req: Request, _res: Response, next: NextFunction): void {
  const body: unknown = req.body;
  if (body !== null && typeof body === "object" && !Array.isArray(body)) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(body)) {
      result[key] = typeof val === "string" ? sanitizeString(key, val) : val;
    }
    req.body = result;
  }
  next();
}

export { sanitizeBody, sanitizeString };
