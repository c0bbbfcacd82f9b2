/**
 * Paste metadata sanitization middleware.
 *
 * - Trims whitespace from the metadata fields title, language, authorName
 *   and authorEmail.
 * - Strips HTML tags from title and authorName, which clients display as
 *   plain labels.
 *
 * `content` and `password` pass through byte for byte: a paste is stored
 * exactly as submitted and a password may legitimately contain spaces or `<`.
 * Length limits are enforced by validation, not here.
 *
 * Apply after body parsing and before route handlers.
 */

import { Request, Response, NextFunction } from "express";

const TRIMMED_FIELDS = ["title", "language", "authorName", "authorEmail"] as const;
const TAG_STRIPPED_FIELDS = new Set<string>(["title", "authorName"]);

/** Strip all HTML/XML tags from a string using a simple regex. */
function stripHtmlTags(value: string): string {
  return value.replace(/<[^>]*>/g, "");
}

export function sanitizeMetadata(
  body: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...body };
  for (const field of TRIMMED_FIELDS) {
    const value = result[field];
    if (typeof value === "string") {
      const stripped = TAG_STRIPPED_FIELDS.has(field) ? stripHtmlTags(value) : value;
      result[field] = stripped.trim();
    }
  }
  return result;
}

/**
 * Express middleware that sanitizes a JSON object `req.body` in place.
 */
export function sanitizeBody(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && !Array.isArray(body)) {
    req.body = sanitizeMetadata(Object.fromEntries(Object.entries(body)));
  }
  next();
}
