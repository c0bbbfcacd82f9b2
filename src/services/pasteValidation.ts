/**
 * Input validation for paste create/update requests and paging parameters.
 *
 * The parse* functions accept untrusted values (a JSON body, a typed object
 * from another module) and either return a normalized input or throw a
 * ValidationError listing every failing field.
 */

import { isVisibility, type PageRequest, type Visibility } from "../models/paste";
import { ValidationError, type FieldError } from "./errors";

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export const MAX_TITLE_LENGTH = 200;
export const MAX_CONTENT_BYTES = 1_000_000;
export const MAX_LANGUAGE_LENGTH = 50;
export const MAX_AUTHOR_NAME_LENGTH = 100;
export const MAX_AUTHOR_EMAIL_LENGTH = 200;
export const MAX_PASSWORD_LENGTH = 100;
export const MIN_EXPIRATION_MINUTES = 1;
/** One year. */
export const MAX_EXPIRATION_MINUTES = 525_600;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Loose shape check; delivery is never attempted. */
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// ---------------------------------------------------------------------------
// Input shapes
// ---------------------------------------------------------------------------

export interface CreatePasteInput {
  title: string;
  content: string;
  language?: string | null;
  authorName?: string | null;
  authorEmail?: string | null;
  visibility?: Visibility | null;
  expirationMinutes?: number | null;
  password?: string | null;
}

/** Absent or blank fields leave the stored value unchanged. */
export interface UpdatePasteInput {
  title?: string | null;
  content?: string | null;
  language?: string | null;
  visibility?: Visibility | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

/**
 * Optional string field: undefined/null/blank become null. Any other
 * non-string is reported.
 */
function optionalString(
  body: Record<string, unknown>,
  field: string,
  maxLength: number,
  label: string,
  errors: FieldError[]
): string | null {
  const value = body[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    errors.push({ field, message: `${label} must be a string` });
    return null;
  }
  if (isBlank(value)) {
    return null;
  }
  if (value.length > maxLength) {
    errors.push({ field, message: `${label} must not exceed ${maxLength} characters` });
  }
  return value;
}

function checkContentSize(content: string, errors: FieldError[]): void {
  if (Buffer.byteLength(content, "utf8") > MAX_CONTENT_BYTES) {
    errors.push({ field: "content", message: "Content must not exceed 1MB" });
  }
}

/** Accepts any casing ("public", "Public") and normalizes to the enum value. */
function optionalVisibility(
  body: Record<string, unknown>,
  errors: FieldError[]
): Visibility | null {
  const value = body.visibility;
  if (value === undefined || value === null) {
    return null;
  }
  const normalized = typeof value === "string" ? value.toUpperCase() : value;
  if (!isVisibility(normalized)) {
    errors.push({
      field: "visibility",
      message: "Visibility must be one of PUBLIC, UNLISTED, PRIVATE",
    });
    return null;
  }
  return normalized;
}

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

export function parseCreateInput(body: unknown): CreatePasteInput {
  if (!isRecord(body)) {
    throw new ValidationError([{ field: "body", message: "Request body must be a JSON object" }]);
  }

  const errors: FieldError[] = [];

  // Title: required, non-blank, <= 200 chars
  let title = "";
  if (typeof body.title !== "string" || isBlank(body.title)) {
    errors.push({ field: "title", message: "Title is required" });
  } else if (body.title.length > MAX_TITLE_LENGTH) {
    errors.push({ field: "title", message: `Title must not exceed ${MAX_TITLE_LENGTH} characters` });
  } else {
    title = body.title;
  }

  // Content: required, non-blank, <= 1MB of UTF-8
  let content = "";
  if (typeof body.content !== "string" || isBlank(body.content)) {
    errors.push({ field: "content", message: "Content is required" });
  } else {
    checkContentSize(body.content, errors);
    content = body.content;
  }

  const language = optionalString(body, "language", MAX_LANGUAGE_LENGTH, "Language", errors);
  const authorName = optionalString(body, "authorName", MAX_AUTHOR_NAME_LENGTH, "Author name", errors);
  const authorEmail = optionalString(body, "authorEmail", MAX_AUTHOR_EMAIL_LENGTH, "Email", errors);
  if (authorEmail !== null && !EMAIL_RE.test(authorEmail)) {
    errors.push({ field: "authorEmail", message: "Invalid email format" });
  }

  const visibility = optionalVisibility(body, errors);

  // Expiration: optional integer minutes in [1, 525600]
  let expirationMinutes: number | null = null;
  const rawExpiration = body.expirationMinutes;
  if (rawExpiration !== undefined && rawExpiration !== null) {
    if (typeof rawExpiration !== "number" || !Number.isInteger(rawExpiration)) {
      errors.push({ field: "expirationMinutes", message: "Expiration must be a whole number of minutes" });
    } else if (rawExpiration < MIN_EXPIRATION_MINUTES) {
      errors.push({ field: "expirationMinutes", message: "Expiration must be at least 1 minute" });
    } else if (rawExpiration > MAX_EXPIRATION_MINUTES) {
      errors.push({
        field: "expirationMinutes",
        message: `Expiration must not exceed 1 year (${MAX_EXPIRATION_MINUTES} minutes)`,
      });
    } else {
      expirationMinutes = rawExpiration;
    }
  }

  const password = optionalString(body, "password", MAX_PASSWORD_LENGTH, "Password", errors);

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return {
    title,
    content,
    language,
    authorName,
    authorEmail,
    visibility,
    expirationMinutes,
    password,
  };
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

export function parseUpdateInput(body: unknown): UpdatePasteInput {
  if (!isRecord(body)) {
    throw new ValidationError([{ field: "body", message: "Request body must be a JSON object" }]);
  }

  const errors: FieldError[] = [];

  const title = optionalString(body, "title", MAX_TITLE_LENGTH, "Title", errors);
  const content = optionalString(body, "content", Number.MAX_SAFE_INTEGER, "Content", errors);
  if (content !== null) {
    checkContentSize(content, errors);
  }
  const language = optionalString(body, "language", MAX_LANGUAGE_LENGTH, "Language", errors);
  const visibility = optionalVisibility(body, errors);

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return { title, content, language, visibility };
}

// ---------------------------------------------------------------------------
// Paging
// ---------------------------------------------------------------------------

function toInt(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string") {
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Zero-based page (min 0, default 0) and size clamped to [1, 100]
 * (default 20). Garbage falls back to the defaults.
 */
export function parsePageRequest(query: { page?: unknown; size?: unknown }): PageRequest {
  const page = Math.max(0, toInt(query.page) ?? 0);
  const size = Math.min(MAX_PAGE_SIZE, Math.max(1, toInt(query.size) ?? DEFAULT_PAGE_SIZE));
  return { page, size };
}
