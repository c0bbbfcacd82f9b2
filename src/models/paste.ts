/**
 * Paste model types.
 * Defines the stored record, the database row shape and the public shape
 * returned by the API (no secret hash, no author email).
 */

export const VISIBILITIES = ["PUBLIC", "UNLISTED", "PRIVATE"] as const;

/** PUBLIC pastes are listed and searchable; the others are reachable by id only. */
export type Visibility = (typeof VISIBILITIES)[number];

export function isVisibility(value: unknown): value is Visibility {
  return typeof value === "string" && VISIBILITIES.some((v) => v === value);
}

/** A paste as held by the store. Absent optional values are `null`. */
export interface PasteRecord {
  id: string;
  title: string;
  content: string;
  language: string | null;
  authorName: string | null;
  authorEmail: string | null;
  visibility: Visibility;
  expiresAt: Date | null;
  secretHash: string | null;
  viewCount: number;
  createdAt: Date;
  updatedAt: Date;
  isDeleted: boolean;
}

/** Full paste row as stored in PostgreSQL. */
export interface PasteRow {
  id: string;
  title: string;
  content: string;
  language: string | null;
  author_name: string | null;
  author_email: string | null;
  visibility: string;
  expires_at: Date | null;
  password_hash: string | null;
  // BIGINT comes back from pg as a string
  view_count: string | number;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
}

/** Public paste object returned by API responses. */
export interface PublicPaste {
  id: string;
  title: string;
  content: string;
  language: string | null;
  authorName: string | null;
  visibility: Visibility;
  viewCount: number;
  passwordProtected: boolean;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date | null;
}

/** One page of results. `page` is zero-based. */
export interface Page<T> {
  items: T[];
  page: number;
  size: number;
  total: number;
  totalPages: number;
}

export interface PageRequest {
  page: number;
  size: number;
}

export interface LanguageCount {
  language: string;
  count: number;
}

export function isPasswordProtected(paste: PasteRecord): boolean {
  return paste.secretHash !== null && paste.secretHash !== "";
}

/** A paste whose expiry instant has been reached is no longer readable. */
export function isExpired(paste: PasteRecord, now: Date): boolean {
  return paste.expiresAt !== null && paste.expiresAt.getTime() <= now.getTime();
}

export function toPublicPaste(paste: PasteRecord): PublicPaste {
  return {
    id: paste.id,
    title: paste.title,
    content: paste.content,
    language: paste.language,
    authorName: paste.authorName,
    visibility: paste.visibility,
    viewCount: paste.viewCount,
    passwordProtected: isPasswordProtected(paste),
    createdAt: paste.createdAt,
    updatedAt: paste.updatedAt,
    expiresAt: paste.expiresAt,
  };
}

/** Converts a PostgreSQL row into a PasteRecord. */
export function fromRow(row: PasteRow): PasteRecord {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    language: row.language,
    authorName: row.author_name,
    authorEmail: row.author_email,
    visibility: isVisibility(row.visibility) ? row.visibility : "PUBLIC",
    expiresAt: row.expires_at,
    secretHash: row.password_hash,
    viewCount: Number(row.view_count),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    isDeleted: row.is_deleted,
  };
}

export function mapPage<T, U>(page: Page<T>, fn: (item: T) => U): Page<U> {
  return { ...page, items: page.items.map(fn) };
}

export function buildPage<T>(items: T[], total: number, request: PageRequest): Page<T> {
  return {
    items,
    page: request.page,
    size: request.size,
    total,
    totalPages: Math.ceil(total / request.size),
  };
}
