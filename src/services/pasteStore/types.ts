/**
 * Storage-agnostic paste store interface.
 *
 * The lifecycle rules live in pasteService; a store only persists and queries
 * records. Every "active" query excludes soft-deleted rows, and the list
 * queries additionally exclude rows whose expiry is at or before `now`.
 * List results are ordered newest `createdAt` first.
 */

import type {
  LanguageCount,
  Page,
  PageRequest,
  PasteRecord,
} from "../../models/paste";

export interface PasteStore {
  /** Human-readable name of this store (e.g. "postgres", "memory") */
  name: string;

  /**
   * Insert a new record or replace an existing one, returning the stored
   * state. An existing record keeps its viewCount, and once soft-deleted it
   * stays deleted.
   */
  save(record: PasteRecord): Promise<PasteRecord>;

  /** Non-deleted record by id. Expiry is not considered here. */
  findActiveById(id: string): Promise<PasteRecord | null>;

  /** Atomic `view_count = view_count + 1`. */
  incrementViewCount(id: string): Promise<void>;

  findPublicActive(now: Date, page: PageRequest): Promise<Page<PasteRecord>>;

  /** Case-insensitive substring match on title or content among public active pastes. */
  search(term: string, now: Date, page: PageRequest): Promise<Page<PasteRecord>>;

  /** Case-insensitive language match among public active pastes. */
  findByLanguageActive(
    language: string,
    now: Date,
    page: PageRequest
  ): Promise<Page<PasteRecord>>;

  /** Public active pastes created strictly after `since`. */
  findRecentPublicActive(
    since: Date,
    now: Date,
    page: PageRequest
  ): Promise<Page<PasteRecord>>;

  /** Non-deleted pastes, expired or not. */
  countActive(): Promise<number>;

  countPublicActive(): Promise<number>;

  /** Sum of view counts over non-deleted pastes; null when there are none. */
  sumViewCounts(): Promise<number | null>;

  /** Most used non-empty languages among non-deleted pastes, count descending. */
  topLanguages(limit: number): Promise<LanguageCount[]>;

  /**
   * Soft-delete every non-deleted record whose expiry is strictly before `now`
   * in one atomic operation. Returns the number of records affected.
   */
  softDeleteExpired(now: Date): Promise<number>;

  /** Connectivity probe for the health endpoint. */
  ping(): Promise<boolean>;
}
