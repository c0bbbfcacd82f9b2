/**
 * In-memory paste store for development and testing.
 *
 * Mirrors the SQL semantics of PostgresPasteStore over a Map. Records are
 * copied on the way in and out so callers can never mutate stored state
 * without going through save().
 */

import type {
  LanguageCount,
  Page,
  PageRequest,
  PasteRecord,
} from "../../models/paste";
import { buildPage } from "../../models/paste";
import type { PasteStore } from "./types";

function clone(record: PasteRecord): PasteRecord {
  return {
    ...record,
    expiresAt: record.expiresAt ? new Date(record.expiresAt.getTime()) : null,
    createdAt: new Date(record.createdAt.getTime()),
    updatedAt: new Date(record.updatedAt.getTime()),
  };
}

function notExpired(record: PasteRecord, now: Date): boolean {
  return record.expiresAt === null || record.expiresAt.getTime() > now.getTime();
}

function isPublicActive(record: PasteRecord, now: Date): boolean {
  return !record.isDeleted && record.visibility === "PUBLIC" && notExpired(record, now);
}

export class InMemoryPasteStore implements PasteStore {
  readonly name = "memory";

  private readonly records = new Map<string, PasteRecord>();

  // viewCount of an existing record is owned by incrementViewCount and is not overwritten.
  // A soft delete is never undone by a later save.
  async save(record: PasteRecord): Promise<PasteRecord> {
    const existing = this.records.get(record.id);
    const stored = clone(record);
    if (existing) {
      stored.viewCount = existing.viewCount;
      stored.isDeleted = existing.isDeleted || record.isDeleted;
    }
    this.records.set(stored.id, stored);
    return clone(stored);
  }

  async findActiveById(id: string): Promise<PasteRecord | null> {
    const record = this.records.get(id);
    if (!record || record.isDeleted) {
      return null;
    }
    return clone(record);
  }

  async incrementViewCount(id: string): Promise<void> {
    const record = this.records.get(id);
    if (record) {
      record.viewCount += 1;
    }
  }

  async findPublicActive(now: Date, page: PageRequest): Promise<Page<PasteRecord>> {
    return this.query((r) => isPublicActive(r, now), page);
  }

  async search(term: string, now: Date, page: PageRequest): Promise<Page<PasteRecord>> {
    const needle = term.toLowerCase();
    return this.query(
      (r) =>
        isPublicActive(r, now) &&
        (r.title.toLowerCase().includes(needle) ||
          r.content.toLowerCase().includes(needle)),
      page
    );
  }

  async findByLanguageActive(
    language: string,
    now: Date,
    page: PageRequest
  ): Promise<Page<PasteRecord>> {
    const wanted = language.toLowerCase();
    return this.query(
      (r) => isPublicActive(r, now) && r.language?.toLowerCase() === wanted,
      page
    );
  }

  async findRecentPublicActive(
    since: Date,
    now: Date,
    page: PageRequest
  ): Promise<Page<PasteRecord>> {
    return this.query(
      (r) => isPublicActive(r, now) && r.createdAt.getTime() > since.getTime(),
      page
    );
  }

  async countActive(): Promise<number> {
    return this.active().length;
  }

  async countPublicActive(): Promise<number> {
    return this.active().filter((r) => r.visibility === "PUBLIC").length;
  }

  async sumViewCounts(): Promise<number | null> {
    const active = this.active();
    if (active.length === 0) {
      return null;
    }
    return active.reduce((sum, r) => sum + r.viewCount, 0);
  }

  async topLanguages(limit: number): Promise<LanguageCount[]> {
    const counts = new Map<string, number>();
    for (const record of this.active()) {
      if (record.language) {
        counts.set(record.language, (counts.get(record.language) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .map(([language, count]) => ({ language, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, limit);
  }

  async softDeleteExpired(now: Date): Promise<number> {
    let affected = 0;
    for (const record of this.records.values()) {
      if (
        !record.isDeleted &&
        record.expiresAt !== null &&
        record.expiresAt.getTime() < now.getTime()
      ) {
        record.isDeleted = true;
        affected++;
      }
    }
    return affected;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Number of stored records, deleted ones included. */
  size(): number {
    return this.records.size;
  }

  private active(): PasteRecord[] {
    return [...this.records.values()].filter((r) => !r.isDeleted);
  }

  private query(
    predicate: (record: PasteRecord) => boolean,
    request: PageRequest
  ): Page<PasteRecord> {
    const matches = [...this.records.values()]
      .filter(predicate)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    const start = request.page * request.size;
    const items = matches.slice(start, start + request.size).map(clone);
    return buildPage(items, matches.length, request);
  }
}
