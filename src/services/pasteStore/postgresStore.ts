/**
 * PostgreSQL paste store.
 * All database interactions for the pastes table go through this module.
 */

import type { Pool } from "pg";
import type {
  LanguageCount,
  Page,
  PageRequest,
  PasteRecord,
  PasteRow,
} from "../../models/paste";
import { buildPage, fromRow } from "../../models/paste";
import type { PasteStore } from "./types";

const COLUMNS = `id, title, content, language, author_name, author_email, visibility,
       expires_at, password_hash, view_count, created_at, updated_at, is_deleted`;

/** Shared WHERE fragment: public, not deleted, not expired at $1. */
const PUBLIC_ACTIVE = `is_deleted = FALSE
       AND visibility = 'PUBLIC'
       AND (expires_at IS NULL OR expires_at > $1)`;

/** Escape LIKE wildcards so a search term is matched literally. */
function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PostgresPasteStore implements PasteStore {
  readonly name = "postgres";

  constructor(private readonly pool: Pool) {}

  // view_count of an existing row is owned by incrementViewCount and is not overwritten.
  // A soft delete is never undone by a later save.
  async save(record: PasteRecord): Promise<PasteRecord> {
    const result = await this.pool.query<PasteRow>(
      `INSERT INTO pastes (id, title, content, language, author_name, author_email, visibility,
                           expires_at, password_hash, view_count, created_at, updated_at, is_deleted)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       ON CONFLICT (id) DO UPDATE SET
         title = EXCLUDED.title,
         content = EXCLUDED.content,
         language = EXCLUDED.language,
         author_name = EXCLUDED.author_name,
         author_email = EXCLUDED.author_email,
         visibility = EXCLUDED.visibility,
         expires_at = EXCLUDED.expires_at,
         password_hash = EXCLUDED.password_hash,
         updated_at = EXCLUDED.updated_at,
         is_deleted = pastes.is_deleted OR EXCLUDED.is_deleted
       RETURNING ${COLUMNS}`,
      [
        record.id,
        record.title,
        record.content,
        record.language,
        record.authorName,
        record.authorEmail,
        record.visibility,
        record.expiresAt,
        record.secretHash,
        record.viewCount,
        record.createdAt,
        record.updatedAt,
        record.isDeleted,
      ]
    );

    return fromRow(result.rows[0]);
  }

  async findActiveById(id: string): Promise<PasteRecord | null> {
    const result = await this.pool.query<PasteRow>(
      `SELECT ${COLUMNS}
       FROM pastes
       WHERE id = $1 AND is_deleted = FALSE`,
      [id]
    );

    return result.rows[0] ? fromRow(result.rows[0]) : null;
  }

  async incrementViewCount(id: string): Promise<void> {
    await this.pool.query(
      `UPDATE pastes SET view_count = view_count + 1 WHERE id = $1`,
      [id]
    );
  }

  async findPublicActive(now: Date, page: PageRequest): Promise<Page<PasteRecord>> {
    return this.paginate(PUBLIC_ACTIVE, [now], page);
  }

  async search(term: string, now: Date, page: PageRequest): Promise<Page<PasteRecord>> {
    return this.paginate(
      `${PUBLIC_ACTIVE}
       AND (title ILIKE $2 OR content ILIKE $2)`,
      [now, `%${escapeLike(term)}%`],
      page
    );
  }

  async findByLanguageActive(
    language: string,
    now: Date,
    page: PageRequest
  ): Promise<Page<PasteRecord>> {
    return this.paginate(
      `${PUBLIC_ACTIVE}
       AND LOWER(language) = LOWER($2)`,
      [now, language],
      page
    );
  }

  async findRecentPublicActive(
    since: Date,
    now: Date,
    page: PageRequest
  ): Promise<Page<PasteRecord>> {
    return this.paginate(
      `${PUBLIC_ACTIVE}
       AND created_at > $2`,
      [now, since],
      page
    );
  }

  async countActive(): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM pastes WHERE is_deleted = FALSE`
    );
    return parseInt(result.rows[0].count, 10);
  }

  async countPublicActive(): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count
       FROM pastes
       WHERE is_deleted = FALSE AND visibility = 'PUBLIC'`
    );
    return parseInt(result.rows[0].count, 10);
  }

  async sumViewCounts(): Promise<number | null> {
    const result = await this.pool.query<{ total: string | null }>(
      `SELECT SUM(view_count) AS total FROM pastes WHERE is_deleted = FALSE`
    );
    const total = result.rows[0].total;
    return total === null ? null : Number(total);
  }

  async topLanguages(limit: number): Promise<LanguageCount[]> {
    const result = await this.pool.query<{ language: string; count: string }>(
      `SELECT language, COUNT(*) AS count
       FROM pastes
       WHERE is_deleted = FALSE AND language IS NOT NULL AND language <> ''
       GROUP BY language
       ORDER BY count DESC
       LIMIT $1`,
      [limit]
    );
    return result.rows.map((row) => ({
      language: row.language,
      count: parseInt(row.count, 10),
    }));
  }

  async softDeleteExpired(now: Date): Promise<number> {
    const result = await this.pool.query(
      `UPDATE pastes
       SET is_deleted = TRUE
       WHERE is_deleted = FALSE AND expires_at IS NOT NULL AND expires_at < $1`,
      [now]
    );
    return result.rowCount ?? 0;
  }

  async ping(): Promise<boolean> {
    const client = await this.pool.connect();
    try {
      await client.query("SELECT 1");
      return true;
    } finally {
      client.release();
    }
  }

  /**
   * Runs a filtered, newest-first page query plus its COUNT(*) over the same
   * filter. `where` may reference `params` as $1..$n; LIMIT/OFFSET are appended.
   */
  private async paginate(
    where: string,
    params: unknown[],
    request: PageRequest
  ): Promise<Page<PasteRecord>> {
    const limitIdx = params.length + 1;
    const offsetIdx = params.length + 2;

    const [rows, count] = await Promise.all([
      this.pool.query<PasteRow>(
        `SELECT ${COLUMNS}
         FROM pastes
         WHERE ${where}
         ORDER BY created_at DESC
         LIMIT $${limitIdx} OFFSET $${offsetIdx}`,
        [...params, request.size, request.page * request.size]
      ),
      this.pool.query<{ count: string }>(
        `SELECT COUNT(*) AS count FROM pastes WHERE ${where}`,
        params
      ),
    ]);

    return buildPage(
      rows.rows.map(fromRow),
      parseInt(count.rows[0].count, 10),
      request
    );
  }
}
