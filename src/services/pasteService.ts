/**
 * Paste lifecycle service.
 *
 * Owns the rules for creating, reading (with expiry and password gating),
 * updating, soft-deleting, listing and sweeping pastes. Persistence is
 * delegated to a PasteStore and password hashing to a SecretHasher.
 *
 * Read gating order for get/update:
 *   1. absent or soft-deleted  -> PasteNotFoundError
 *   2. expired (expiresAt <= now) -> PasteNotFoundError
 *   3. get only: protected and password missing/wrong -> PasteAccessDeniedError
 *   4. get only: atomic view-count increment
 *
 * update() does not ask for the password of a protected paste; holding the
 * id is treated as enough. delete() does not check expiry, so an expired
 * paste the sweep has not reached yet can still be deleted explicitly.
 */

import crypto from "crypto";
import { logger } from "../config/logger";
import {
  isExpired,
  isPasswordProtected,
  mapPage,
  toPublicPaste,
  type LanguageCount,
  type Page,
  type PageRequest,
  type PasteRecord,
  type PublicPaste,
} from "../models/paste";
import { PasteAccessDeniedError, PasteNotFoundError } from "./errors";
import type { PasteStore } from "./pasteStore";
import {
  parseCreateInput,
  parseUpdateInput,
  type CreatePasteInput,
  type UpdatePasteInput,
} from "./pasteValidation";
import type { SecretHasher } from "./secretHasher";

const log = logger.child("pastes");

const MINUTE_MS = 60 * 1000;
const RECENT_WINDOW_MS = 24 * 60 * MINUTE_MS;
const POPULAR_LANGUAGES_LIMIT = 10;

export interface PasteStatistics {
  totalPastes: number;
  publicPastes: number;
  totalViews: number;
  popularLanguages: LanguageCount[];
}

export interface PasteServiceDeps {
  store: PasteStore;
  hasher: SecretHasher;
  /** Clock; defaults to the system time. */
  now?: () => Date;
  /** Id source; defaults to random UUIDs. */
  generateId?: () => string;
}

/** create and update validate their input themselves; a parsed JSON body can be passed as is. */
export interface PasteService {
  create(input: CreatePasteInput): Promise<PublicPaste>;
  get(id: string, password?: string | null): Promise<PublicPaste>;
  update(id: string, changes: UpdatePasteInput): Promise<PublicPaste>;
  delete(id: string): Promise<void>;
  listPublic(page: PageRequest): Promise<Page<PublicPaste>>;
  search(term: string, page: PageRequest): Promise<Page<PublicPaste>>;
  listByLanguage(language: string, page: PageRequest): Promise<Page<PublicPaste>>;
  listRecent(page: PageRequest): Promise<Page<PublicPaste>>;
  statistics(): Promise<PasteStatistics>;
  /** Soft-deletes every paste whose expiry has passed. Returns the number affected. */
  sweepExpired(): Promise<number>;
}

export function createPasteService(deps: PasteServiceDeps): PasteService {
  const { store, hasher } = deps;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? (() => crypto.randomUUID());

  /** Non-deleted and non-expired, or PasteNotFoundError. */
  async function findReadable(id: string, at: Date): Promise<PasteRecord> {
    const paste = await store.findActiveById(id);
    if (!paste || isExpired(paste, at)) {
      throw new PasteNotFoundError(id);
    }
    return paste;
  }

  async function create(input: CreatePasteInput): Promise<PublicPaste> {
    const valid = parseCreateInput(input);
    const createdAt = now();

    const secretHash = valid.password ? await hasher.hash(valid.password) : null;

    const record: PasteRecord = {
      id: generateId(),
      title: valid.title,
      content: valid.content,
      language: valid.language ?? null,
      authorName: valid.authorName ?? null,
      authorEmail: valid.authorEmail ?? null,
      visibility: valid.visibility ?? "PUBLIC",
      expiresAt: valid.expirationMinutes
        ? new Date(createdAt.getTime() + valid.expirationMinutes * MINUTE_MS)
        : null,
      secretHash,
      viewCount: 0,
      createdAt,
      updatedAt: createdAt,
      isDeleted: false,
    };

    const saved = await store.save(record);

    log.info("Paste created", {
      id: saved.id,
      visibility: saved.visibility,
      passwordProtected: secretHash !== null,
      expiresAt: saved.expiresAt?.toISOString() ?? null,
    });

    return toPublicPaste(saved);
  }

  async function get(id: string, password?: string | null): Promise<PublicPaste> {
    const paste = await findReadable(id, now());

    if (isPasswordProtected(paste)) {
      const supplied = password ?? "";
      const verified =
        supplied.trim() !== "" &&
        paste.secretHash !== null &&
        (await hasher.verify(supplied, paste.secretHash));
      if (!verified) {
        log.warn("Access denied", { id, passwordSupplied: supplied.trim() !== "" });
        throw new PasteAccessDeniedError();
      }
    }

    await store.incrementViewCount(id);
    paste.viewCount += 1;

    return toPublicPaste(paste);
  }

  async function update(id: string, changes: UpdatePasteInput): Promise<PublicPaste> {
    const valid = parseUpdateInput(changes);
    const at = now();
    const paste = await findReadable(id, at);

    if (valid.title) paste.title = valid.title;
    if (valid.content) paste.content = valid.content;
    if (valid.language) paste.language = valid.language;
    if (valid.visibility) paste.visibility = valid.visibility;
    paste.updatedAt = at;

    const saved = await store.save(paste);
    // A delete that landed between the read and the save wins
    if (saved.isDeleted) {
      throw new PasteNotFoundError(id);
    }

    log.info("Paste updated", { id });

    return toPublicPaste(saved);
  }

  async function remove(id: string): Promise<void> {
    const paste = await store.findActiveById(id);
    if (!paste) {
      throw new PasteNotFoundError(id);
    }

    paste.isDeleted = true;
    await store.save(paste);

    log.info("Paste deleted", { id });
  }

  async function listPublic(page: PageRequest): Promise<Page<PublicPaste>> {
    return mapPage(await store.findPublicActive(now(), page), toPublicPaste);
  }

  async function search(term: string, page: PageRequest): Promise<Page<PublicPaste>> {
    return mapPage(await store.search(term, now(), page), toPublicPaste);
  }

  async function listByLanguage(language: string, page: PageRequest): Promise<Page<PublicPaste>> {
    return mapPage(await store.findByLanguageActive(language, now(), page), toPublicPaste);
  }

  async function listRecent(page: PageRequest): Promise<Page<PublicPaste>> {
    const at = now();
    const since = new Date(at.getTime() - RECENT_WINDOW_MS);
    return mapPage(await store.findRecentPublicActive(since, at, page), toPublicPaste);
  }

  async function statistics(): Promise<PasteStatistics> {
    const [totalPastes, publicPastes, totalViews, popularLanguages] = await Promise.all([
      store.countActive(),
      store.countPublicActive(),
      store.sumViewCounts(),
      store.topLanguages(POPULAR_LANGUAGES_LIMIT),
    ]);

    return {
      totalPastes,
      publicPastes,
      totalViews: totalViews ?? 0,
      popularLanguages,
    };
  }

  async function sweepExpired(): Promise<number> {
    return store.softDeleteExpired(now());
  }

  return {
    create,
    get,
    update,
    delete: remove,
    listPublic,
    search,
    listByLanguage,
    listRecent,
    statistics,
    sweepExpired,
  };
}
