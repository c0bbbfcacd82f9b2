/**
 * Paste store module.
 *
 * Provides a factory for creating paste stores based on configuration.
 *
 * Usage:
 *   import { getPasteStore } from '../services/pasteStore';
 *
 *   const store = getPasteStore();
 *   const paste = await store.findActiveById(id);
 */

import { env } from "../../config/env";
import { getPool } from "../../config/database";
import { InMemoryPasteStore } from "./memoryStore";
import { PostgresPasteStore } from "./postgresStore";
import type { PasteStore } from "./types";

export type { PasteStore } from "./types";
export { InMemoryPasteStore } from "./memoryStore";
export { PostgresPasteStore } from "./postgresStore";

/**
 * Create a paste store by name.
 *
 * @param storeName - "postgres" or "memory"
 * @throws Error if the store name is not recognized
 */
export function createPasteStore(storeName: string): PasteStore {
  switch (storeName.toLowerCase()) {
    case "memory":
      return new InMemoryPasteStore();

    case "postgres":
      return new PostgresPasteStore(getPool());

    default:
      throw new Error(
        `Unknown paste store: "${storeName}". Supported stores: postgres, memory`
      );
  }
}

/**
 * Get the paste store selected by STORE_PROVIDER (defaults to "postgres").
 */
export function getPasteStore(): PasteStore {
  return createPasteStore(env.STORE_PROVIDER);
}
