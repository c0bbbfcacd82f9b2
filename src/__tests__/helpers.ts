/**
 * Shared fixtures: a controllable clock and a service wired to the
 * in-memory store with a cheap bcrypt cost.
 */

import { createPasteService, type PasteService } from "../services/pasteService";
import { InMemoryPasteStore } from "../services/pasteStore";
import { BcryptSecretHasher } from "../services/secretHasher";

export const START = new Date("2026-03-01T12:00:00.000Z");

export interface TestClock {
  now(): Date;
  advance(ms: number): void;
}

export function createClock(start: Date = START): TestClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export interface TestContext {
  service: PasteService;
  store: InMemoryPasteStore;
  hasher: BcryptSecretHasher;
  clock: TestClock;
}

/** bcrypt's minimum cost keeps hashing fast in tests. */
export function createTestContext(): TestContext {
  const store = new InMemoryPasteStore();
  const hasher = new BcryptSecretHasher(4);
  const clock = createClock();
  let counter = 0;
  const service = createPasteService({
    store,
    hasher,
    now: clock.now,
    generateId: () => `paste-${++counter}`,
  });
  return { service, store, hasher, clock };
}
