import { describe, it, expect, beforeEach } from "vitest";
import type { PasteRecord } from "../models/paste";
import { InMemoryPasteStore } from "../services/pasteStore";
import { START } from "./helpers";

function at(offsetMs: number): Date {
  return new Date(START.getTime() + offsetMs);
}

function record(overrides: Partial<PasteRecord> = {}): PasteRecord {
  return {
    id: "p1",
    title: "Title",
    content: "content",
    language: null,
    authorName: null,
    authorEmail: null,
    visibility: "PUBLIC",
    expiresAt: null,
    secretHash: null,
    viewCount: 0,
    createdAt: START,
    updatedAt: START,
    isDeleted: false,
    ...overrides,
  };
}

let store: InMemoryPasteStore;

beforeEach(() => {
  store = new InMemoryPasteStore();
});

describe("InMemoryPasteStore", () => {
  it("returns copies that do not alias stored state", async () => {
    await store.save(record());

    const first = await store.findActiveById("p1");
    if (!first) throw new Error("expected a record");
    first.title = "mutated";

    expect((await store.findActiveById("p1"))?.title).toBe("Title");
  });

  it("hides soft-deleted records from findActiveById", async () => {
    await store.save(record({ isDeleted: true }));

    expect(await store.findActiveById("p1")).toBeNull();
  });

  it("does not overwrite the view count on save", async () => {
    await store.save(record());
    await store.incrementViewCount("p1");
    await store.incrementViewCount("p1");

    const saved = await store.save(record({ title: "Changed", viewCount: 0 }));

    expect(saved.viewCount).toBe(2);
    expect(saved.title).toBe("Changed");
  });

  it("keeps a deleted record deleted when a stale copy is saved", async () => {
    await store.save(record());
    const stale = await store.findActiveById("p1");
    if (!stale) throw new Error("expected a record");
    await store.save(record({ isDeleted: true }));

    const saved = await store.save({ ...stale, title: "Stale edit" });

    expect(saved.isDeleted).toBe(true);
    expect(await store.findActiveById("p1")).toBeNull();
  });

  it("ignores increments for unknown ids", async () => {
    await expect(store.incrementViewCount("missing")).resolves.toBeUndefined();
  });

  it("matches LIKE wildcard characters literally", async () => {
    await store.save(record({ id: "a", title: "100% done" }));
    await store.save(record({ id: "b", title: "1000 done" }));

    const page = await store.search("0%", at(0), { page: 0, size: 10 });

    expect(page.items.map((r) => r.id)).toEqual(["a"]);
  });

  it("excludes pastes expiring exactly now from public listings", async () => {
    await store.save(record({ id: "a", expiresAt: at(1000) }));
    await store.save(record({ id: "b", expiresAt: at(1001) }));

    const page = await store.findPublicActive(at(1000), { page: 0, size: 10 });

    expect(page.items.map((r) => r.id)).toEqual(["b"]);
  });

  it("counts deleted records in size but not in countActive", async () => {
    await store.save(record({ id: "a" }));
    await store.save(record({ id: "b", isDeleted: true }));

    expect(store.size()).toBe(2);
    expect(await store.countActive()).toBe(1);
  });

  it("returns null for the view sum when nothing is active", async () => {
    expect(await store.sumViewCounts()).toBeNull();
    await store.save(record());
    expect(await store.sumViewCounts()).toBe(0);
  });

  it("limits and ranks top languages", async () => {
    await store.save(record({ id: "a", language: "go" }));
    await store.save(record({ id: "b", language: "rust" }));
    await store.save(record({ id: "c", language: "rust" }));
    await store.save(record({ id: "d", language: "java" }));
    await store.save(record({ id: "e", language: "java" }));
    await store.save(record({ id: "f", language: "java" }));

    expect(await store.topLanguages(2)).toEqual([
      { language: "java", count: 3 },
      { language: "rust", count: 2 },
    ]);
  });

  it("soft-deletes only records strictly past expiry", async () => {
    await store.save(record({ id: "a", expiresAt: at(-1) }));
    await store.save(record({ id: "b", expiresAt: at(0) }));
    await store.save(record({ id: "c" }));

    expect(await store.softDeleteExpired(at(0))).toBe(1);
    expect(await store.findActiveById("a")).toBeNull();
    expect(await store.findActiveById("b")).not.toBeNull();
  });

  it("reports itself reachable", async () => {
    expect(await store.ping()).toBe(true);
    expect(store.name).toBe("memory");
  });
});
