/**
 * API tests
 *
 * Drive the Express app through supertest against the in-memory store, so
 * no database is needed. The paste service runs on a test clock; request
 * handling (rate limits, request ids) uses real time.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../app";
import { createTestContext, type TestContext } from "./helpers";

let ctx: TestContext;
let app: Express;

beforeEach(() => {
  ctx = createTestContext();
  app = createApp({ pasteService: ctx.service, store: ctx.store });
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function createPaste(body: Record<string, unknown>) {
  const res = await request(app).post("/api/pastes").send(body);
  expect(res.status).toBe(201);
  return res.body.paste;
}

// ---------------------------------------------------------------------------
// Health and config
// ---------------------------------------------------------------------------

describe("GET /api/health", () => {
  it("reports the store as connected", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.store).toEqual({ name: "memory", connected: true });
    expect(res.body.scheduler).toEqual({ running: false, nextSweep: null });
  });

  it("returns 503 when the store cannot be reached", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(ctx.store, "ping").mockRejectedValue(new Error("refused"));

    const res = await request(app).get("/api/health");

    expect(res.status).toBe(503);
    expect(res.body.status).toBe("degraded");
    expect(res.body.store.connected).toBe(false);
  });
});

describe("GET /api/config", () => {
  it("returns the base URL without a trailing slash", async () => {
    const res = await request(app).get("/api/config");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ baseUrl: "http://localhost:8097", appName: "Pastebin" });
  });
});

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

describe("POST /api/pastes", () => {
  it("creates a paste and returns 201", async () => {
    const res = await request(app)
      .post("/api/pastes")
      .send({ title: "Hello", content: "print('hi')", language: "python" });

    expect(res.status).toBe(201);
    expect(res.body.paste).toEqual({
      id: "paste-1",
      title: "Hello",
      content: "print('hi')",
      language: "python",
      authorName: null,
      visibility: "PUBLIC",
      viewCount: 0,
      passwordProtected: false,
      createdAt: "2026-03-01T12:00:00.000Z",
      updatedAt: "2026-03-01T12:00:00.000Z",
      expiresAt: null,
    });
  });

  it("returns 400 with field details for an invalid body", async () => {
    const res = await request(app).post("/api/pastes").send({ title: "Only a title" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.message).toBe("Validation failed");
    expect(res.body.error.details).toEqual([{ field: "content", message: "Content is required" }]);
  });

  it("rejects oversized content with a field error rather than a 413", async () => {
    // 700,000 three-byte characters: 2.1MB of UTF-8
    const res = await request(app)
      .post("/api/pastes")
      .send({ title: "Big", content: "\u20ac".repeat(700_000) });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([
      { field: "content", message: "Content must not exceed 1MB" },
    ]);
    expect(ctx.store.size()).toBe(0);
  });

  it("returns 400 INVALID_JSON for a malformed body", async () => {
    const res = await request(app)
      .post("/api/pastes")
      .set("Content-Type", "application/json")
      .send('{"title": ');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("INVALID_JSON");
  });

  it("trims and strips tags from the title but keeps content verbatim", async () => {
    const paste = await createPaste({ title: "  <b>Hi</b>  ", content: "  <b>raw</b>  " });

    expect(paste.title).toBe("Hi");
    expect(paste.content).toBe("  <b>raw</b>  ");
  });

  it("does not return the password or author email", async () => {
    const paste = await createPaste({
      title: "Locked",
      content: "body",
      password: "p1",
      authorEmail: "author@example.com",
    });

    expect(paste.passwordProtected).toBe(true);
    expect(paste).not.toHaveProperty("password");
    expect(paste).not.toHaveProperty("secretHash");
    expect(paste).not.toHaveProperty("authorEmail");
  });
});

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

describe("GET /api/pastes/:id", () => {
  it("returns the paste and counts the view", async () => {
    const created = await createPaste({ title: "Hello", content: "body" });

    const res = await request(app).get(`/api/pastes/${created.id}`);

    expect(res.status).toBe(200);
    expect(res.body.paste.viewCount).toBe(1);
  });

  it("returns 404 for an unknown id", async () => {
    const res = await request(app).get("/api/pastes/missing");

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("PASTE_NOT_FOUND");
    expect(res.body.error.message).toBe("Paste not found: missing");
  });

  it("returns 404 once the paste has expired", async () => {
    const created = await createPaste({ title: "Brief", content: "body", expirationMinutes: 1 });
    ctx.clock.advance(2 * 60 * 1000);

    const res = await request(app).get(`/api/pastes/${created.id}`);

    expect(res.status).toBe(404);
  });

  it("returns 403 for a protected paste without a password", async () => {
    const created = await createPaste({ title: "Locked", content: "body", password: "p1" });

    const res = await request(app).get(`/api/pastes/${created.id}`);

    expect(res.status).toBe(403);
    expect(res.body.error).toMatchObject({ code: "ACCESS_DENIED", message: "Invalid password" });
  });

  it("accepts the password as a query parameter", async () => {
    const created = await createPaste({ title: "Locked", content: "body", password: "p1" });

    const res = await request(app).get(`/api/pastes/${created.id}`).query({ password: "p1" });

    expect(res.status).toBe(200);
    expect(res.body.paste.content).toBe("body");
  });

  it("accepts the password in the X-Paste-Password header", async () => {
    const created = await createPaste({ title: "Locked", content: "body", password: "p1" });

    const ok = await request(app).get(`/api/pastes/${created.id}`).set("X-Paste-Password", "p1");
    const denied = await request(app)
      .get(`/api/pastes/${created.id}`)
      .set("X-Paste-Password", "p2");

    expect(ok.status).toBe(200);
    expect(denied.status).toBe(403);
  });
});

// ---------------------------------------------------------------------------
// Update and delete
// ---------------------------------------------------------------------------

describe("PUT /api/pastes/:id", () => {
  it("updates the supplied fields", async () => {
    const created = await createPaste({ title: "Before", content: "original" });
    ctx.clock.advance(1000);

    const res = await request(app).put(`/api/pastes/${created.id}`).send({ title: "After" });

    expect(res.status).toBe(200);
    expect(res.body.paste.title).toBe("After");
    expect(res.body.paste.content).toBe("original");
    expect(res.body.paste.updatedAt).toBe("2026-03-01T12:00:01.000Z");
  });

  it("returns 400 for an invalid visibility", async () => {
    const created = await createPaste({ title: "t", content: "c" });

    const res = await request(app).put(`/api/pastes/${created.id}`).send({ visibility: "HIDDEN" });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([
      { field: "visibility", message: "Visibility must be one of PUBLIC, UNLISTED, PRIVATE" },
    ]);
  });

  it("returns 400 for a body that is not an object", async () => {
    const created = await createPaste({ title: "t", content: "c" });

    const res = await request(app).put(`/api/pastes/${created.id}`).send(["title"]);

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([
      { field: "body", message: "Request body must be a JSON object" },
    ]);
  });

  it("returns 404 for an unknown id", async () => {
    const res = await request(app).put("/api/pastes/missing").send({ title: "x" });

    expect(res.status).toBe(404);
  });
});

describe("DELETE /api/pastes/:id", () => {
  it("returns 204 and then 404", async () => {
    const created = await createPaste({ title: "Gone", content: "body" });

    const first = await request(app).delete(`/api/pastes/${created.id}`);
    const second = await request(app).delete(`/api/pastes/${created.id}`);
    const read = await request(app).get(`/api/pastes/${created.id}`);

    expect(first.status).toBe(204);
    expect(second.status).toBe(404);
    expect(read.status).toBe(404);
  });
});

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

describe("listings", () => {
  it("lists public pastes with pagination", async () => {
    await createPaste({ title: "one", content: "x" });
    ctx.clock.advance(1000);
    await createPaste({ title: "two", content: "x" });
    ctx.clock.advance(1000);
    await createPaste({ title: "hidden", content: "x", visibility: "unlisted" });

    const res = await request(app).get("/api/pastes/public").query({ page: 0, size: 1 });

    expect(res.status).toBe(200);
    expect(res.body.pastes.map((p: { title: string }) => p.title)).toEqual(["two"]);
    expect(res.body.pagination).toEqual({ page: 0, size: 1, total: 2, totalPages: 2 });
  });

  it("caps the page size at 100", async () => {
    const res = await request(app).get("/api/pastes/public").query({ size: 1000 });

    expect(res.body.pagination).toEqual({ page: 0, size: 100, total: 0, totalPages: 0 });
  });

  it("searches public pastes", async () => {
    await createPaste({ title: "greeting", content: "Hello World" });
    await createPaste({ title: "other", content: "bye" });

    const res = await request(app).get("/api/pastes/search").query({ q: "hello" });

    expect(res.status).toBe(200);
    expect(res.body.pastes.map((p: { title: string }) => p.title)).toEqual(["greeting"]);
  });

  it("requires a search term", async () => {
    const res = await request(app).get("/api/pastes/search");

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([{ field: "q", message: "Search term is required" }]);
  });

  it("lists by language", async () => {
    await createPaste({ title: "go one", content: "x", language: "go" });
    await createPaste({ title: "py one", content: "x", language: "python" });

    const res = await request(app).get("/api/pastes/language/go");

    expect(res.body.pastes.map((p: { title: string }) => p.title)).toEqual(["go one"]);
  });

  it("lists recent pastes", async () => {
    await createPaste({ title: "old", content: "x" });
    ctx.clock.advance(25 * 60 * 60 * 1000);
    await createPaste({ title: "new", content: "x" });

    const res = await request(app).get("/api/pastes/recent");

    expect(res.body.pastes.map((p: { title: string }) => p.title)).toEqual(["new"]);
  });

  it("returns statistics", async () => {
    const created = await createPaste({ title: "a", content: "x", language: "go" });
    await createPaste({ title: "b", content: "x", visibility: "PRIVATE" });
    await request(app).get(`/api/pastes/${created.id}`);

    const res = await request(app).get("/api/pastes/stats");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      totalPastes: 2,
      publicPastes: 1,
      totalViews: 1,
      popularLanguages: [{ language: "go", count: 1 }],
    });
  });
});

// ---------------------------------------------------------------------------
// Admin
// ---------------------------------------------------------------------------

describe("admin routes", () => {
  it("rejects requests without the admin key", async () => {
    const res = await request(app).post("/api/admin/sweep");

    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe("INVALID_ADMIN_KEY");
  });

  it("runs a sweep on demand", async () => {
    await createPaste({ title: "Brief", content: "body", expirationMinutes: 1 });
    ctx.clock.advance(2 * 60 * 1000);

    const res = await request(app).post("/api/admin/sweep").set("X-Admin-Key", "test-admin-key");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "Sweep completed", deleted: 1, nextSweepAt: null });
  });

  it("exposes metrics", async () => {
    const res = await request(app).get("/api/admin/metrics").set("X-Admin-Key", "test-admin-key");

    expect(res.status).toBe(200);
    expect(res.body).toHaveProperty("requestCount");
    expect(res.body).toHaveProperty("sweepCount");
  });
});

// ---------------------------------------------------------------------------
// Cross-cutting
// ---------------------------------------------------------------------------

describe("error handling", () => {
  it("returns 404 JSON for unknown API routes", async () => {
    const res = await request(app).get("/api/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { message: "Not found", code: "NOT_FOUND" } });
  });

  it("hides store failures behind a generic 500", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(ctx.store, "findPublicActive").mockRejectedValue(new Error("connection lost"));

    const res = await request(app).get("/api/pastes/public");

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe("INTERNAL_ERROR");
    expect(res.body.error.message).toBe("Internal server error");
    expect(res.body.error).not.toHaveProperty("stack");
  });

  it("tags every response with a request id", async () => {
    const res = await request(app).get("/api/pastes/missing");

    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.body.error.requestId).toBe(res.headers["x-request-id"]);
  });
});
