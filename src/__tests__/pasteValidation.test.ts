import { describe, it, expect } from "vitest";
import { ValidationError } from "../services/errors";
import {
  parseCreateInput,
  parsePageRequest,
  parseUpdateInput,
} from "../services/pasteValidation";

/** Runs fn and returns the field errors of the ValidationError it throws. */
function fieldErrors(fn: () => unknown) {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      return err.details;
    }
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("parseCreateInput", () => {
  it("normalizes blank optional fields to null", () => {
    const input = parseCreateInput({
      title: "Notes",
      content: "body",
      language: "  ",
      authorName: "",
      password: " ",
    });

    expect(input).toEqual({
      title: "Notes",
      content: "body",
      language: null,
      authorName: null,
      authorEmail: null,
      visibility: null,
      expirationMinutes: null,
      password: null,
    });
  });

  it("accepts visibility in any casing", () => {
    expect(parseCreateInput({ title: "t", content: "c", visibility: "unlisted" }).visibility).toBe(
      "UNLISTED"
    );
  });

  it("rejects a non-object body", () => {
    expect(fieldErrors(() => parseCreateInput("hello"))).toEqual([
      { field: "body", message: "Request body must be a JSON object" },
    ]);
    expect(fieldErrors(() => parseCreateInput([]))).toEqual([
      { field: "body", message: "Request body must be a JSON object" },
    ]);
  });

  it("reports every failing field at once", () => {
    const errors = fieldErrors(() =>
      parseCreateInput({
        title: "   ",
        content: "",
        authorEmail: "not-an-email",
        visibility: "SECRET",
        expirationMinutes: 0,
      })
    );

    expect(errors).toEqual([
      { field: "title", message: "Title is required" },
      { field: "content", message: "Content is required" },
      { field: "authorEmail", message: "Invalid email format" },
      { field: "visibility", message: "Visibility must be one of PUBLIC, UNLISTED, PRIVATE" },
      { field: "expirationMinutes", message: "Expiration must be at least 1 minute" },
    ]);
  });

  it("enforces the title length limit", () => {
    expect(() => parseCreateInput({ title: "t".repeat(200), content: "c" })).not.toThrow();
    expect(fieldErrors(() => parseCreateInput({ title: "t".repeat(201), content: "c" }))).toEqual([
      { field: "title", message: "Title must not exceed 200 characters" },
    ]);
  });

  it("measures content in UTF-8 bytes", () => {
    // "é" is two bytes
    const atLimit = "é".repeat(500_000);
    const overLimit = atLimit + "x";

    expect(() => parseCreateInput({ title: "t", content: atLimit })).not.toThrow();
    expect(fieldErrors(() => parseCreateInput({ title: "t", content: overLimit }))).toEqual([
      { field: "content", message: "Content must not exceed 1MB" },
    ]);
  });

  it("enforces the expiration range", () => {
    expect(parseCreateInput({ title: "t", content: "c", expirationMinutes: 1 }).expirationMinutes).toBe(1);
    expect(
      parseCreateInput({ title: "t", content: "c", expirationMinutes: 525_600 }).expirationMinutes
    ).toBe(525_600);
    expect(
      fieldErrors(() => parseCreateInput({ title: "t", content: "c", expirationMinutes: 525_601 }))
    ).toEqual([
      { field: "expirationMinutes", message: "Expiration must not exceed 1 year (525600 minutes)" },
    ]);
    expect(
      fieldErrors(() => parseCreateInput({ title: "t", content: "c", expirationMinutes: 1.5 }))
    ).toEqual([
      { field: "expirationMinutes", message: "Expiration must be a whole number of minutes" },
    ]);
    expect(
      fieldErrors(() => parseCreateInput({ title: "t", content: "c", expirationMinutes: "10" }))
    ).toEqual([
      { field: "expirationMinutes", message: "Expiration must be a whole number of minutes" },
    ]);
  });

  it("rejects non-string optional fields", () => {
    expect(fieldErrors(() => parseCreateInput({ title: "t", content: "c", language: 42 }))).toEqual([
      { field: "language", message: "Language must be a string" },
    ]);
  });

  it("limits password length", () => {
    expect(
      fieldErrors(() => parseCreateInput({ title: "t", content: "c", password: "p".repeat(101) }))
    ).toEqual([{ field: "password", message: "Password must not exceed 100 characters" }]);
  });
});

describe("parseUpdateInput", () => {
  it("returns null for every absent or blank field", () => {
    expect(parseUpdateInput({ title: " ", content: "" })).toEqual({
      title: null,
      content: null,
      language: null,
      visibility: null,
    });
  });

  it("passes supplied fields through", () => {
    expect(parseUpdateInput({ title: "New", visibility: "private" })).toEqual({
      title: "New",
      content: null,
      language: null,
      visibility: "PRIVATE",
    });
  });

  it("applies the same limits as create", () => {
    expect(fieldErrors(() => parseUpdateInput({ language: "l".repeat(51) }))).toEqual([
      { field: "language", message: "Language must not exceed 50 characters" },
    ]);
  });
});

describe("parsePageRequest", () => {
  it("defaults to the first page of 20", () => {
    expect(parsePageRequest({})).toEqual({ page: 0, size: 20 });
  });

  it("parses query strings", () => {
    expect(parsePageRequest({ page: "3", size: "5" })).toEqual({ page: 3, size: 5 });
  });

  it("clamps out-of-range values", () => {
    expect(parsePageRequest({ page: "-2", size: "1000" })).toEqual({ page: 0, size: 100 });
    expect(parsePageRequest({ size: "0" })).toEqual({ page: 0, size: 1 });
  });

  it("falls back to defaults for garbage", () => {
    expect(parsePageRequest({ page: "abc", size: ["1"] })).toEqual({ page: 0, size: 20 });
  });
});
