import { describe, it, expect } from "vitest";
import { DomainError } from "../error/domain-error.js";
import { isPlainObject, requireNonEmpty } from "./guard.js";

describe("requireNonEmpty", () => {
  it("throws DomainError with the given code", () => {
    expect(() => requireNonEmpty("  ", "NAME_EMPTY", "Name is empty")).toThrow(DomainError);
    expect(() => requireNonEmpty("", "NAME_EMPTY", "Name is empty")).toThrow(
      expect.objectContaining({ code: "NAME_EMPTY", message: "Name is empty" })
    );
  });

  it("passes non-empty values", () => {
    expect(() => requireNonEmpty("x", "NAME_EMPTY", "Name is empty")).not.toThrow();
  });
});

describe("isPlainObject", () => {
  it("accepts objects only", () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject("x")).toBe(false);
  });
});
