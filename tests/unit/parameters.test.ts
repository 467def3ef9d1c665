import { describe, it, expect } from "vitest";
import { bareBindings, resolveParameter, stripSigil } from "../../src/parser/parameters.js";

describe("stripSigil", () => {
  it("drops one leading sigil", () => {
    expect(stripSigil("@id")).toBe("id");
    expect(stripSigil(":id")).toBe("id");
    expect(stripSigil("$1")).toBe("1");
    expect(stripSigil("id")).toBe("id");
  });
});

describe("resolveParameter", () => {
  it("matches either sigil convention", () => {
    expect(resolveParameter({ "@email": "a@example.com" }, "@email")).toEqual({
      found: true,
      value: "a@example.com",
    });
    expect(resolveParameter({ email: "a@example.com" }, "@email")).toEqual({
      found: true,
      value: "a@example.com",
    });
    expect(resolveParameter({ ":email": "a@example.com" }, "@email")).toEqual({
      found: true,
      value: "a@example.com",
    });
  });

  it("resolves positional placeholders by number", () => {
    expect(resolveParameter({ "1": 42 }, "$1")).toEqual({ found: true, value: 42 });
    expect(resolveParameter({ $1: 42 }, "$1")).toEqual({ found: true, value: 42 });
  });

  it("treats null as a bound value and undefined as unbound", () => {
    expect(resolveParameter({ "@title": null }, "@title")).toEqual({ found: true, value: null });
    expect(resolveParameter({ "@title": undefined }, "@title")).toEqual({ found: false });
    expect(resolveParameter({}, "@title")).toEqual({ found: false });
  });

  it("ignores inherited properties", () => {
    expect(resolveParameter({}, "toString")).toEqual({ found: false });
  });
});

describe("bareBindings", () => {
  it("strips sigils and drops unbound keys", () => {
    expect(bareBindings({ "@email": "a@example.com", ":price": null, $1: 3, skipped: undefined })).toEqual({
      email: "a@example.com",
      price: null,
      "1": 3,
    });
  });
});
