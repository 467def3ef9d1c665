import { PgDialect } from "drizzle-orm/pg-core";
import type { SQL } from "drizzle-orm";
import { describe, it, expect, vi } from "vitest";
import { compileStatement, DrizzleQueryChannel, normalizeResult, unboundPlaceholders } from "../../src/db/channel.js";
import { DirectCommand, firstScalar } from "../../src/db/command.js";
import { FakeChannel, rows } from "../helpers/fake-channel.js";

const dialect = new PgDialect();

describe("compileStatement", () => {
  it("binds each placeholder as a numbered parameter", () => {
    const query = dialect.sqlToQuery(
      compileStatement("UPDATE users SET email = @email WHERE id = :id AND tag = $1", {
        "@email": "a@example.com",
        id: 5,
        "1": "x",
      }),
    );

    expect(query.sql).toBe("UPDATE users SET email = $1 WHERE id = $2 AND tag = $3");
    expect(query.params).toEqual(["a@example.com", 5, "x"]);
  });

  it("leaves placeholder-like text inside literals alone", () => {
    const query = dialect.sqlToQuery(
      compileStatement("UPDATE users SET title = '@notaparam' WHERE id = @id", { "@id": 1 }),
    );

    expect(query.sql).toBe("UPDATE users SET title = '@notaparam' WHERE id = $1");
    expect(query.params).toEqual([1]);
  });

  it("keeps casts after a placeholder", () => {
    const query = dialect.sqlToQuery(compileStatement("SELECT @id::int", { "@id": "7" }));

    expect(query.sql).toBe("SELECT $1::int");
    expect(query.params).toEqual(["7"]);
  });

  it("binds an array as a single value", () => {
    const query = dialect.sqlToQuery(
      compileStatement("DELETE FROM users WHERE id = ANY(@ids)", { "@ids": [1, 2] }),
    );

    expect(query.sql).toBe("DELETE FROM users WHERE id = ANY($1)");
    expect(query.params).toEqual([[1, 2]]);
  });

  it("binds an explicit null", () => {
    const query = dialect.sqlToQuery(compileStatement("UPDATE users SET name = @name", { "@name": null }));

    expect(query.params).toEqual([null]);
  });

  it("throws for a placeholder with no binding", () => {
    expect(() => compileStatement("DELETE FROM users WHERE id = @missing", {})).toThrow(
      "No value bound for parameter @missing",
    );
  });
});

describe("unboundPlaceholders", () => {
  it("lists placeholders bound to nothing or undefined", () => {
    expect(unboundPlaceholders("UPDATE t SET a = @a, b = @b WHERE c = @c", { a: 1, "@b": undefined })).toEqual([
      "@b",
      "@c",
    ]);
  });
});

describe("normalizeResult", () => {
  it("reads node-postgres results", () => {
    expect(normalizeResult({ rows: [{ id: 1 }], rowCount: 3 })).toEqual({ rows: [{ id: 1 }], rowCount: 3 });
  });

  it("falls back to the row count when rowCount is missing", () => {
    expect(normalizeResult({ rows: [{ id: 1 }, { id: 2 }], rowCount: null })).toEqual({
      rows: [{ id: 1 }, { id: 2 }],
      rowCount: 2,
    });
  });

  it("reads row arrays carrying a count", () => {
    const result = Object.assign([{ id: 1 }], { count: 4 });

    expect(normalizeResult(result)).toEqual({ rows: [{ id: 1 }], rowCount: 4 });
  });

  it("treats anything else as an empty result", () => {
    expect(normalizeResult(undefined)).toEqual({ rows: [], rowCount: 0 });
  });
});

describe("DrizzleQueryChannel", () => {
  it("executes the compiled statement and normalizes the result", async () => {
    const execute = vi.fn<(query: SQL) => Promise<unknown>>().mockResolvedValue({ rows: [], rowCount: 2 });
    const channel = new DrizzleQueryChannel({ execute });

    const outcome = await channel.query("DELETE FROM users WHERE id = @id", { "@id": 9 });

    expect(outcome).toEqual({ rows: [], rowCount: 2 });
    const call = execute.mock.calls[0];
    if (!call) throw new Error("expected an execute call");
    expect(dialect.sqlToQuery(call[0])).toMatchObject({
      sql: "DELETE FROM users WHERE id = $1",
      params: [9],
    });
  });
});

describe("DirectCommand", () => {
  it("returns the affected row count", async () => {
    const channel = new FakeChannel().on("UPDATE", { rows: [], rowCount: 3 });

    await expect(new DirectCommand(channel, "UPDATE users SET active = true").execute()).resolves.toBe(3);
  });

  it("returns the first column of the first row as a scalar", async () => {
    const channel = new FakeChannel().on("SELECT", rows({ total: 12, other: 1 }));

    await expect(new DirectCommand(channel, "SELECT count(*) AS total").executeScalar()).resolves.toBe(12);
  });

  it("rejects prepare when a placeholder is unbound", async () => {
    const command = new DirectCommand(new FakeChannel(), "DELETE FROM users WHERE id = @id AND org = @org", {
      "@id": 1,
    });

    await expect(command.prepare()).rejects.toThrow("No value bound for parameter(s): @org");
  });

  it("gives null for an empty result", () => {
    expect(firstScalar({ rows: [], rowCount: 0 })).toBeNull();
  });
});
