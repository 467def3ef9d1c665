import { describe, it, expect } from "vitest";
import { StatementParser } from "../../src/parser/statement-parser.js";
import { createSilentLogger } from "../helpers/fake-channel.js";

describe("StatementParser", () => {
  const parser = new StatementParser(createSilentLogger());

  describe("INSERT", () => {
    it("pairs columns with the first VALUES row in source order", () => {
      const { descriptor, failure } = parser.parse(
        "INSERT INTO users (email, title) VALUES (@email, 'Dr')",
      );

      expect(failure).toBeUndefined();
      expect(descriptor.operation).toBe("INSERT");
      expect(descriptor.tableName).toBe("users");
      expect(descriptor.targetSource).toBe("users");
      expect(descriptor.insertColumns).toEqual(["email", "title"]);
      expect(descriptor.insertValues).toEqual([
        { kind: "parameter", name: "@email" },
        { kind: "literal", value: "Dr" },
      ]);
      expect(descriptor.whereClause).toBe("");
    });

    it("keeps positional placeholders, numbers and expressions apart", () => {
      const { descriptor } = parser.parse("INSERT INTO users (email, price, created) VALUES ($1, 9.5, now())");

      expect(descriptor.insertColumns).toEqual(["email", "price", "created"]);
      expect(descriptor.insertValues).toEqual([
        { kind: "parameter", name: "$1" },
        { kind: "literal", value: 9.5 },
        { kind: "expression", text: "now()" },
      ]);
    });

    it("records where the VALUES keyword starts", () => {
      const text = "INSERT INTO users (email) VALUES (:email)";
      const { descriptor } = parser.parse(text);
      expect(descriptor.layout.anchorOffset).toBe(text.indexOf("VALUES"));
      expect(descriptor.layout.insertionOffset).toBe(text.length);
    });
  });

  describe("UPDATE", () => {
    it("extracts assignments and the WHERE text", () => {
      const { descriptor } = parser.parse("UPDATE users SET email = :email WHERE id = :id");

      expect(descriptor.operation).toBe("UPDATE");
      expect(descriptor.tableName).toBe("users");
      expect(descriptor.whereClause).toBe("id = :id");
      expect(descriptor.updateFields).toEqual([
        { column: "email", value: { kind: "parameter", name: ":email" } },
      ]);
    });

    it("ignores WHERE inside a string literal or a trailing comment", () => {
      const text = "UPDATE users SET title = 'WHERE x' WHERE id = 5 -- WHERE trailing";
      const { descriptor } = parser.parse(text);

      expect(descriptor.whereClause).toBe("id = 5");
      expect(descriptor.layout.whereOffset).toBe(text.indexOf("WHERE id"));
      expect(descriptor.layout.insertionOffset).toBe(text.indexOf(" -- WHERE trailing"));
      expect(descriptor.updateFields).toEqual([
        { column: "title", value: { kind: "literal", value: "WHERE x" } },
      ]);
    });

    it("keeps the original identifier case", () => {
      const { descriptor } = parser.parse("UPDATE Users SET Email=@Email WHERE Id=@Id");
      expect(descriptor.tableName).toBe("Users");
      expect(descriptor.whereClause).toBe("Id=@Id");
    });
  });

  describe("DELETE", () => {
    it("ignores WHERE inside a block comment", () => {
      const { descriptor } = parser.parse("DELETE FROM users /* WHERE id = 0 */ WHERE id = @id");
      expect(descriptor.operation).toBe("DELETE");
      expect(descriptor.whereClause).toBe("id = @id");
      expect(descriptor.targetSource).toBe("users");
    });

    it("takes the top-level WHERE, not one inside a sub-query", () => {
      const { descriptor } = parser.parse(
        "DELETE FROM users WHERE id IN (SELECT user_id FROM bans WHERE active)",
      );
      expect(descriptor.whereClause).toBe("id IN (SELECT user_id FROM bans WHERE active)");
    });

    it("resolves schema-qualified names", () => {
      const { descriptor } = parser.parse("DELETE FROM sales.orders WHERE id = 1");
      expect(descriptor.schemaName).toBe("sales");
      expect(descriptor.tableName).toBe("orders");
      expect(descriptor.targetSource).toBe("sales.orders");
      expect(descriptor.relationName).toBe("sales.orders");
    });

    it("keeps quoting in the relation name", () => {
      const { descriptor } = parser.parse('DELETE FROM "Sales"."Orders" WHERE id = 1');
      expect(descriptor.relationName).toBe('"Sales"."Orders"');
    });

    it("notes an existing RETURNING clause and stops the WHERE text before it", () => {
      const text = "DELETE FROM users WHERE id = 1 RETURNING id";
      const { descriptor } = parser.parse(text);
      expect(descriptor.layout.returningOffset).toBe(text.indexOf("RETURNING"));
      expect(descriptor.whereClause).toBe("id = 1");
    });

    it("stops before a trailing semicolon", () => {
      const text = "DELETE FROM users WHERE id = 1;";
      expect(parser.parse(text).descriptor.layout.insertionOffset).toBe(text.length - 1);
    });
  });

  describe("unsupported text", () => {
    it("classifies reads as UNKNOWN without a failure", () => {
      const result = parser.parse("SELECT * FROM users");
      expect(result.descriptor.operation).toBe("UNKNOWN");
      expect(result.failure).toBeUndefined();
    });

    it("refuses multiple statements", () => {
      const result = parser.parse("DELETE FROM a; DELETE FROM b");
      expect(result.descriptor.operation).toBe("UNKNOWN");
      expect(result.failure?.kind).toBe("parse");
      expect(result.failure?.message).toBe("Multiple statements are never audited");
    });

    it("reports grammar errors as parse failures", () => {
      const result = parser.parse("UPDATE users SET email = WHERE id = 1");
      expect(result.descriptor.operation).toBe("UNKNOWN");
      expect(result.failure?.kind).toBe("parse");
      expect(result.failure?.message).toBe("SQL grammar error");
    });

    it("reports unterminated literals", () => {
      const result = parser.parse("UPDATE users SET title = 'oops");
      expect(result.descriptor.operation).toBe("UNKNOWN");
      expect(result.failure?.message).toBe("Unterminated literal, identifier or comment");
    });

    it("treats empty text as UNKNOWN", () => {
      expect(parser.parse("   ").descriptor.operation).toBe("UNKNOWN");
    });
  });

  describe("isAuditable", () => {
    it("returns the same answer for the same text", () => {
      const text = "UPDATE users SET email = @email WHERE id = @id";
      expect(parser.isAuditable(text)).toBe(true);
      expect(parser.isAuditable(text)).toBe(true);
      expect(parser.isAuditable("SELECT 1")).toBe(false);
      expect(parser.isAuditable("UPDATE users SET")).toBe(false);
    });
  });
});
