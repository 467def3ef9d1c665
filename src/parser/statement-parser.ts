import { Parser } from "node-sql-parser";
import { AuditFailure } from "../core/errors.js";
import type { OperationKind } from "../types/audit.js";
import { isNonEmptyString, isRecord } from "../utils/guards.js";
import type { Logger } from "../utils/logger.js";
import { describeLayout, type StatementLayout } from "./layout.js";
import { splitStatements, tokenize, type Token } from "./lexer.js";

export type LiteralValue = string | number | boolean | null;

/**
 * Where a column's new value comes from
 */
export type ValueSource =
  | { kind: "parameter"; name: string }
  | { kind: "literal"; value: LiteralValue }
  | { kind: "expression"; text: string };

export interface UpdateField {
  column: string;
  value: ValueSource;
}

export interface StatementDescriptor {
  operation: OperationKind;
  schemaName?: string;
  tableName: string;
  /** Target reference as written, alias included */
  targetSource: string;
  /** Target name as written, alias dropped; resolved by the server like the statement itself */
  relationName: string;
  /** Verbatim text after the top-level WHERE keyword, or "" */
  whereClause: string;
  insertColumns: string[];
  insertValues: ValueSource[];
  updateFields: UpdateField[];
  layout: StatementLayout;
}

export interface ParseResult {
  descriptor: StatementDescriptor;
  failure?: AuditFailure;
}

const GRAMMAR_OPTIONS = { database: "Postgresql" };

const LEADING: Record<string, Exclude<OperationKind, "UNKNOWN">> = {
  INSERT: "INSERT",
  UPDATE: "UPDATE",
  DELETE: "DELETE",
};

const STRING_LITERALS = new Set([
  "single_quote_string",
  "string",
  "natural_string",
  "escape_string",
  "dollar_quote_string",
]);

/**
 * Classifies statement text and extracts what the capture strategies need
 */
export class StatementParser {
  private grammar = new Parser();

  constructor(private logger: Logger) {}

  /**
   * True when the text is a single INSERT, UPDATE or DELETE
   */
  isAuditable(text: string): boolean {
    return this.parse(text).descriptor.operation !== "UNKNOWN";
  }

  parse(text: string): ParseResult {
    try {
      return this.parseStatement(text);
    } catch (error) {
      this.logger.error("Failed to parse SQL statement:", text, error);
      return {
        descriptor: unknownStatement(text),
        failure: new AuditFailure("parse", "Failed to parse SQL statement", { cause: error }),
      };
    }
  }

  private parseStatement(text: string): ParseResult {
    if (text.trim().length === 0) {
      return { descriptor: unknownStatement(text) };
    }

    const stream = tokenize(text);
    if (!stream.complete) {
      return this.reject(text, "Unterminated literal, identifier or comment");
    }

    const statements = splitStatements(stream.tokens);
    if (statements.length !== 1) {
      return this.reject(text, "Multiple statements are never audited");
    }

    const tokens = statements[0] ?? [];
    const leading = tokens[0];
    const operation = leading?.type === "word" ? LEADING[leading.text.toUpperCase()] : undefined;
    if (!operation) {
      // SELECT, DDL, WITH ... and the rest pass through without a grammar parse
      return { descriptor: unknownStatement(text) };
    }

    const { grammarText, placeholders } = neutralizePlaceholders(text, tokens);

    let tree: unknown;
    try {
      tree = this.grammar.astify(grammarText, GRAMMAR_OPTIONS);
    } catch (error) {
      const { line, column } = errorLocation(error);
      this.logger.warn(
        `SQL parsing error: ${error instanceof Error ? error.message : String(error)} at line ${line ?? "?"}, column ${column ?? "?"}`,
      );
      return {
        descriptor: unknownStatement(text),
        failure: new AuditFailure("parse", "SQL grammar error", { cause: error }),
      };
    }

    const node = singleStatement(tree);
    const nodeType = isRecord(node) && typeof node.type === "string" ? node.type.toUpperCase() : "";
    if (!node || nodeType !== operation) {
      this.logger.warn(`Unsupported statement type: ${nodeType || "none"}`);
      return { descriptor: unknownStatement(text) };
    }

    const spans = describeLayout(text, tokens, operation);
    const target = tableParts(operation === "DELETE" ? firstOf(node.from) ?? firstOf(node.table) : firstOf(node.table));

    const descriptor: StatementDescriptor = {
      operation,
      schemaName: target?.schemaName,
      tableName: target?.tableName ?? "",
      targetSource: spans.targetSource,
      relationName: spans.relationName,
      whereClause: spans.whereClause,
      insertColumns: [],
      insertValues: [],
      updateFields: [],
      layout: spans.layout,
    };

    if (!descriptor.tableName) {
      this.logger.warn("Could not resolve the target table:", text);
    }

    if (operation === "INSERT") {
      descriptor.insertColumns = asArray(node.columns)
        .map(identifierName)
        .filter(isNonEmptyString);
      descriptor.insertValues = firstRow(node.values).map((value, index) =>
        toValueSource(value, spans.valueTexts[index], placeholders),
      );
    }

    if (operation === "UPDATE") {
      descriptor.updateFields = asArray(node.set).flatMap((assignment, index) => {
        if (!isRecord(assignment)) return [];
        const column = identifierName(assignment.column);
        if (!column) return [];
        return [
          {
            column,
            value: toValueSource(assignment.value, spans.assignmentTexts[index], placeholders),
          },
        ];
      });
    }

    return { descriptor };
  }

  private reject(text: string, reason: string): ParseResult {
    this.logger.warn(`${reason}:`, text);
    return { descriptor: unknownStatement(text), failure: new AuditFailure("parse", reason) };
  }
}

export function unknownStatement(text: string): StatementDescriptor {
  return {
    operation: "UNKNOWN",
    tableName: "",
    targetSource: "",
    relationName: "",
    whereClause: "",
    insertColumns: [],
    insertValues: [],
    updateFields: [],
    layout: { insertionOffset: text.trimEnd().length },
  };
}

/**
 * Swap every placeholder for `:pN` so the grammar sees one parameter style
 */
function neutralizePlaceholders(
  text: string,
  tokens: Token[],
): { grammarText: string; placeholders: Map<string, string> } {
  const placeholders = new Map<string, string>();
  let grammarText = "";
  let cursor = 0;

  for (const token of tokens) {
    if (token.type !== "placeholder") continue;
    const neutral = `p${placeholders.size}`;
    placeholders.set(neutral, token.text);
    grammarText += `${text.slice(cursor, token.start)}:${neutral}`;
    cursor = token.end;
  }

  const last = tokens[tokens.length - 1];
  grammarText += text.slice(cursor, last ? last.end : text.length);
  return { grammarText, placeholders };
}

function singleStatement(tree: unknown): Record<string, unknown> | undefined {
  if (Array.isArray(tree)) {
    const statements = tree.filter(isRecord);
    return statements.length === 1 ? statements[0] : undefined;
  }
  return isRecord(tree) ? tree : undefined;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve a 1-, 2- or 3+-part name; with three or more parts the last two win
 */
function tableParts(ref: unknown): { schemaName?: string; tableName: string } | undefined {
  if (!isRecord(ref)) return undefined;
  const parts = [ref.db, ref.schema, ref.table].filter(isNonEmptyString);
  const tableName = parts[parts.length - 1];
  if (!tableName) return undefined;
  return { schemaName: parts.length >= 2 ? parts[parts.length - 2] : undefined, tableName };
}

function identifierName(node: unknown): string | undefined {
  if (typeof node === "string") return node;
  if (!isRecord(node)) return undefined;
  if ("column" in node) return identifierName(node.column);
  if ("expr" in node) return identifierName(node.expr);
  return typeof node.value === "string" ? node.value : undefined;
}

function firstRow(values: unknown): unknown[] {
  const rows = Array.isArray(values) ? values : isRecord(values) ? asArray(values.values) : [];
  const row = rows[0];
  return isRecord(row) ? asArray(row.value) : [];
}

function toValueSource(
  node: unknown,
  verbatim: string | undefined,
  placeholders: Map<string, string>,
): ValueSource {
  const expression: ValueSource = { kind: "expression", text: verbatim ?? "" };
  if (!isRecord(node) || typeof node.type !== "string") return expression;

  const value = node.value;
  switch (node.type) {
    case "param": {
      const neutral = String(value);
      return { kind: "parameter", name: placeholders.get(neutral) ?? `:${neutral}` };
    }
    case "number": {
      if (typeof value === "number") return { kind: "literal", value };
      const parsed = Number(value);
      return Number.isFinite(parsed) ? { kind: "literal", value: parsed } : expression;
    }
    case "bool":
    case "boolean":
      return { kind: "literal", value: value === true || String(value).toUpperCase() === "TRUE" };
    case "null":
      return { kind: "literal", value: null };
    default:
      if (STRING_LITERALS.has(node.type) && typeof value === "string") {
        return { kind: "literal", value };
      }
      return expression;
  }
}

function errorLocation(error: unknown): { line?: number; column?: number } {
  const location = isRecord(error) ? error.location : undefined;
  const start = isRecord(location) ? location.start : undefined;
  if (!isRecord(start)) return {};
  const { line, column } = start;
  return {
    line: typeof line === "number" ? line : undefined,
    column: typeof column === "number" ? column : undefined,
  };
}

export function isParameterSource(
  source: ValueSource | undefined,
): source is { kind: "parameter"; name: string } {
  return source?.kind === "parameter";
}
