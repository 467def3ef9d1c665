import type { OperationKind } from "../types/audit.js";
import { isKeyword, type Token } from "./lexer.js";

/**
 * Token offsets used to rewrite a statement without re-scanning its text
 */
export interface StatementLayout {
  /** Start of the VALUES (insert), SET (update) or FROM (delete) keyword */
  anchorOffset?: number;
  whereOffset?: number;
  returningOffset?: number;
  /** End of the last significant token, before any trailing `;` or comment */
  insertionOffset: number;
}

export interface StatementSpans {
  layout: StatementLayout;
  /** Target table reference as written, alias included */
  targetSource: string;
  /** Target table name as written, schema included, alias dropped */
  relationName: string;
  whereClause: string;
  /** First VALUES row, one entry per value */
  valueTexts: string[];
  /** SET assignment right-hand sides, in source order */
  assignmentTexts: string[];
}

const TARGET_END: Record<Exclude<OperationKind, "UNKNOWN">, string[]> = {
  INSERT: ["VALUES", "SELECT", "DEFAULT", "OVERRIDING", "ON", "RETURNING"],
  UPDATE: ["SET"],
  DELETE: ["USING", "WHERE", "RETURNING"],
};

const ANCHOR: Record<Exclude<OperationKind, "UNKNOWN">, string> = {
  INSERT: "VALUES",
  UPDATE: "SET",
  DELETE: "FROM",
};

/**
 * Locate clause boundaries for a single statement's tokens
 */
export function describeLayout(
  text: string,
  tokens: Token[],
  operation: Exclude<OperationKind, "UNKNOWN">,
): StatementSpans {
  const last = tokens[tokens.length - 1];
  const layout: StatementLayout = { insertionOffset: last ? last.end : text.length };
  const spans: StatementSpans = {
    layout,
    targetSource: "",
    relationName: "",
    whereClause: "",
    valueTexts: [],
    assignmentTexts: [],
  };
  if (!last) return spans;

  const anchorIndex = findTopLevel(tokens, ANCHOR[operation], 1);
  if (anchorIndex !== -1) {
    layout.anchorOffset = tokens[anchorIndex]?.start;
  }

  const start = targetStart(tokens, operation, anchorIndex);
  spans.targetSource = sliceTarget(text, tokens, operation, start);
  spans.relationName = sliceRelation(text, tokens, start);

  const clauseStart = anchorIndex === -1 ? 1 : anchorIndex + 1;
  const returningIndex = findTopLevel(tokens, "RETURNING", clauseStart);
  if (returningIndex !== -1) {
    layout.returningOffset = tokens[returningIndex]?.start;
  }

  if (operation !== "INSERT") {
    const whereIndex = findTopLevel(tokens, "WHERE", clauseStart);
    const whereToken = tokens[whereIndex];
    if (whereIndex !== -1 && whereToken) {
      layout.whereOffset = whereToken.start;
      const stop = returningIndex > whereIndex ? tokens[returningIndex - 1] : last;
      spans.whereClause = stop && stop !== whereToken ? text.slice(whereToken.end, stop.end).trim() : "";
    }
  }

  if (operation === "INSERT" && anchorIndex !== -1) {
    spans.valueTexts = firstRowTexts(text, tokens, anchorIndex + 1);
  }

  if (operation === "UPDATE" && anchorIndex !== -1) {
    spans.assignmentTexts = assignmentTexts(text, tokens, anchorIndex + 1);
  }

  return spans;
}

function findTopLevel(tokens: Token[], keyword: string, from: number): number {
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (token && token.depth === 0 && isKeyword(token, keyword)) return i;
  }
  return -1;
}

/**
 * Index of the first token of the target reference, past any ONLY, or -1
 */
function targetStart(
  tokens: Token[],
  operation: Exclude<OperationKind, "UNKNOWN">,
  anchorIndex: number,
): number {
  let start: number;
  if (operation === "INSERT") {
    start = findTopLevel(tokens, "INTO", 1) + 1;
  } else if (operation === "UPDATE") {
    start = 1;
  } else {
    if (anchorIndex === -1) return -1;
    start = anchorIndex + 1;
  }
  if (start <= 0) return -1;
  if (isKeyword(tokens[start], "ONLY")) start++;
  return start;
}

function isNamePart(token: Token | undefined): token is Token {
  return token !== undefined && (token.type === "word" || token.type === "quoted-identifier");
}

/**
 * Dotted name at the start of the target: `users`, `sales.orders`, `"Sales"."Orders"`
 */
function sliceRelation(text: string, tokens: Token[], start: number): string {
  const first = tokens[start];
  if (start < 0 || !isNamePart(first)) return "";

  let last = first;
  let index = start + 1;
  while (tokens[index]?.text === ".") {
    const part = tokens[index + 1];
    if (!isNamePart(part)) break;
    last = part;
    index += 2;
  }
  return text.slice(first.start, last.end);
}

function sliceTarget(
  text: string,
  tokens: Token[],
  operation: Exclude<OperationKind, "UNKNOWN">,
  start: number,
): string {
  if (start < 0) return "";

  const stopWords = TARGET_END[operation];
  let end = start;
  while (end < tokens.length) {
    const token = tokens[end];
    if (!token) break;
    if (token.depth === 0 && stopWords.some((word) => isKeyword(token, word))) break;
    if (token.type === "punctuation" && token.text === "(") break;
    end++;
  }

  const first = tokens[start];
  const lastTarget = tokens[end - 1];
  if (!first || !lastTarget || end <= start) return "";
  return text.slice(first.start, lastTarget.end);
}

function firstRowTexts(text: string, tokens: Token[], from: number): string[] {
  const open = tokens[from];
  if (!open || open.type !== "punctuation" || open.text !== "(") return [];

  const items: string[] = [];
  let itemStart: Token | undefined;
  let itemEnd: Token | undefined;

  for (let i = from + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;
    const closesRow = token.depth === open.depth && token.text === ")";
    const separates = token.depth === open.depth + 1 && token.text === ",";

    if (closesRow || separates) {
      items.push(itemStart && itemEnd ? text.slice(itemStart.start, itemEnd.end) : "");
      itemStart = undefined;
      itemEnd = undefined;
      if (closesRow) return items;
      continue;
    }

    itemStart ??= token;
    itemEnd = token;
  }

  // Row never closed
  return [];
}

function assignmentTexts(text: string, tokens: Token[], from: number): string[] {
  const values: string[] = [];
  let segment: Token[] = [];

  const flush = () => {
    const equals = segment.findIndex(
      (token) => token.depth === 0 && token.type === "operator" && token.text === "=",
    );
    const first = segment[equals + 1];
    const lastToken = segment[segment.length - 1];
    values.push(equals !== -1 && first && lastToken ? text.slice(first.start, lastToken.end) : "");
    segment = [];
  };

  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;
    if (token.depth === 0 && ["FROM", "WHERE", "RETURNING"].some((word) => isKeyword(token, word))) {
      break;
    }
    if (token.depth === 0 && token.text === ",") {
      flush();
      continue;
    }
    segment.push(token);
  }
  if (segment.length > 0) flush();

  return values;
}
