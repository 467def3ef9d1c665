export type TokenType =
  | "word"
  | "quoted-identifier"
  | "string"
  | "number"
  | "placeholder"
  | "punctuation"
  | "operator";

export interface Token {
  type: TokenType;
  /** Verbatim source text */
  text: string;
  start: number;
  end: number;
  /** Parenthesis depth the token sits at (a paren pair sits at its outer depth) */
  depth: number;
  terminated: boolean;
}

export interface TokenStream {
  tokens: Token[];
  /** False when a literal, quoted identifier or block comment runs off the end */
  complete: boolean;
}

const WORD_START = /[A-Za-z_\u0080-\uffff]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-\uffff]/;
const DIGIT = /[0-9]/;
const DOLLAR_TAG = /\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/y;

/**
 * Tokenize PostgreSQL text, keeping offsets into the original string.
 * Whitespace and comments produce no tokens. Never throws.
 */
export function tokenize(text: string): TokenStream {
  const tokens: Token[] = [];
  let complete = true;
  let depth = 0;
  let pos = 0;

  const push = (type: TokenType, start: number, end: number, terminated = true, at = depth) => {
    tokens.push({ type, text: text.slice(start, end), start, end, depth: at, terminated });
    if (!terminated) complete = false;
  };

  while (pos < text.length) {
    const ch = text.charAt(pos);
    const next = text.charAt(pos + 1);

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === "-" && next === "-") {
      const newline = text.indexOf("\n", pos);
      pos = newline === -1 ? text.length : newline + 1;
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = skipBlockComment(text, pos);
      if (end === -1) {
        complete = false;
        pos = text.length;
      } else {
        pos = end;
      }
      continue;
    }

    if (ch === "'") {
      const { end, terminated } = scanQuoted(text, pos, "'", false);
      push("string", pos, end, terminated);
      pos = end;
      continue;
    }

    if ((ch === "E" || ch === "e") && next === "'") {
      const { end, terminated } = scanQuoted(text, pos + 1, "'", true);
      push("string", pos, end, terminated);
      pos = end;
      continue;
    }

    if (ch === '"') {
      const { end, terminated } = scanQuoted(text, pos, '"', false);
      push("quoted-identifier", pos, end, terminated);
      pos = end;
      continue;
    }

    if (ch === "$") {
      if (DIGIT.test(next)) {
        let end = pos + 1;
        while (end < text.length && DIGIT.test(text.charAt(end))) end++;
        push("placeholder", pos, end);
        pos = end;
        continue;
      }

      DOLLAR_TAG.lastIndex = pos;
      const tag = DOLLAR_TAG.exec(text);
      if (tag) {
        const close = text.indexOf(tag[0], pos + tag[0].length);
        const end = close === -1 ? text.length : close + tag[0].length;
        push("string", pos, end, close !== -1);
        pos = end;
        continue;
      }
    }

    if (ch === "@" && WORD_START.test(next)) {
      const end = scanWord(text, pos + 1);
      push("placeholder", pos, end);
      pos = end;
      continue;
    }

    if (ch === ":") {
      if (next === ":" || next === "=") {
        push("operator", pos, pos + 2);
        pos += 2;
        continue;
      }
      if (WORD_START.test(next)) {
        const end = scanWord(text, pos + 1);
        push("placeholder", pos, end);
        pos = end;
        continue;
      }
    }

    if (DIGIT.test(ch) || (ch === "." && DIGIT.test(next))) {
      const end = scanNumber(text, pos);
      push("number", pos, end);
      pos = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      const end = scanWord(text, pos);
      push("word", pos, end);
      pos = end;
      continue;
    }

    if (ch === "(") {
      push("punctuation", pos, pos + 1);
      depth++;
      pos++;
      continue;
    }

    if (ch === ")") {
      depth = Math.max(0, depth - 1);
      push("punctuation", pos, pos + 1);
      pos++;
      continue;
    }

    if (ch === "," || ch === ";" || ch === "." || ch === "[" || ch === "]") {
      push("punctuation", pos, pos + 1);
      pos++;
      continue;
    }

    push("operator", pos, pos + 1);
    pos++;
  }

  return { tokens, complete };
}

function scanWord(text: string, from: number): number {
  let end = from;
  while (end < text.length && WORD_PART.test(text.charAt(end))) end++;
  return end;
}

function scanNumber(text: string, from: number): number {
  const match = /[0-9]*\.?[0-9]+(?:[eE][+-]?[0-9]+)?|[0-9]+\.?/y;
  match.lastIndex = from;
  const result = match.exec(text);
  return result ? from + result[0].length : from + 1;
}

function scanQuoted(
  text: string,
  open: number,
  quote: string,
  backslashEscapes: boolean,
): { end: number; terminated: boolean } {
  let pos = open + 1;
  while (pos < text.length) {
    const ch = text.charAt(pos);
    if (backslashEscapes && ch === "\\") {
      pos += 2;
      continue;
    }
    if (ch === quote) {
      if (text.charAt(pos + 1) === quote) {
        pos += 2;
        continue;
      }
      return { end: pos + 1, terminated: true };
    }
    pos++;
  }
  return { end: text.length, terminated: false };
}

/**
 * Returns the offset just past the comment, or -1 when it is never closed.
 * PostgreSQL block comments nest.
 */
function skipBlockComment(text: string, open: number): number {
  let nesting = 0;
  let pos = open;
  while (pos < text.length) {
    if (text.startsWith("/*", pos)) {
      nesting++;
      pos += 2;
    } else if (text.startsWith("*/", pos)) {
      nesting--;
      pos += 2;
      if (nesting === 0) return pos;
    } else {
      pos++;
    }
  }
  return -1;
}

export function isKeyword(token: Token | undefined, keyword: string): boolean {
  return token !== undefined && token.type === "word" && token.text.toUpperCase() === keyword;
}

/**
 * Split on top-level semicolons, dropping empty statements
 */
export function splitStatements(tokens: Token[]): Token[][] {
  const statements: Token[][] = [];
  let current: Token[] = [];
  for (const token of tokens) {
    if (token.type === "punctuation" && token.text === ";" && token.depth === 0) {
      if (current.length > 0) statements.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }
  if (current.length > 0) statements.push(current);
  return statements;
}
