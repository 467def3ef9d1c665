import { sql, type SQL } from "drizzle-orm";
import { resolveParameter } from "../parser/parameters.js";
import { tokenize } from "../parser/lexer.js";
import type { ParameterBindings } from "../types/audit.js";
import type { QueryChannel, QueryOutcome } from "../types/command.js";
import { isRecord } from "../utils/guards.js";

/**
 * The part of a Drizzle database the audit layer needs.
 * `NodePgDatabase` and `PostgresJsDatabase` both satisfy it.
 */
export interface DrizzleExecutor {
  execute(query: SQL): PromiseLike<unknown>;
}

/**
 * Placeholders in the text that have no binding
 */
export function unboundPlaceholders(text: string, parameters: ParameterBindings): string[] {
  return tokenize(text)
    .tokens.filter((token) => token.type === "placeholder")
    .filter((token) => !resolveParameter(parameters, token.text).found)
    .map((token) => token.text);
}

/**
 * Turn statement text into a Drizzle query, binding each placeholder as a parameter
 */
export function compileStatement(text: string, parameters: ParameterBindings): SQL {
  const chunks: SQL[] = [];
  let cursor = 0;

  for (const token of tokenize(text).tokens) {
    if (token.type !== "placeholder") continue;

    const lookup = resolveParameter(parameters, token.text);
    if (!lookup.found) {
      throw new Error(`No value bound for parameter ${token.text}`);
    }

    chunks.push(sql.raw(text.slice(cursor, token.start)));
    // sql.param keeps arrays as a single bound value
    chunks.push(sql`${sql.param(lookup.value)}`);
    cursor = token.end;
  }

  chunks.push(sql.raw(text.slice(cursor)));
  return sql.join(chunks);
}

/**
 * Normalize node-postgres (`{ rows, rowCount }`) and postgres-js (row array with `count`) results
 */
export function normalizeResult(result: unknown): QueryOutcome {
  if (Array.isArray(result)) {
    const rows = result.filter(isRecord);
    const count: unknown = Reflect.get(result, "count");
    return { rows, rowCount: typeof count === "number" ? count : rows.length };
  }

  if (isRecord(result)) {
    const rows = Array.isArray(result.rows) ? result.rows.filter(isRecord) : [];
    const rowCount = typeof result.rowCount === "number" ? result.rowCount : rows.length;
    return { rows, rowCount };
  }

  return { rows: [], rowCount: 0 };
}

/**
 * Query channel over a Drizzle connection
 */
export class DrizzleQueryChannel implements QueryChannel {
  constructor(private db: DrizzleExecutor) {}

  async query(text: string, parameters: ParameterBindings): Promise<QueryOutcome> {
    const result = await this.db.execute(compileStatement(text, parameters));
    return normalizeResult(result);
  }
}
