import { AuditFailure } from "../core/errors.js";
import type { TableColumnCache } from "../metadata/column-cache.js";
import { OLD_NEW_RETURNING_VERSION, type ServerVersionCache } from "../metadata/server-version.js";
import type { StatementDescriptor } from "../parser/statement-parser.js";
import type { OperationKind, RowSnapshot } from "../types/audit.js";
import type { QueryChannel } from "../types/command.js";
import { quoteIdentifier } from "../utils/identifiers.js";
import type { Logger } from "../utils/logger.js";
import type { CaptureRequest, CaptureResult, CaptureStrategy } from "./types.js";

export const BEFORE_ALIAS_PREFIX = "__audit_old_";
export const AFTER_ALIAS_PREFIX = "__audit_new_";

const ANCHOR_KEYWORD: Record<Exclude<OperationKind, "UNKNOWN">, string> = {
  INSERT: "VALUES",
  UPDATE: "SET",
  DELETE: "FROM",
};

/**
 * `RETURNING old."c" AS "__audit_old_0", new."c" AS "__audit_new_0", ...`
 */
export function buildReturningClause(operation: OperationKind, columns: string[]): string {
  const items = columns.flatMap((column, index) => {
    const quoted = quoteIdentifier(column);
    const parts: string[] = [];
    if (operation === "UPDATE" || operation === "DELETE") {
      parts.push(`old.${quoted} AS "${BEFORE_ALIAS_PREFIX}${index}"`);
    }
    if (operation === "UPDATE" || operation === "INSERT") {
      parts.push(`new.${quoted} AS "${AFTER_ALIAS_PREFIX}${index}"`);
    }
    return parts;
  });
  return `RETURNING ${items.join(", ")}`;
}

/**
 * Statement text with the capture clause appended after its last significant token
 */
export function rewriteWithReturning(
  text: string,
  statement: StatementDescriptor,
  columns: string[],
): string {
  const { operation, layout } = statement;
  if (operation === "UNKNOWN") {
    throw new AuditFailure("capture", "Only INSERT, UPDATE and DELETE can be rewritten");
  }
  if (layout.anchorOffset === undefined) {
    throw new AuditFailure(
      "capture",
      `Invalid ${operation} statement: ${ANCHOR_KEYWORD[operation]} clause not found`,
    );
  }
  if (layout.returningOffset !== undefined) {
    throw new AuditFailure("capture", "Statement already has a RETURNING clause");
  }
  if (columns.length === 0) {
    throw new AuditFailure("capture", `No columns known for ${statement.tableName}`);
  }

  const clause = buildReturningClause(operation, columns);
  return `${text.slice(0, layout.insertionOffset)} ${clause}${text.slice(layout.insertionOffset)}`;
}

/**
 * Fold returned rows into images. Later rows overwrite earlier ones.
 */
export function readReturnedImages(
  rows: Record<string, unknown>[],
  columns: string[],
): { before: RowSnapshot; after: RowSnapshot } {
  const before: RowSnapshot = {};
  const after: RowSnapshot = {};

  for (const row of rows) {
    columns.forEach((column, index) => {
      const beforeAlias = `${BEFORE_ALIAS_PREFIX}${index}`;
      const afterAlias = `${AFTER_ALIAS_PREFIX}${index}`;
      if (Object.prototype.hasOwnProperty.call(row, beforeAlias)) {
        before[column] = row[beforeAlias];
      }
      if (Object.prototype.hasOwnProperty.call(row, afterAlias)) {
        after[column] = row[afterAlias];
      }
    });
  }

  return { before, after };
}

/**
 * Captures both images in the same round trip as the statement, using
 * PostgreSQL's `old`/`new` RETURNING qualifiers. Declines on servers before 18.
 */
export class QueryRewriteStrategy implements CaptureStrategy {
  readonly name = "rewrite" as const;

  constructor(
    private channel: QueryChannel,
    private columns: TableColumnCache,
    private serverVersion: ServerVersionCache,
    private logger: Logger,
  ) {}

  async capture({ statement, text, parameters, trace }: CaptureRequest): Promise<CaptureResult> {
    const columns = await this.columns.getColumns(
      statement.schemaName,
      statement.tableName,
      statement.relationName || undefined,
    );
    if (columns.length === 0) {
      return {
        kind: "declined",
        failure: new AuditFailure("capture", `No column metadata for table ${statement.tableName}`),
      };
    }

    let rewritten: string;
    try {
      rewritten = rewriteWithReturning(text, statement, columns);
    } catch (error) {
      return {
        kind: "declined",
        failure:
          error instanceof AuditFailure
            ? error
            : new AuditFailure("capture", "Failed to rewrite statement", { cause: error }),
      };
    }

    const version = await this.serverVersion.getVersion();
    if (version === undefined || version < OLD_NEW_RETURNING_VERSION) {
      return {
        kind: "declined",
        failure: new AuditFailure(
          "capture",
          version === undefined
            ? "Server version unknown, RETURNING old/new not attempted"
            : `Server version ${version} does not support RETURNING old/new`,
        ),
      };
    }

    this.logger.debug("Executing rewritten statement:", rewritten);
    trace("execute");
    const result = await this.channel.query(rewritten, parameters);

    trace("capture-after");
    const failures: AuditFailure[] = [];
    let images: { before: RowSnapshot; after: RowSnapshot } = { before: {}, after: {} };
    try {
      images = readReturnedImages(result.rows, columns);
    } catch (error) {
      this.logger.warn("Failed to read returned row images:", error);
      failures.push(new AuditFailure("capture", "Failed to read returned row images", { cause: error }));
    }

    return {
      kind: "executed",
      // The capture rows are ours; the caller's statement returned none
      execution: { rows: [], rowCount: result.rows.length },
      before: images.before,
      after: images.after,
      failures,
    };
  }
}
