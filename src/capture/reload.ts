import { AuditFailure } from "../core/errors.js";
import { bareBindings, resolveParameter, stripSigil } from "../parser/parameters.js";
import { isParameterSource, type StatementDescriptor, type ValueSource } from "../parser/statement-parser.js";
import type { ParameterBindings, RowSnapshot } from "../types/audit.js";
import type { QueryChannel } from "../types/command.js";
import { columnReference, isSimpleIdentifier, qualifiedName } from "../utils/identifiers.js";
import type { Logger } from "../utils/logger.js";
import { isGeneratedColumn } from "./generated-columns.js";
import type { CaptureRequest, CaptureResult, CaptureStrategy } from "./types.js";

/**
 * Target as the statement wrote it, so aliases used in the WHERE text still resolve
 */
function selectSource(statement: StatementDescriptor): string {
  return statement.targetSource || qualifiedName(statement.schemaName, statement.tableName);
}

export function buildImageQuery(statement: StatementDescriptor): string {
  return `SELECT * FROM ${selectSource(statement)} WHERE ${statement.whereClause}`;
}

/**
 * Equality predicates that should identify a freshly inserted row
 */
export function insertPredicates(statement: StatementDescriptor, parameters: ParameterBindings): string[] {
  if (statement.insertColumns.length > 0) {
    return statement.insertColumns.flatMap((column, index) => {
      const source = statement.insertValues[index];
      if (!isParameterSource(source) || isGeneratedColumn(column)) return [];
      const lookup = resolveParameter(parameters, source.name);
      if (!lookup.found || lookup.value === null) return [];
      return [`${columnReference(column)} = ${source.name}`];
    });
  }

  return Object.entries(parameters).flatMap(([key, value]) => {
    const column = stripSigil(key);
    if (value === undefined || value === null) return [];
    if (!isSimpleIdentifier(column) || isGeneratedColumn(column)) return [];
    return [`${columnReference(column)} = @${column}`];
  });
}

export function buildInsertReloadQuery(statement: StatementDescriptor, predicates: string[]): string {
  return `SELECT * FROM ${selectSource(statement)} WHERE ${predicates.join(" AND ")} ORDER BY 1 DESC LIMIT 1`;
}

function valueOf(source: ValueSource, parameters: ParameterBindings): unknown {
  switch (source.kind) {
    case "parameter": {
      const lookup = resolveParameter(parameters, source.name);
      return lookup.found ? lookup.value : null;
    }
    case "literal":
      return source.value;
    case "expression":
      return source.text;
  }
}

/**
 * After-image of an INSERT rebuilt from the statement itself
 */
export function reconstructInsertImage(
  statement: StatementDescriptor,
  parameters: ParameterBindings,
): RowSnapshot {
  const { insertColumns, insertValues } = statement;
  if (insertColumns.length > 0 && insertColumns.length === insertValues.length) {
    const image: RowSnapshot = {};
    insertColumns.forEach((column, index) => {
      const source = insertValues[index];
      if (source) image[column] = valueOf(source, parameters);
    });
    return image;
  }
  return bareBindings(parameters);
}

/**
 * Captures images with extra SELECTs around the unmodified statement.
 * Not atomic: concurrent writers can change rows between the reads and the write.
 */
export class SelectReloadStrategy implements CaptureStrategy {
  readonly name = "reload" as const;

  constructor(
    private channel: QueryChannel,
    private logger: Logger,
  ) {}

  async capture({ statement, text, parameters, trace }: CaptureRequest): Promise<CaptureResult> {
    const failures: AuditFailure[] = [];
    let before: RowSnapshot = {};

    if (statement.operation !== "INSERT" && statement.whereClause) {
      trace("capture-before");
      before = await this.selectImage(statement, parameters, "before", failures);
    }

    trace("execute");
    const execution = await this.channel.query(text, parameters);

    trace("capture-after");
    let after: RowSnapshot = {};
    if (statement.operation === "UPDATE" && statement.whereClause) {
      after = await this.selectImage(statement, parameters, "after", failures);
    } else if (statement.operation === "INSERT") {
      after = await this.reloadInserted(statement, parameters, failures);
    }

    return { kind: "executed", execution, before, after, failures };
  }

  private async selectImage(
    statement: StatementDescriptor,
    parameters: ParameterBindings,
    image: "before" | "after",
    failures: AuditFailure[],
  ): Promise<RowSnapshot> {
    try {
      const outcome = await this.channel.query(buildImageQuery(statement), parameters);
      return { ...outcome.rows[0] };
    } catch (error) {
      this.logger.warn(`Failed to capture ${image} image for ${statement.tableName}:`, error);
      failures.push(
        new AuditFailure("capture", `Failed to capture ${image} image for ${statement.tableName}`, {
          cause: error,
        }),
      );
      return {};
    }
  }

  private async reloadInserted(
    statement: StatementDescriptor,
    parameters: ParameterBindings,
    failures: AuditFailure[],
  ): Promise<RowSnapshot> {
    const predicates = insertPredicates(statement, parameters);

    if (predicates.length > 0) {
      try {
        const outcome = await this.channel.query(buildInsertReloadQuery(statement, predicates), parameters);
        const row = outcome.rows[0];
        if (row) return { ...row };
        this.logger.debug(`Inserted row not found in ${statement.tableName}, rebuilding from statement`);
      } catch (error) {
        this.logger.warn(`Failed to reload inserted row for ${statement.tableName}:`, error);
        failures.push(
          new AuditFailure("capture", `Failed to reload inserted row for ${statement.tableName}`, {
            cause: error,
          }),
        );
      }
    }

    return reconstructInsertImage(statement, parameters);
  }
}
