import type { ParameterBindings } from "./audit.js";

/**
 * Normalized result of a single round trip
 */
export interface QueryOutcome {
  rows: Record<string, unknown>[];
  rowCount: number;
}

/**
 * Read/write access to the database for statement text with placeholders
 * (`@name`, `:name` or `$1`) and their bindings
 */
export interface QueryChannel {
  query(text: string, parameters: ParameterBindings): Promise<QueryOutcome>;
}

/**
 * The narrow command surface the audit layer wraps
 */
export interface SqlCommand {
  text: string;
  readonly parameters: ParameterBindings;

  /**
   * Run the statement and resolve with the affected row count
   */
  execute(): Promise<number>;

  /**
   * Run the statement and resolve with the first column of the first row, or null
   */
  executeScalar(): Promise<unknown>;

  /**
   * Check that every placeholder in the text has a binding
   */
  prepare(): Promise<void>;
}
