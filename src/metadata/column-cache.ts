import { tokenize } from "../parser/lexer.js";
import type { QueryChannel } from "../types/command.js";
import { isNonEmptyString } from "../utils/guards.js";
import { qualifiedName } from "../utils/identifiers.js";
import type { Logger } from "../utils/logger.js";

export interface ColumnCacheOptions {
  logger: Logger;
  /**
   * Refresh an entry after this many milliseconds. Unset means entries live until invalidated.
   */
  ttlMs?: number;
  now?: () => number;
}

interface CacheEntry {
  columns: Promise<string[]>;
  loadedAt: number;
  /** lower(schema).lower(table), for invalidation by plain name */
  tableKey: string;
}

// to_regclass resolves the name the way the statement does
const COLUMNS_QUERY = `
  SELECT attname AS column_name
  FROM pg_attribute
  WHERE attrelid = to_regclass(@relation)
    AND attnum > 0
    AND NOT attisdropped
  ORDER BY attnum`;

/**
 * Ordered column names per table, fetched once per key
 */
export class TableColumnCache {
  private entries = new Map<string, CacheEntry>();
  private now: () => number;

  constructor(
    private channel: QueryChannel,
    private options: ColumnCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  static key(schemaName: string | undefined, tableName: string): string {
    return `${(schemaName ?? "").toLowerCase()}.${tableName.toLowerCase()}`;
  }

  /**
   * Cache key for a relation as written: unquoted parts fold to lower case, quoted parts stay exact
   */
  static relationKey(relation: string): string {
    return tokenize(relation)
      .tokens.map((token) => (token.type === "word" ? token.text.toLowerCase() : token.text))
      .join("");
  }

  /**
   * Column names in attribute order, or [] when the table is unknown or the lookup failed.
   * `relation` is the table name as the statement wrote it; it defaults to the parsed parts.
   */
  getColumns(
    schemaName: string | undefined,
    tableName: string,
    relation: string = qualifiedName(schemaName, tableName),
  ): Promise<string[]> {
    if (!tableName) {
      this.options.logger.warn("Column lookup requested without a table name");
      return Promise.resolve([]);
    }

    const key = TableColumnCache.relationKey(relation);
    const existing = this.entries.get(key);
    if (existing && !this.isExpired(existing)) {
      return existing.columns;
    }

    const entry: CacheEntry = {
      columns: Promise.resolve([]),
      loadedAt: this.now(),
      tableKey: TableColumnCache.key(schemaName, tableName),
    };
    entry.columns = this.load(relation).then((columns) => {
      // Empty results are retried on the next lookup
      if (columns.length === 0 && this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
      return columns;
    });
    this.entries.set(key, entry);
    return entry.columns;
  }

  /**
   * Drop every entry for the table, however its name was quoted
   */
  invalidate(schemaName: string | undefined, tableName: string): void {
    const tableKey = TableColumnCache.key(schemaName, tableName);
    for (const [key, entry] of this.entries) {
      if (entry.tableKey === tableKey) this.entries.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry): boolean {
    const { ttlMs } = this.options;
    return ttlMs !== undefined && this.now() - entry.loadedAt >= ttlMs;
  }

  private async load(relation: string): Promise<string[]> {
    try {
      const outcome = await this.channel.query(COLUMNS_QUERY, { relation });
      const columns = outcome.rows.map((row) => row.column_name).filter(isNonEmptyString);
      this.options.logger.debug(`Loaded ${columns.length} column(s) for ${relation}`);
      return columns;
    } catch (error) {
      this.options.logger.warn(`Failed to load column metadata for ${relation}:`, error);
      return [];
    }
  }
}
