import { sql } from "drizzle-orm";
import type { DrizzleExecutor } from "../db/channel.js";
import type { AuditRecord } from "../types/audit.js";
import type { AuditColumnMap, AuditSink } from "../types/config.js";
import type { Logger } from "../utils/logger.js";
import { initializeAuditLogging } from "../utils/migration.js";
import { getAuditInsertColumns } from "./column-map.js";

export interface PostgresAuditSinkOptions {
  auditTable: string;
  auditColumnMap?: Partial<AuditColumnMap>;
  logger: Logger;
  /**
   * Create the table on first write
   * @default true
   */
  createTable?: boolean;
}

/**
 * Writes audit records to a table through the audited Drizzle connection
 */
export class PostgresAuditSink implements AuditSink {
  private ready: Promise<void> | null = null;

  constructor(
    private db: DrizzleExecutor,
    private options: PostgresAuditSinkOptions,
  ) {}

  async write(record: AuditRecord): Promise<void> {
    await this.writeMany([record]);
  }

  async writeMany(records: readonly AuditRecord[]): Promise<void> {
    if (records.length === 0) return;

    await this.ensureTable();

    const tableName = this.options.auditTable;
    const columns = getAuditInsertColumns(this.options.auditColumnMap);

    // Build values for bulk insert
    const values = records.map((record) => {
      const row: Record<string, unknown> = {};
      for (const column of columns) {
        row[column.name] = column.getValue(record);
      }
      return row;
    });

    // Use raw SQL for bulk insert with JSONB
    const insertColumns = sql.join(
      columns.map((column) => sql.identifier(column.name)),
      sql`, `,
    );
    const recordsetColumns = columns.map((column) => `"${column.name}" ${column.type}`).join(", ");

    await this.db.execute(sql`
      INSERT INTO ${sql.identifier(tableName)} (
        ${insertColumns}
      )
      SELECT
        ${insertColumns}
      FROM jsonb_to_recordset(${JSON.stringify(values)}::jsonb) AS t(${sql.raw(recordsetColumns)})
    `);

    this.options.logger.debug(`Wrote ${records.length} audit record(s) to ${tableName}`);
  }

  private ensureTable(): Promise<void> {
    if (this.options.createTable === false) return Promise.resolve();

    if (!this.ready) {
      this.ready = initializeAuditLogging(this.db, {
        tableName: this.options.auditTable,
        columnMap: this.options.auditColumnMap,
        logger: this.options.logger,
      }).catch((error: unknown) => {
        // Retry creation on the next write
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }
}
