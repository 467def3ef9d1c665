import { sql } from "drizzle-orm";
import type { DrizzleExecutor } from "../db/channel.js";
import { normalizeResult } from "../db/channel.js";
import { normalizeColumnMap } from "../storage/column-map.js";
import { createAuditTableSQLFor, DEFAULT_AUDIT_TABLE } from "../storage/schema.js";
import type { AuditColumnMap } from "../types/config.js";
import { assertSafeIdentifier } from "./identifiers.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/**
 * Initialize the audit logging system
 * Creates the audit table if it doesn't exist
 */
export async function initializeAuditLogging(
  db: DrizzleExecutor,
  options?: { tableName?: string; columnMap?: Partial<AuditColumnMap>; logger?: Logger },
): Promise<void> {
  const logger = options?.logger ?? createConsoleLogger();
  try {
    const ddl = createAuditTableSQLFor(options?.tableName ?? DEFAULT_AUDIT_TABLE, {
      columnMap: options?.columnMap,
    });
    await db.execute(sql.raw(ddl));
    logger.info("Audit logging initialized successfully");
  } catch (error) {
    logger.error("Failed to initialize audit logging:", error);
    throw error;
  }
}

/**
 * Check if audit logging is properly set up
 */
export async function checkAuditSetup(
  db: DrizzleExecutor,
  options?: { tableName?: string },
): Promise<boolean> {
  try {
    const tableName = options?.tableName ?? DEFAULT_AUDIT_TABLE;
    assertSafeIdentifier(tableName);
    const result = normalizeResult(
      await db.execute(sql`
        SELECT EXISTS (
          SELECT FROM information_schema.tables
          WHERE table_name = ${tableName}
        ) AS "exists"
      `),
    );

    return result.rows[0]?.exists === true;
  } catch {
    return false;
  }
}

export interface AuditStats {
  totalLogs: number;
  logsByOperation: Record<string, number>;
  logsByTable: Record<string, number>;
  oldestLog: Date | null;
  newestLog: Date | null;
}

function countMap(value: unknown): Record<string, number> {
  if (typeof value !== "object" || value === null) return {};
  const counts: Record<string, number> = {};
  for (const [key, count] of Object.entries(value)) {
    if (typeof count === "number") counts[key] = count;
  }
  return counts;
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number") return new Date(value);
  return null;
}

/**
 * Get audit log statistics
 */
export async function getAuditStats(
  db: DrizzleExecutor,
  options?: { tableName?: string; columnMap?: Partial<AuditColumnMap> },
): Promise<AuditStats> {
  const tableName = options?.tableName ?? DEFAULT_AUDIT_TABLE;
  assertSafeIdentifier(tableName);
  const columns = normalizeColumnMap(options?.columnMap);

  const stats = normalizeResult(
    await db.execute(
      sql.raw(`
    WITH base AS (
      SELECT
        COUNT(*)::int AS total_logs,
        MIN("${columns.timestamp}") AS oldest_log,
        MAX("${columns.timestamp}") AS newest_log
      FROM ${tableName}
    ),
    operations AS (
      SELECT jsonb_object_agg("${columns.operationType}", operation_count) AS logs_by_operation
      FROM (
        SELECT "${columns.operationType}", COUNT(*)::int AS operation_count
        FROM ${tableName}
        GROUP BY "${columns.operationType}"
      ) o
    ),
    tables AS (
      SELECT jsonb_object_agg("${columns.tableName}", table_count) AS logs_by_table
      FROM (
        SELECT "${columns.tableName}", COUNT(*)::int AS table_count
        FROM ${tableName}
        GROUP BY "${columns.tableName}"
      ) t
    )
    SELECT
      base.total_logs,
      base.oldest_log,
      base.newest_log,
      operations.logs_by_operation,
      tables.logs_by_table
    FROM base, operations, tables
  `),
    ),
  );

  const row = stats.rows[0];

  return {
    totalLogs: typeof row?.total_logs === "number" ? row.total_logs : 0,
    logsByOperation: countMap(row?.logs_by_operation),
    logsByTable: countMap(row?.logs_by_table),
    oldestLog: toDate(row?.oldest_log),
    newestLog: toDate(row?.newest_log),
  };
}
