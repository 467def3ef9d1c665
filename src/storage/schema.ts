import type { AuditColumnMap } from "../types/config.js";
import { assertSafeIdentifier } from "../utils/identifiers.js";
import { normalizeColumnMap } from "./column-map.js";
import { bigserial, index, integer, jsonb, pgTable, text, timestamp, varchar } from "drizzle-orm/pg-core";

/**
 * Audit logs table schema
 * One row per audited INSERT, UPDATE or DELETE
 */
export const DEFAULT_AUDIT_TABLE = "audit_logs";

function buildCreateAuditTableSQL(tableName: string, columnMap?: Partial<AuditColumnMap>): string {
  assertSafeIdentifier(tableName);
  const columns = normalizeColumnMap(columnMap);
  const indexPrefix = `idx_${tableName}`;

  return `
CREATE TABLE IF NOT EXISTS ${tableName} (
  "${columns.id}" BIGSERIAL PRIMARY KEY,

  -- What happened
  "${columns.timestamp}" TIMESTAMPTZ NOT NULL,
  "${columns.eventName}" VARCHAR(255) NOT NULL,
  "${columns.query}" TEXT,
  "${columns.parameters}" JSONB,
  "${columns.beforeImage}" JSONB,
  "${columns.afterImage}" JSONB,
  "${columns.tableName}" VARCHAR(255) NOT NULL,
  "${columns.operationType}" VARCHAR(16) NOT NULL,

  -- Who did it
  "${columns.userId}" VARCHAR(255),
  "${columns.userName}" VARCHAR(255),
  "${columns.ipAddress}" VARCHAR(45),
  "${columns.userAgent}" TEXT,

  -- Where it ran
  "${columns.machineName}" VARCHAR(255),
  "${columns.processId}" INTEGER,
  "${columns.threadId}" INTEGER,

  "${columns.customProperties}" JSONB,
  "${columns.createdAt}" TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS ${indexPrefix}_table_timestamp ON ${tableName}("${columns.tableName}", "${columns.timestamp}" DESC);
CREATE INDEX IF NOT EXISTS ${indexPrefix}_user_id ON ${tableName}("${columns.userId}") WHERE "${columns.userId}" IS NOT NULL;
CREATE INDEX IF NOT EXISTS ${indexPrefix}_event_name ON ${tableName}("${columns.eventName}");
CREATE INDEX IF NOT EXISTS ${indexPrefix}_created_at ON ${tableName}("${columns.createdAt}" DESC);

COMMENT ON TABLE ${tableName} IS 'Audit trail for data-mutating statements';
`;
}

/**
 * SQL migration to create the audit_logs table (default name)
 * Run this to set up the database
 */
export const createAuditTableSQL = buildCreateAuditTableSQL(DEFAULT_AUDIT_TABLE);

/**
 * SQL migration for a custom audit table name
 */
export function createAuditTableSQLFor(
  tableName = DEFAULT_AUDIT_TABLE,
  options?: { columnMap?: Partial<AuditColumnMap> },
): string {
  return buildCreateAuditTableSQL(tableName, options?.columnMap);
}

export function createAuditLogsTable(tableName = DEFAULT_AUDIT_TABLE) {
  return pgTable(
    tableName,
    {
      id: bigserial("id", { mode: "number" }).primaryKey(),
      timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
      eventName: varchar("event_name", { length: 255 }).notNull(),
      query: text("query"),
      parameters: jsonb("parameters"),
      beforeImage: jsonb("before_image"),
      afterImage: jsonb("after_image"),
      tableName: varchar("table_name", { length: 255 }).notNull(),
      operationType: varchar("operation_type", { length: 16 }).notNull(),
      userId: varchar("user_id", { length: 255 }),
      userName: varchar("user_name", { length: 255 }),
      ipAddress: varchar("ip_address", { length: 45 }), // IPv6 compatible
      userAgent: text("user_agent"),
      machineName: varchar("machine_name", { length: 255 }),
      processId: integer("process_id"),
      threadId: integer("thread_id"),
      customProperties: jsonb("custom_properties"),
      createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    },
    (table) => [
      index(`idx_${tableName}_table_timestamp`).on(table.tableName, table.timestamp.desc()),
      index(`idx_${tableName}_user_id`).on(table.userId),
      index(`idx_${tableName}_event_name`).on(table.eventName),
      index(`idx_${tableName}_created_at`).on(table.createdAt.desc()),
    ],
  );
}

/**
 * Drizzle schema for querying the default audit table
 */
export const auditLogs = createAuditLogsTable();
