import type { AuditRecord } from "../types/audit.js";
import type { AuditColumnMap } from "../types/config.js";
import { assertSafeIdentifier } from "../utils/identifiers.js";
import { safeSerialize } from "../utils/serializer.js";

export type AuditInsertColumn = {
  name: string;
  type: string;
  getValue: (record: AuditRecord) => unknown;
};

export const DEFAULT_AUDIT_COLUMN_MAP: AuditColumnMap = {
  id: "id",
  timestamp: "timestamp",
  eventName: "event_name",
  query: "query",
  parameters: "parameters",
  beforeImage: "before_image",
  afterImage: "after_image",
  tableName: "table_name",
  operationType: "operation_type",
  userId: "user_id",
  userName: "user_name",
  ipAddress: "ip_address",
  userAgent: "user_agent",
  machineName: "machine_name",
  processId: "process_id",
  threadId: "thread_id",
  customProperties: "custom_properties",
  createdAt: "created_at",
};

export function normalizeColumnMap(map?: Partial<AuditColumnMap>): AuditColumnMap {
  const merged = { ...DEFAULT_AUDIT_COLUMN_MAP, ...map };
  const seen = new Set<string>();
  for (const name of Object.values(merged)) {
    assertSafeIdentifier(name);
    if (seen.has(name)) {
      throw new Error(`Duplicate column name in columnMap: ${name}`);
    }
    seen.add(name);
  }
  return merged;
}

/**
 * Columns written for each record, in insert order (id and created_at are filled by the database)
 */
export function getAuditInsertColumns(map?: Partial<AuditColumnMap>): AuditInsertColumn[] {
  const merged = normalizeColumnMap(map);
  return [
    {
      name: merged.timestamp,
      type: "TIMESTAMPTZ",
      getValue: (record) => record.timestamp.toISOString(),
    },
    {
      name: merged.eventName,
      type: "VARCHAR",
      getValue: (record) => record.eventName,
    },
    {
      name: merged.query,
      type: "TEXT",
      getValue: (record) => record.query,
    },
    {
      name: merged.parameters,
      type: "JSONB",
      getValue: (record) => safeSerialize(record.parameters),
    },
    {
      name: merged.beforeImage,
      type: "JSONB",
      getValue: (record) => safeSerialize(record.beforeImage),
    },
    {
      name: merged.afterImage,
      type: "JSONB",
      getValue: (record) => safeSerialize(record.afterImage),
    },
    {
      name: merged.tableName,
      type: "VARCHAR",
      getValue: (record) => record.tableName,
    },
    {
      name: merged.operationType,
      type: "VARCHAR",
      getValue: (record) => record.operation,
    },
    {
      name: merged.userId,
      type: "VARCHAR",
      getValue: (record) => record.userId || null,
    },
    {
      name: merged.userName,
      type: "VARCHAR",
      getValue: (record) => record.userName || null,
    },
    {
      name: merged.ipAddress,
      type: "VARCHAR",
      getValue: (record) => record.ipAddress || null,
    },
    {
      name: merged.userAgent,
      type: "TEXT",
      getValue: (record) => record.userAgent || null,
    },
    {
      name: merged.machineName,
      type: "VARCHAR",
      getValue: (record) => record.machineName,
    },
    {
      name: merged.processId,
      type: "INTEGER",
      getValue: (record) => record.processId,
    },
    {
      name: merged.threadId,
      type: "INTEGER",
      getValue: (record) => record.threadId,
    },
    {
      name: merged.customProperties,
      type: "JSONB",
      getValue: (record) => safeSerialize(record.customProperties),
    },
  ];
}
