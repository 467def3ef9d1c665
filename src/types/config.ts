import type { Logger } from "../utils/logger.js";
import type { AuditContext, AuditRecord } from "./audit.js";

export type CaptureStrategyName = "rewrite" | "reload";

/**
 * - await: the command resolves after the sink has accepted the record
 * - background: the record is handed to the sink without waiting; `flush()` waits for it
 */
export type DispatchMode = "await" | "background";

/**
 * Destination for finished audit records
 */
export interface AuditSink {
  write(record: AuditRecord): Promise<void> | void;
  writeMany?(records: readonly AuditRecord[]): Promise<void> | void;
}

/**
 * Supplies the actor for the current unit of work
 */
export interface AuditContextProvider {
  getCurrentContext(): AuditContext | undefined | Promise<AuditContext | undefined>;
}

export type AuditColumnKey =
  | "id"
  | "timestamp"
  | "eventName"
  | "query"
  | "parameters"
  | "beforeImage"
  | "afterImage"
  | "tableName"
  | "operationType"
  | "userId"
  | "userName"
  | "ipAddress"
  | "userAgent"
  | "machineName"
  | "processId"
  | "threadId"
  | "customProperties"
  | "createdAt";

export type AuditColumnMap = Record<AuditColumnKey, string>;

/**
 * Configuration options for the audited connection
 */
export interface AuditConfig {
  /**
   * Tables to audit, case-insensitive. Use '*' to audit all tables.
   * @example ['users', 'orders']
   * @default '*'
   */
  tables?: string[] | "*";

  /**
   * How row images are captured
   * - "rewrite": append `RETURNING old.*, new.*` aliases (PostgreSQL 18+)
   * - "reload": SELECT the affected rows around the statement
   * @default "rewrite"
   */
  strategy?: CaptureStrategyName;

  /**
   * Fall back to "reload" when a statement cannot be rewritten.
   * When false, such statements run unaudited.
   * @default true
   */
  fallbackToReload?: boolean;

  /**
   * Fields removed from images and parameters before dispatch (e.g. passwords, tokens)
   * @default []
   */
  excludeFields?: string[];

  /**
   * @default "await"
   */
  dispatch?: DispatchMode;

  /**
   * Refresh cached column metadata after this many milliseconds.
   * Unset keeps it until `invalidateTableMetadata` is called.
   */
  metadataTtlMs?: number;

  /**
   * Name of the audit log table used by the default sink
   * @default 'audit_logs'
   */
  auditTable?: string;

  /**
   * Map logical audit fields to custom column names
   * @example { userId: "actor_id", tableName: "resource", createdAt: "created_on" }
   */
  auditColumnMap?: Partial<AuditColumnMap>;

  /**
   * Custom destination for records.
   * If provided, the default audit_logs table is not used.
   */
  sink?: AuditSink;

  /**
   * Queue records and write them in batches
   * @default undefined (disabled - writes immediately)
   */
  batch?: BatchConfig;

  /**
   * Where the actor comes from. Defaults to the connection's own async context
   * (`setContext` / `withContext`).
   */
  contextProvider?: AuditContextProvider;

  logger?: Logger;
}

/**
 * Configuration for batched audit writes
 */
export interface BatchConfig {
  /**
   * Maximum number of records to batch before automatic flush
   * @default 100
   * @minimum 1
   */
  batchSize?: number;

  /**
   * Interval in milliseconds to automatically flush pending records
   * @default 1000 (1 second)
   * @minimum 1
   */
  flushInterval?: number;
}

/**
 * Statistics from the batching sink
 */
export interface BatchWriterStats {
  queueSize: number;
  isWriting: boolean;
  isShuttingDown: boolean;
}

/**
 * Normalized configuration with all defaults applied
 */
export type NormalizedConfig = Required<
  Omit<AuditConfig, "sink" | "batch" | "contextProvider" | "metadataTtlMs" | "auditColumnMap">
> & {
  batch: Required<BatchConfig> | null;
  auditColumnMap: Partial<AuditColumnMap>;
  sink?: AuditSink;
  contextProvider?: AuditContextProvider;
  metadataTtlMs?: number;
};
