/**
 * Kind of statement, decided by its leading clause only
 */
export type OperationKind = "INSERT" | "UPDATE" | "DELETE" | "UNKNOWN";

/**
 * Operations that produce audit records
 */
export type AuditAction = Exclude<OperationKind, "UNKNOWN">;

/**
 * Parameter name (as the caller spelled it) to bound value.
 * `null` is an explicit SQL NULL; a missing key means "not bound".
 */
export type ParameterBindings = Record<string, unknown>;

/**
 * Column name to value for a single captured row image
 */
export type RowSnapshot = Record<string, unknown>;

/**
 * Who triggered the mutation. Every field is optional.
 */
export interface AuditContext {
  /**
   * ID of the user performing the operation
   */
  userId?: string;

  /**
   * Display name of the user
   */
  userName?: string;

  /**
   * IP address of the request
   */
  ipAddress?: string;

  /**
   * User agent string
   */
  userAgent?: string;

  /**
   * Additional properties (request ID, tenant, etc.)
   */
  customProperties?: Record<string, unknown>;
}

/**
 * Finished audit record handed to a sink
 */
export interface AuditRecord {
  /** Capture time, not commit time */
  readonly timestamp: Date;
  readonly eventName: string;
  readonly query: string;
  readonly parameters: Readonly<ParameterBindings>;
  readonly beforeImage: Readonly<RowSnapshot>;
  readonly afterImage: Readonly<RowSnapshot>;
  readonly tableName: string;
  readonly operation: AuditAction;
  readonly userId?: string;
  readonly userName?: string;
  readonly ipAddress?: string;
  readonly userAgent?: string;
  readonly machineName: string;
  readonly processId: number;
  readonly threadId: number;
  readonly customProperties: Readonly<Record<string, unknown>>;
}

/**
 * Audit record as stored by the default PostgreSQL sink
 */
export interface StoredAuditRecord {
  id: number;
  timestamp: Date;
  eventName: string | null;
  query: string | null;
  parameters: Record<string, unknown> | null;
  beforeImage: Record<string, unknown> | null;
  afterImage: Record<string, unknown> | null;
  tableName: string | null;
  operationType: string | null;
  userId: string | null;
  userName: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  machineName: string | null;
  processId: number | null;
  threadId: number | null;
  customProperties: Record<string, unknown> | null;
  createdAt: Date;
}
