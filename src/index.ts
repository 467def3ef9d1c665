import type { DrizzleExecutor } from "./db/channel.js";
import type { QueryChannel } from "./types/command.js";
import type { AuditConfig } from "./types/config.js";
import { SqlAuditor } from "./core/SqlAuditor.js";

// Re-export types
export type {
  AuditColumnMap,
  AuditConfig,
  AuditContextProvider,
  AuditSink,
  BatchConfig,
  BatchWriterStats,
  CaptureStrategyName,
  DispatchMode,
} from "./types/config.js";
export type {
  AuditAction,
  AuditContext,
  AuditRecord,
  OperationKind,
  ParameterBindings,
  RowSnapshot,
  StoredAuditRecord,
} from "./types/audit.js";
export type { QueryChannel, QueryOutcome, SqlCommand } from "./types/command.js";
export type { AuditedResult, AuditOutcome, AuditPhase, AuditStatus } from "./types/outcome.js";
export type { DrizzleExecutor } from "./db/channel.js";
export type { StatementDescriptor, ValueSource } from "./parser/statement-parser.js";
export type { Logger } from "./utils/logger.js";

export { AuditFailure, type AuditFailureKind } from "./core/errors.js";
export { AuditedCommand } from "./core/interceptor.js";
export { AuditContextManager } from "./core/context.js";
export { SqlAuditor } from "./core/SqlAuditor.js";
export { StatementParser } from "./parser/statement-parser.js";
export { DrizzleQueryChannel } from "./db/channel.js";
export { createConsoleLogger } from "./utils/logger.js";

// Re-export sinks
export { PostgresAuditSink } from "./storage/writer.js";
export { BatchAuditSink } from "./storage/batch-writer.js";
export {
  CallbackAuditSink,
  CompositeAuditSink,
  FilteringAuditSink,
  MemoryAuditSink,
} from "./storage/sinks.js";

// Re-export schema and migration
export { auditLogs, createAuditLogsTable, createAuditTableSQL, createAuditTableSQLFor } from "./storage/schema.js";
export { initializeAuditLogging, checkAuditSetup, getAuditStats } from "./utils/migration.js";

/**
 * Create an audited connection over a Drizzle database
 *
 * @param db - Drizzle database instance (node-postgres or postgres-js)
 * @param config - Audit configuration options
 * @param channel - Query channel to use instead of the Drizzle one
 * @returns Object with command factories and audit controls
 *
 * @example
 * ```typescript
 * const audited = createAuditedConnection(drizzle(pool), {
 *   tables: ['users', 'orders'],
 *   excludeFields: ['password'],
 * });
 *
 * // Set context (e.g., in Express middleware)
 * app.use((req, res, next) => {
 *   audited.setContext({ userId: req.user.id, ipAddress: req.ip });
 *   next();
 * });
 *
 * const command = audited.createCommand(
 *   'UPDATE users SET email = @email WHERE id = @id',
 *   { '@email': 'new@example.com', '@id': 7 },
 * );
 * await command.execute();
 * // ✓ Audit record written with before/after images
 * ```
 */
export function createAuditedConnection(
  db: DrizzleExecutor,
  config: AuditConfig = {},
  channel?: QueryChannel,
) {
  const auditor = new SqlAuditor(db, config, channel);

  return {
    auditor,

    /**
     * Create a command whose executions are audited
     *
     * @example
     * ```typescript
     * const rows = await audited.createCommand('DELETE FROM users WHERE id = $1', { $1: 7 }).execute();
     * ```
     */
    createCommand: auditor.createCommand.bind(auditor),

    /**
     * Create a command that is never audited
     */
    createUnauditedCommand: auditor.createUnauditedCommand.bind(auditor),

    /**
     * Execute once and report the row count with the audit outcome
     *
     * @example
     * ```typescript
     * const { value, outcome } = await audited.execute('INSERT INTO users (email) VALUES (@email)', {
     *   email: 'a@example.com',
     * });
     * if (outcome.status === 'degraded') console.warn(outcome.failures);
     * ```
     */
    execute: auditor.execute.bind(auditor),

    /**
     * Execute once and report the first column of the first row with the audit outcome
     */
    executeScalar: auditor.executeScalar.bind(auditor),

    /**
     * True when the text is a single INSERT, UPDATE or DELETE
     */
    isAuditable: auditor.isAuditable.bind(auditor),

    /**
     * Set audit context for current async scope
     *
     * @example
     * ```typescript
     * audited.setContext({
     *   userId: 'user-123',
     *   ipAddress: req.ip
     * });
     * ```
     */
    setContext: auditor.setContext.bind(auditor),

    /**
     * Run a function with specific audit context
     *
     * @example
     * ```typescript
     * await audited.withContext(
     *   { userId: 'admin', customProperties: { reason: 'bulk_import' } },
     *   async () => {
     *     await audited.execute('DELETE FROM sessions WHERE expires_at < now()');
     *   }
     * );
     * ```
     */
    withContext: auditor.withContext.bind(auditor),

    /**
     * Get current audit context
     */
    getContext: auditor.getContext.bind(auditor),

    /**
     * Forget cached column lists, e.g. after a migration
     */
    invalidateTableMetadata: auditor.invalidateTableMetadata.bind(auditor),

    /**
     * Wait for background dispatches and flush batched records
     */
    flush: auditor.flush.bind(auditor),

    /**
     * Gracefully shutdown
     * Flushes all pending records before shutting down
     *
     * @example
     * ```typescript
     * process.on('SIGTERM', async () => {
     *   await audited.shutdown();
     *   process.exit(0);
     * });
     * ```
     */
    shutdown: auditor.shutdown.bind(auditor),

    /**
     * Get batch sink stats (only available in batch mode)
     */
    getStats: auditor.getStats.bind(auditor),
  };
}

export type AuditedConnection = ReturnType<typeof createAuditedConnection>;

/**
 * Default export
 */
export default createAuditedConnection;
