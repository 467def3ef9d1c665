import { SelectReloadStrategy } from "../capture/reload.js";
import { QueryRewriteStrategy } from "../capture/rewrite.js";
import { DrizzleQueryChannel, type DrizzleExecutor } from "../db/channel.js";
import { DirectCommand } from "../db/command.js";
import { TableColumnCache } from "../metadata/column-cache.js";
import { ServerVersionCache } from "../metadata/server-version.js";
import { StatementParser } from "../parser/statement-parser.js";
import { BatchAuditSink } from "../storage/batch-writer.js";
import { normalizeColumnMap } from "../storage/column-map.js";
import { PostgresAuditSink } from "../storage/writer.js";
import type { AuditContext, ParameterBindings } from "../types/audit.js";
import type { QueryChannel, SqlCommand } from "../types/command.js";
import type { AuditConfig, AuditSink, BatchWriterStats, NormalizedConfig } from "../types/config.js";
import type { AuditedResult } from "../types/outcome.js";
import { createConsoleLogger, type Logger } from "../utils/logger.js";
import { AuditAssembler } from "./assembler.js";
import { AuditContextManager } from "./context.js";
import {
  AuditedCommand,
  executeWithAudit,
  type AuditExecutor,
  type InterceptedExecution,
  type InterceptorDependencies,
} from "./interceptor.js";

/**
 * Main auditor class
 * Wraps a Drizzle database so that SQL commands issued through it are audited
 */
export class SqlAuditor implements AuditExecutor {
  private config: NormalizedConfig;
  private contextManager = new AuditContextManager();
  private logger: Logger;
  private channel: QueryChannel;
  private parser: StatementParser;
  private columnCache: TableColumnCache;
  private serverVersion: ServerVersionCache;
  private assembler: AuditAssembler;
  private batchSink: BatchAuditSink | null = null;
  private dependencies: InterceptorDependencies;

  constructor(db: DrizzleExecutor, config: AuditConfig = {}, channel?: QueryChannel) {
    this.config = this.normalizeConfig(config);
    this.logger = this.config.logger;
    this.channel = channel ?? new DrizzleQueryChannel(db);
    this.parser = new StatementParser(this.logger);
    this.columnCache = new TableColumnCache(this.channel, {
      logger: this.logger,
      ttlMs: this.config.metadataTtlMs,
    });
    this.serverVersion = new ServerVersionCache(this.channel, this.logger);

    // Initialize appropriate sink
    let sink: AuditSink =
      this.config.sink ??
      new PostgresAuditSink(db, {
        auditTable: this.config.auditTable,
        auditColumnMap: this.config.auditColumnMap,
        logger: this.logger,
      });
    if (this.config.batch) {
      this.batchSink = new BatchAuditSink(sink, { ...this.config.batch, logger: this.logger });
      sink = this.batchSink;
    }

    this.assembler = new AuditAssembler({
      sink,
      logger: this.logger,
      dispatch: this.config.dispatch,
      excludeFields: this.config.excludeFields,
      contextProvider: this.config.contextProvider ?? this.contextManager,
    });

    this.dependencies = {
      parser: this.parser,
      channel: this.channel,
      strategies: {
        rewrite: new QueryRewriteStrategy(this.channel, this.columnCache, this.serverVersion, this.logger),
        reload: new SelectReloadStrategy(this.channel, this.logger),
      },
      strategy: this.config.strategy,
      fallbackToReload: this.config.fallbackToReload,
      assembler: this.assembler,
      shouldAudit: (tableName) => this.shouldAudit(tableName),
      logger: this.logger,
    };
  }

  /**
   * Normalize configuration with defaults
   */
  private normalizeConfig(config: AuditConfig): NormalizedConfig {
    const batchConfig = config.batch
      ? {
          batchSize: config.batch.batchSize ?? 100,
          flushInterval: config.batch.flushInterval ?? 1000,
        }
      : null;

    if (config.metadataTtlMs !== undefined && config.metadataTtlMs < 0) {
      throw new Error("metadataTtlMs must not be negative");
    }

    // Fail fast on unsafe or duplicate column names
    normalizeColumnMap(config.auditColumnMap);

    return {
      tables: config.tables ?? "*",
      strategy: config.strategy ?? "rewrite",
      fallbackToReload: config.fallbackToReload ?? true,
      excludeFields: config.excludeFields ?? [],
      dispatch: config.dispatch ?? "await",
      auditTable: config.auditTable || "audit_logs",
      auditColumnMap: config.auditColumnMap ?? {},
      logger: config.logger ?? createConsoleLogger(),
      batch: batchConfig,
      sink: config.sink,
      contextProvider: config.contextProvider,
      metadataTtlMs: config.metadataTtlMs,
    };
  }

  /**
   * Check if a table should be audited (case-insensitive)
   */
  shouldAudit(tableName: string): boolean {
    const normalized = tableName.toLowerCase();

    // Never audit the audit table itself
    if (normalized === this.config.auditTable.toLowerCase()) {
      return false;
    }

    if (this.config.tables === "*") {
      return true;
    }

    return this.config.tables.some((table) => table.toLowerCase() === normalized);
  }

  /**
   * True when the text is a single INSERT, UPDATE or DELETE
   */
  isAuditable(text: string): boolean {
    return this.parser.isAuditable(text);
  }

  run(text: string, parameters: ParameterBindings): Promise<InterceptedExecution> {
    return executeWithAudit(this.dependencies, text, parameters);
  }

  /**
   * Create a command whose executions are audited
   */
  createCommand(text: string, parameters: ParameterBindings = {}): AuditedCommand {
    return new AuditedCommand(this, text, parameters);
  }

  /**
   * Create a command that bypasses auditing
   */
  createUnauditedCommand(text: string, parameters: ParameterBindings = {}): SqlCommand {
    return new DirectCommand(this.channel, text, parameters);
  }

  async execute(text: string, parameters: ParameterBindings = {}): Promise<AuditedResult<number>> {
    return this.createCommand(text, parameters).executeAudited();
  }

  async executeScalar(
    text: string,
    parameters: ParameterBindings = {},
  ): Promise<AuditedResult<unknown>> {
    return this.createCommand(text, parameters).executeScalarAudited();
  }

  /**
   * Drop cached column metadata for one table, or for all tables and the server version
   */
  invalidateTableMetadata(schemaName?: string, tableName?: string): void {
    if (tableName) {
      this.columnCache.invalidate(schemaName, tableName);
    } else {
      this.columnCache.clear();
      this.serverVersion.clear();
    }
  }

  /**
   * Set audit context for current async scope
   */
  setContext(context: Partial<AuditContext>): void {
    this.contextManager.mergeContext(context);
  }

  /**
   * Run a function with specific audit context
   */
  withContext<T>(context: AuditContext, fn: () => T): T {
    return this.contextManager.runWithContext(context, fn);
  }

  /**
   * Get current audit context
   */
  getContext(): AuditContext | undefined {
    return this.contextManager.getContext();
  }

  /**
   * Wait for background dispatches and write any batched records
   */
  async flush(): Promise<void> {
    await this.assembler.drain();
    if (this.batchSink) {
      await this.batchSink.flush();
    }
  }

  /**
   * Gracefully shutdown the auditor
   * Flushes all pending records before shutting down
   */
  async shutdown(): Promise<void> {
    await this.assembler.drain();
    if (this.batchSink) {
      await this.batchSink.shutdown();
    }
  }

  /**
   * Get batch sink stats (only available in batch mode)
   */
  getStats(): BatchWriterStats | undefined {
    return this.batchSink?.getStats();
  }
}
