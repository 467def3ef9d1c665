import type { AuditRecord } from "../types/audit.js";
import type { AuditSink, BatchWriterStats } from "../types/config.js";
import { createConsoleLogger, type Logger } from "../utils/logger.js";
import { toError } from "../core/errors.js";

export interface BatchAuditSinkConfig {
  batchSize: number;
  flushInterval: number;
  logger: Logger;
}

/**
 * Batched audit sink with async queue
 * Collects records and hands them to the target sink in batches
 */
export class BatchAuditSink implements AuditSink {
  private static instances = new Set<BatchAuditSink>();
  private static listenersAttached = false;
  private static handleBeforeExit = (): void => {
    void BatchAuditSink.shutdownAll();
  };
  private static handleSigterm = (): void => {
    BatchAuditSink.shutdownAndReraise("SIGTERM");
  };
  private static handleSigint = (): void => {
    BatchAuditSink.shutdownAndReraise("SIGINT");
  };

  /** Resolves once every instance has flushed; failures are logged per instance */
  private static async shutdownAll(): Promise<void> {
    await Promise.all(
      Array.from(BatchAuditSink.instances, (instance) =>
        instance.shutdown().catch((error: unknown) => {
          instance.config.logger.error("Failed to shutdown batch audit sink:", error);
        }),
      ),
    );
  }

  /**
   * Flush, then send the signal again so it takes its default action
   * once our listeners are gone
   */
  private static shutdownAndReraise(signal: NodeJS.Signals): void {
    BatchAuditSink.shutdownAll()
      .then(() => {
        if (!BatchAuditSink.listenersAttached) {
          process.kill(process.pid, signal);
        }
      })
      .catch((error: unknown) => {
        createConsoleLogger().error(`Failed to re-raise ${signal}:`, error);
      });
  }

  private static registerInstance(instance: BatchAuditSink): void {
    BatchAuditSink.instances.add(instance);

    if (!BatchAuditSink.listenersAttached && typeof process !== "undefined") {
      process.on("beforeExit", BatchAuditSink.handleBeforeExit);
      process.on("SIGTERM", BatchAuditSink.handleSigterm);
      process.on("SIGINT", BatchAuditSink.handleSigint);
      BatchAuditSink.listenersAttached = true;
    }
  }

  private static unregisterInstance(instance: BatchAuditSink): void {
    BatchAuditSink.instances.delete(instance);

    if (
      BatchAuditSink.listenersAttached &&
      BatchAuditSink.instances.size === 0 &&
      typeof process !== "undefined"
    ) {
      process.off("beforeExit", BatchAuditSink.handleBeforeExit);
      process.off("SIGTERM", BatchAuditSink.handleSigterm);
      process.off("SIGINT", BatchAuditSink.handleSigint);
      BatchAuditSink.listenersAttached = false;
    }
  }

  private queue: AuditRecord[] = [];
  private flushTimeout: NodeJS.Timeout | null = null;
  private isShuttingDown = false;
  private activeWritePromise: Promise<void> | null = null;
  private lastError: Error | null = null;

  constructor(
    private target: AuditSink,
    private config: BatchAuditSinkConfig,
  ) {
    if (config.batchSize < 1 || config.flushInterval < 1) {
      throw new Error("batchSize and flushInterval must be at least 1");
    }

    // Start flush timer
    this.scheduleFlush();

    // Handle graceful shutdown for all instances with shared listeners
    BatchAuditSink.registerInstance(this);
  }

  /**
   * Queue a record (non-blocking). Write failures surface through
   * `flush()`, `getLastError()` and the log.
   */
  write(record: AuditRecord): void {
    if (this.isShuttingDown) {
      throw new Error("BatchAuditSink is shutting down");
    }

    this.queue.push(record);

    // Check queue size BEFORE any async operations to avoid race condition
    if (this.queue.length >= this.config.batchSize) {
      this.flush().catch((error: unknown) => {
        this.lastError = toError(error);
        this.config.logger.error("Batch flush failed:", error);
      });
    }
  }

  /**
   * Schedule periodic flush
   */
  private scheduleFlush(): void {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
    }

    this.flushTimeout = setTimeout(() => {
      this.flush()
        .catch((error: unknown) => {
          // Always log scheduled flush errors
          this.lastError = toError(error);
          this.config.logger.error("Scheduled flush failed:", error);
        })
        .finally(() => {
          if (!this.isShuttingDown) {
            this.scheduleFlush();
          }
        });
    }, this.config.flushInterval);
    // The timer alone never keeps the process alive
    this.flushTimeout.unref();
  }

  /**
   * Flush all queued records to the target sink
   */
  async flush(): Promise<void> {
    // If already writing, wait for that to complete, then pick up what queued meanwhile
    if (this.activeWritePromise) {
      await this.activeWritePromise;
      return this.flush();
    }

    if (this.queue.length === 0) {
      return;
    }

    // Take all queued items
    const itemsToWrite = this.queue.splice(0);

    // Create write promise
    this.activeWritePromise = this.writeBatch(itemsToWrite).finally(() => {
      this.activeWritePromise = null;
    });

    return this.activeWritePromise;
  }

  /**
   * Write one batch to the target sink
   */
  private async writeBatch(records: AuditRecord[]): Promise<void> {
    if (records.length === 0) return;

    try {
      if (this.target.writeMany) {
        await this.target.writeMany(records);
      } else {
        for (const record of records) {
          await this.target.write(record);
        }
      }
    } catch (error) {
      // Always log the actual error before rethrowing
      const failure = toError(error);
      this.lastError = failure;
      this.config.logger.error(`Audit batch write failed (${records.length} record(s) dropped):`, error);
      throw failure;
    }
  }

  /**
   * Graceful shutdown - flush all pending records
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;

    this.isShuttingDown = true;

    // Clear timer
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }

    try {
      // Wait for active write, then flush remaining items
      await this.flush();
    } finally {
      BatchAuditSink.unregisterInstance(this);
    }
  }

  /**
   * Get current queue size (for monitoring)
   */
  getQueueSize(): number {
    return this.queue.length;
  }

  /**
   * Get sink stats (for monitoring)
   */
  getStats(): BatchWriterStats {
    return {
      queueSize: this.queue.length,
      isWriting: this.activeWritePromise !== null,
      isShuttingDown: this.isShuttingDown,
    };
  }

  /**
   * Get last error (if any) for monitoring
   */
  getLastError(): Error | null {
    return this.lastError;
  }
}
