import type { AuditRecord } from "../types/audit.js";
import type { AuditSink } from "../types/config.js";

/**
 * Sends every record to each sink in turn. All sinks are attempted;
 * the first failure is rethrown afterwards.
 */
export class CompositeAuditSink implements AuditSink {
  private sinks: AuditSink[];

  constructor(sinks: AuditSink[]) {
    this.sinks = [...sinks];
  }

  async write(record: AuditRecord): Promise<void> {
    await this.fanOut((sink) => sink.write(record));
  }

  async writeMany(records: readonly AuditRecord[]): Promise<void> {
    await this.fanOut(async (sink) => {
      if (sink.writeMany) {
        await sink.writeMany(records);
        return;
      }
      for (const record of records) {
        await sink.write(record);
      }
    });
  }

  private async fanOut(send: (sink: AuditSink) => Promise<void> | void): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async (sink) => send(sink)));
    const failed = results.find((result) => result.status === "rejected");
    if (failed && failed.status === "rejected") {
      throw failed.reason;
    }
  }
}

/**
 * Forwards only the records the predicate accepts
 */
export class FilteringAuditSink implements AuditSink {
  constructor(
    private inner: AuditSink,
    private predicate: (record: AuditRecord) => boolean,
  ) {}

  /**
   * Only records for the given tables, case-insensitive
   */
  static forTables(inner: AuditSink, tables: string[]): FilteringAuditSink {
    const allowed = new Set(tables.map((table) => table.toLowerCase()));
    return new FilteringAuditSink(inner, (record) => allowed.has(record.tableName.toLowerCase()));
  }

  async write(record: AuditRecord): Promise<void> {
    if (this.predicate(record)) {
      await this.inner.write(record);
    }
  }

  async writeMany(records: readonly AuditRecord[]): Promise<void> {
    const accepted = records.filter(this.predicate);
    if (accepted.length === 0) return;
    if (this.inner.writeMany) {
      await this.inner.writeMany(accepted);
      return;
    }
    for (const record of accepted) {
      await this.inner.write(record);
    }
  }
}

/**
 * Adapts a plain function into a sink
 *
 * @example
 * const sink = new CallbackAuditSink((record) => logger.info(record.eventName));
 */
export class CallbackAuditSink implements AuditSink {
  constructor(private callback: (record: AuditRecord) => Promise<void> | void) {}

  async write(record: AuditRecord): Promise<void> {
    await this.callback(record);
  }
}

/**
 * Keeps records in memory, newest last
 */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  write(record: AuditRecord): void {
    this.records.push(record);
  }

  clear(): void {
    this.records.length = 0;
  }
}
