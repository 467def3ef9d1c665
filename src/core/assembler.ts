import { hostname } from "node:os";
import { threadId } from "node:worker_threads";
import type {
  AuditAction,
  AuditContext,
  AuditRecord,
  OperationKind,
  ParameterBindings,
  RowSnapshot,
} from "../types/audit.js";
import type { AuditContextProvider, AuditSink, DispatchMode } from "../types/config.js";
import type { Logger } from "../utils/logger.js";
import { omitFields } from "../utils/serializer.js";
import { AuditFailure } from "./errors.js";

function eventSuffix(operation: OperationKind): string {
  switch (operation) {
    case "INSERT":
      return "Created";
    case "UPDATE":
      return "Modified";
    case "DELETE":
      return "Deleted";
    default:
      return "Changed";
  }
}

export function eventNameFor(tableName: string, operation: OperationKind): string {
  return `${tableName}_${eventSuffix(operation)}`;
}

export interface AssembleInput {
  tableName: string;
  operation: AuditAction;
  text: string;
  parameters: ParameterBindings;
  before: RowSnapshot;
  after: RowSnapshot;
}

export interface RecordEnvironment {
  timestamp: Date;
  machineName: string;
  processId: number;
  threadId: number;
  context?: AuditContext;
  excludeFields: readonly string[];
}

/**
 * Build the frozen record for one audited execution
 */
export function buildAuditRecord(input: AssembleInput, environment: RecordEnvironment): AuditRecord {
  const { context, excludeFields } = environment;

  const record: AuditRecord = {
    timestamp: environment.timestamp,
    eventName: eventNameFor(input.tableName, input.operation),
    query: input.text,
    parameters: Object.freeze(omitFields(input.parameters, excludeFields)),
    beforeImage: Object.freeze(omitFields(input.before, excludeFields)),
    afterImage: Object.freeze(omitFields(input.after, excludeFields)),
    tableName: input.tableName,
    operation: input.operation,
    ...(context?.userId !== undefined ? { userId: context.userId } : {}),
    ...(context?.userName !== undefined ? { userName: context.userName } : {}),
    ...(context?.ipAddress !== undefined ? { ipAddress: context.ipAddress } : {}),
    ...(context?.userAgent !== undefined ? { userAgent: context.userAgent } : {}),
    machineName: environment.machineName,
    processId: environment.processId,
    threadId: environment.threadId,
    customProperties: Object.freeze({ ...context?.customProperties }),
  };

  return Object.freeze(record);
}

export interface AuditAssemblerOptions {
  sink: AuditSink;
  logger: Logger;
  dispatch: DispatchMode;
  excludeFields: readonly string[];
  contextProvider: AuditContextProvider;
  clock?: () => Date;
}

/**
 * Builds audit records and hands them to the sink
 */
export class AuditAssembler {
  private pending = new Set<Promise<void>>();
  private clock: () => Date;

  constructor(private options: AuditAssemblerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async assemble(input: AssembleInput): Promise<{ record: AuditRecord; failures: AuditFailure[] }> {
    const failures: AuditFailure[] = [];
    let context: AuditContext | undefined;
    try {
      context = await this.options.contextProvider.getCurrentContext();
    } catch (error) {
      this.options.logger.warn("Failed to resolve audit context:", error);
      failures.push(new AuditFailure("capture", "Failed to resolve audit context", { cause: error }));
    }

    const record = buildAuditRecord(input, {
      timestamp: this.clock(),
      machineName: hostname(),
      processId: process.pid,
      threadId,
      context,
      excludeFields: this.options.excludeFields,
    });

    return { record, failures };
  }

  /**
   * Hand the record to the sink. Resolves with the failure instead of throwing;
   * in background mode it resolves at once and failures are only logged.
   */
  async dispatch(record: AuditRecord): Promise<AuditFailure | undefined> {
    if (this.options.dispatch === "await") {
      return this.write(record);
    }

    const pending: Promise<void> = this.write(record).then(() => {
      this.pending.delete(pending);
    });
    this.pending.add(pending);
    return undefined;
  }

  /**
   * Wait for background dispatches started so far
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async write(record: AuditRecord): Promise<AuditFailure | undefined> {
    try {
      await this.options.sink.write(record);
      this.options.logger.debug(`Dispatched ${record.eventName}`);
      return undefined;
    } catch (error) {
      this.options.logger.error(`Failed to write audit record ${record.eventName}:`, error);
      return new AuditFailure("dispatch", `Failed to write audit record ${record.eventName}`, {
        cause: error,
      });
    }
  }
}
