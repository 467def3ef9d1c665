import { describe, it, expect, vi } from "vitest";
import { AuditAssembler, buildAuditRecord, eventNameFor, type AssembleInput } from "../../src/core/assembler.js";
import { AuditFailure } from "../../src/core/errors.js";
import { MemoryAuditSink } from "../../src/storage/sinks.js";
import type { AuditContext, AuditRecord } from "../../src/types/audit.js";
import type { AuditConfig } from "../../src/types/config.js";
import { createSilentLogger } from "../helpers/fake-channel.js";

const NOW = new Date("2024-05-01T12:00:00.000Z");

const INPUT: AssembleInput = {
  tableName: "accounts",
  operation: "UPDATE",
  text: "UPDATE accounts SET secret = @secret WHERE id = @id",
  parameters: { "@secret": "test-secret", "@id": 7 },
  before: { id: 7, secret: "old-secret", balance: 10 },
  after: { id: 7, secret: "test-secret", balance: 10 },
};

describe("eventNameFor", () => {
  it("names events after the table and operation", () => {
    expect(eventNameFor("users", "INSERT")).toBe("users_Created");
    expect(eventNameFor("users", "UPDATE")).toBe("users_Modified");
    expect(eventNameFor("users", "DELETE")).toBe("users_Deleted");
    expect(eventNameFor("users", "UNKNOWN")).toBe("users_Changed");
  });
});

describe("buildAuditRecord", () => {
  it("copies the context and environment onto the record", () => {
    const record = buildAuditRecord(INPUT, {
      timestamp: NOW,
      machineName: "test-host",
      processId: 42,
      threadId: 3,
      context: { userId: "u-1", ipAddress: "10.0.0.1", customProperties: { requestId: "r-1" } },
      excludeFields: [],
    });

    expect(record).toEqual({
      timestamp: NOW,
      eventName: "accounts_Modified",
      query: INPUT.text,
      parameters: INPUT.parameters,
      beforeImage: INPUT.before,
      afterImage: INPUT.after,
      tableName: "accounts",
      operation: "UPDATE",
      userId: "u-1",
      ipAddress: "10.0.0.1",
      machineName: "test-host",
      processId: 42,
      threadId: 3,
      customProperties: { requestId: "r-1" },
    });
    expect(record).not.toHaveProperty("userName");
  });

  it("drops excluded fields from images and parameters", () => {
    const record = buildAuditRecord(INPUT, {
      timestamp: NOW,
      machineName: "test-host",
      processId: 42,
      threadId: 0,
      excludeFields: ["SECRET"],
    });

    expect(record.parameters).toEqual({ "@id": 7 });
    expect(record.beforeImage).toEqual({ id: 7, balance: 10 });
    expect(record.afterImage).toEqual({ id: 7, balance: 10 });
  });

  it("freezes the record and its images", () => {
    const record = buildAuditRecord(INPUT, {
      timestamp: NOW,
      machineName: "test-host",
      processId: 42,
      threadId: 0,
      excludeFields: [],
    });

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.beforeImage)).toBe(true);
    expect(Object.isFrozen(record.customProperties)).toBe(true);
  });
});

function createAssembler(
  overrides: {
    write?: (record: AuditRecord) => Promise<void> | void;
    dispatch?: AuditConfig["dispatch"];
    getCurrentContext?: () => AuditContext | undefined | Promise<AuditContext | undefined>;
  } = {},
) {
  const memory = new MemoryAuditSink();
  const logger = createSilentLogger();
  const assembler = new AuditAssembler({
    sink: { write: overrides.write ?? ((record) => memory.write(record)) },
    logger,
    dispatch: overrides.dispatch ?? "await",
    excludeFields: [],
    contextProvider: { getCurrentContext: overrides.getCurrentContext ?? (() => undefined) },
    clock: () => NOW,
  });
  return { assembler, memory, logger };
}

describe("AuditAssembler", () => {
  it("stamps the record with the clock and the provider's context", async () => {
    const { assembler } = createAssembler({ getCurrentContext: async () => ({ userName: "Ada" }) });

    const { record, failures } = await assembler.assemble(INPUT);

    expect(failures).toEqual([]);
    expect(record.timestamp).toBe(NOW);
    expect(record.userName).toBe("Ada");
    expect(record.processId).toBe(process.pid);
  });

  it("reports a failing context provider and still builds the record", async () => {
    const { assembler } = createAssembler({
      getCurrentContext: () => {
        throw new Error("no session");
      },
    });

    const { record, failures } = await assembler.assemble(INPUT);

    expect(record.eventName).toBe("accounts_Modified");
    expect(record).not.toHaveProperty("userId");
    expect(failures).toHaveLength(1);
    expect(failures[0]?.kind).toBe("capture");
    expect(failures[0]?.message).toBe("Failed to resolve audit context");
  });

  it("returns a dispatch failure instead of throwing", async () => {
    const { assembler, logger } = createAssembler({
      write: () => {
        throw new Error("disk full");
      },
    });
    const { record } = await assembler.assemble(INPUT);

    const failure = await assembler.dispatch(record);

    expect(failure).toBeInstanceOf(AuditFailure);
    expect(failure?.kind).toBe("dispatch");
    expect(failure?.message).toBe("Failed to write audit record accounts_Modified");
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("tracks background writes until drained", async () => {
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const write = vi.fn(() => gate);
    const { assembler } = createAssembler({ write, dispatch: "background" });
    const { record } = await assembler.assemble(INPUT);

    await expect(assembler.dispatch(record)).resolves.toBeUndefined();
    expect(assembler.pendingCount).toBe(1);

    release();
    await assembler.drain();

    expect(write).toHaveBeenCalledWith(record);
    expect(assembler.pendingCount).toBe(0);
  });
});
