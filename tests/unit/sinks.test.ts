import { describe, it, expect, vi } from "vitest";
import { CallbackAuditSink, CompositeAuditSink, FilteringAuditSink, MemoryAuditSink } from "../../src/storage/sinks.js";
import type { AuditRecord } from "../../src/types/audit.js";
import { makeRecord } from "../helpers/records.js";

describe("CompositeAuditSink", () => {
  it("writes every record to each sink", async () => {
    const first = new MemoryAuditSink();
    const second = new MemoryAuditSink();
    const record = makeRecord();

    await new CompositeAuditSink([first, second]).write(record);

    expect(first.records).toEqual([record]);
    expect(second.records).toEqual([record]);
  });

  it("attempts all sinks before rethrowing the first failure", async () => {
    const memory = new MemoryAuditSink();
    const failing = new CallbackAuditSink(() => {
      throw new Error("sink down");
    });
    const record = makeRecord();

    await expect(new CompositeAuditSink([failing, memory]).write(record)).rejects.toThrow("sink down");
    expect(memory.records).toEqual([record]);
  });

  it("uses writeMany where a sink offers it", async () => {
    const writeMany = vi.fn<(records: readonly AuditRecord[]) => Promise<void>>().mockResolvedValue(undefined);
    const batched = { write: vi.fn(), writeMany };
    const memory = new MemoryAuditSink();
    const records = [makeRecord(), makeRecord({ eventName: "users_Deleted", operation: "DELETE" })];

    await new CompositeAuditSink([batched, memory]).writeMany(records);

    expect(writeMany).toHaveBeenCalledWith(records);
    expect(batched.write).not.toHaveBeenCalled();
    expect(memory.records).toEqual(records);
  });
});

describe("FilteringAuditSink", () => {
  it("forwards only records for the listed tables", async () => {
    const memory = new MemoryAuditSink();
    const sink = FilteringAuditSink.forTables(memory, ["Users"]);
    const kept = makeRecord({ tableName: "users" });

    await sink.write(kept);
    await sink.write(makeRecord({ tableName: "orders" }));

    expect(memory.records).toEqual([kept]);
  });

  it("filters batches with the predicate", async () => {
    const memory = new MemoryAuditSink();
    const sink = new FilteringAuditSink(memory, (record) => record.operation !== "DELETE");
    const insert = makeRecord({ operation: "INSERT", eventName: "users_Created" });

    await sink.writeMany([insert, makeRecord({ operation: "DELETE", eventName: "users_Deleted" })]);

    expect(memory.records).toEqual([insert]);
  });
});

describe("CallbackAuditSink", () => {
  it("passes each record to the callback", async () => {
    const callback = vi.fn();
    const record = makeRecord();

    await new CallbackAuditSink(callback).write(record);

    expect(callback).toHaveBeenCalledWith(record);
  });
});

describe("MemoryAuditSink", () => {
  it("clears stored records", () => {
    const sink = new MemoryAuditSink();
    sink.write(makeRecord());

    sink.clear();

    expect(sink.records).toEqual([]);
  });
});
