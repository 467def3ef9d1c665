import { describe, it, expect, vi } from "vitest";
import { BatchAuditSink } from "../../src/storage/batch-writer.js";
import type { AuditRecord } from "../../src/types/audit.js";
import { createSilentLogger } from "../helpers/fake-channel.js";
import { makeRecord } from "../helpers/records.js";

function createTarget() {
  return {
    write: vi.fn<(record: AuditRecord) => Promise<void>>().mockResolvedValue(undefined),
    writeMany: vi.fn<(records: readonly AuditRecord[]) => Promise<void>>().mockResolvedValue(undefined),
  };
}

describe("BatchAuditSink", () => {
  it("flushes as soon as the queue reaches batchSize", async () => {
    const target = createTarget();
    const sink = new BatchAuditSink(target, { batchSize: 2, flushInterval: 60000, logger: createSilentLogger() });
    const first = makeRecord({ eventName: "users_Created" });
    const second = makeRecord({ eventName: "users_Deleted" });

    sink.write(first);
    expect(target.writeMany).not.toHaveBeenCalled();
    expect(sink.getQueueSize()).toBe(1);

    sink.write(second);
    expect(target.writeMany).toHaveBeenCalledWith([first, second]);
    expect(sink.getQueueSize()).toBe(0);

    await sink.shutdown();
  });

  it("writes records one by one when the target has no writeMany", async () => {
    const write = vi.fn<(record: AuditRecord) => void>();
    const sink = new BatchAuditSink({ write }, { batchSize: 10, flushInterval: 60000, logger: createSilentLogger() });

    sink.write(makeRecord());
    sink.write(makeRecord());
    await sink.flush();

    expect(write).toHaveBeenCalledTimes(2);
    await sink.shutdown();
  });

  it("flushes on the interval", async () => {
    vi.useFakeTimers();
    try {
      const target = createTarget();
      const sink = new BatchAuditSink(target, { batchSize: 100, flushInterval: 1000, logger: createSilentLogger() });

      sink.write(makeRecord());
      await vi.advanceTimersByTimeAsync(1000);

      expect(target.writeMany).toHaveBeenCalledTimes(1);
      await sink.shutdown();
    } finally {
      vi.useRealTimers();
    }
  });

  it("does not emit unhandledRejection when writes fail and not awaited", async () => {
    const unhandled = vi.fn();
    process.on("unhandledRejection", unhandled);

    const target = createTarget();
    target.writeMany.mockRejectedValue(new Error("write failed"));
    const logger = createSilentLogger();
    const sink = new BatchAuditSink(target, { batchSize: 1, flushInterval: 60000, logger });

    sink.write(makeRecord());
    await new Promise((resolve) => setImmediate(resolve));

    expect(unhandled).not.toHaveBeenCalled();
    expect(sink.getLastError()?.message).toBe("write failed");
    expect(logger.error).toHaveBeenCalled();

    await sink.shutdown();
    process.off("unhandledRejection", unhandled);
  });

  it("flushes pending records on shutdown and refuses new ones", async () => {
    const target = createTarget();
    const sink = new BatchAuditSink(target, { batchSize: 100, flushInterval: 60000, logger: createSilentLogger() });
    const record = makeRecord();

    sink.write(record);
    expect(sink.getStats()).toEqual({ queueSize: 1, isWriting: false, isShuttingDown: false });

    await sink.shutdown();

    expect(target.writeMany).toHaveBeenCalledWith([record]);
    expect(sink.getStats()).toEqual({ queueSize: 0, isWriting: false, isShuttingDown: true });
    expect(() => sink.write(record)).toThrow("BatchAuditSink is shutting down");
  });

  it("flushes on SIGINT and then re-raises the signal", async () => {
    const kill = vi.spyOn(process, "kill").mockImplementation(() => true);
    try {
      const before = process.listeners("SIGINT");
      const target = createTarget();
      const sink = new BatchAuditSink(target, { batchSize: 100, flushInterval: 60000, logger: createSilentLogger() });
      const record = makeRecord();
      sink.write(record);

      const handler = process.listeners("SIGINT").find((listener) => !before.includes(listener));
      if (!handler) throw new Error("expected a SIGINT listener");
      handler("SIGINT");

      await vi.waitFor(() => expect(kill).toHaveBeenCalledWith(process.pid, "SIGINT"));
      expect(target.writeMany).toHaveBeenCalledWith([record]);
      expect(process.listeners("SIGINT")).not.toContain(handler);
      expect(sink.getStats().isShuttingDown).toBe(true);
    } finally {
      kill.mockRestore();
    }
  });

  it("rejects a batch size below one", () => {
    expect(
      () => new BatchAuditSink(createTarget(), { batchSize: 0, flushInterval: 1000, logger: createSilentLogger() }),
    ).toThrow("batchSize and flushInterval must be at least 1");
  });
});
