/**
 * InMemoryRunStore and InMemoryTradeFeed tests
 */
import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryRunStore, isTerminalRun } from "../src/run-store.js";
import { InMemoryTradeFeed } from "../src/trade-feed.js";
import { queuedRun } from "../src/run-orchestrator.js";
import { RunStoreError, TradeFeedError } from "../src/errors.js";

const REQUEST = { tradeDate: "2024-03-15", source1: "oms", source2: "custodian" };

describe("InMemoryRunStore", () => {
  let store: InMemoryRunStore;

  beforeEach(() => {
    store = new InMemoryRunStore();
  });

  it("creates and reads back a run", async () => {
    const run = queuedRun("run-1", REQUEST, "2024-03-15T17:00:00.000Z");
    await store.create(run);
    expect(await store.get("run-1")).toEqual(run);
    expect(await store.get("run-2")).toBeUndefined();
  });

  it("refuses a second run with the same id", async () => {
    await store.create(queuedRun("run-1", REQUEST, "2024-03-15T17:00:00.000Z"));
    const again = store.create(queuedRun("run-1", REQUEST, "2024-03-15T17:05:00.000Z"));
    await expect(again).rejects.toBeInstanceOf(RunStoreError);
    await expect(again).rejects.toMatchObject({ code: "RUN_EXISTS" });
  });

  it("replaces a run that is still in progress", async () => {
    const run = queuedRun("run-1", REQUEST, "2024-03-15T17:00:00.000Z");
    await store.create(run);
    await store.save({ ...run, status: "running", startedAt: "2024-03-15T17:01:00.000Z" });
    expect((await store.get("run-1"))?.status).toBe("running");
  });

  it("refuses to change a terminal run", async () => {
    const run = queuedRun("run-1", REQUEST, "2024-03-15T17:00:00.000Z");
    await store.create({ ...run, status: "completed" });
    await expect(store.save({ ...run, status: "failed" })).rejects.toMatchObject({
      code: "RUN_FINALIZED",
      message: "Run 'run-1' is completed and can no longer change",
    });
    expect((await store.get("run-1"))?.status).toBe("completed");
  });

  it("lists most recently queued first, with status filter and limit", async () => {
    await store.create(queuedRun("run-a", REQUEST, "2024-03-15T10:00:00.000Z"));
    await store.create({ ...queuedRun("run-b", REQUEST, "2024-03-15T12:00:00.000Z"), status: "completed" });
    await store.create({ ...queuedRun("run-c", REQUEST, "2024-03-15T11:00:00.000Z"), status: "completed" });

    expect((await store.list()).map((r) => r.id)).toEqual(["run-b", "run-c", "run-a"]);
    expect((await store.list({ status: "completed" })).map((r) => r.id)).toEqual(["run-b", "run-c"]);
    expect((await store.list({ limit: 1 })).map((r) => r.id)).toEqual(["run-b"]);
    expect(store.size).toBe(3);
  });

  it("treats completed, failed and cancelled as terminal", () => {
    const run = queuedRun("run-1", REQUEST, "2024-03-15T17:00:00.000Z");
    expect(isTerminalRun(run)).toBe(false);
    expect(isTerminalRun({ ...run, status: "running" })).toBe(false);
    expect(isTerminalRun({ ...run, status: "completed" })).toBe(true);
    expect(isTerminalRun({ ...run, status: "failed" })).toBe(true);
    expect(isTerminalRun({ ...run, status: "cancelled" })).toBe(true);
  });
});

describe("InMemoryTradeFeed", () => {
  it("appends batches per source and trade date", async () => {
    const feed = new InMemoryTradeFeed();
    expect(feed.ingest("oms", "2024-03-15", [{ id: 1 }])).toEqual({ added: 1, replaced: 0, total: 1 });
    expect(feed.ingest("oms", "2024-03-15", [{ id: 2 }, { id: 3 }])).toEqual({
      added: 2,
      replaced: 0,
      total: 3,
    });
    feed.ingest("oms", "2024-03-16", [{ id: 4 }]);

    expect(await feed.load("oms", "2024-03-15")).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(await feed.load("oms", "2024-03-16")).toEqual([{ id: 4 }]);
  });

  it("replaces a re-sent record in place, matching references across aliases", async () => {
    const feed = new InMemoryTradeFeed();
    feed.ingest("oms", "2024-03-15", [
      { trade_id: "T1", price: 50 },
      { trade_id: "T2", price: 60 },
    ]);
    const again = feed.ingest("oms", "2024-03-15", [
      { externalRef: " T1 ", price: 51 },
      { trade_id: "T3", price: 70 },
    ]);

    expect(again).toEqual({ added: 1, replaced: 1, total: 3 });
    expect(await feed.load("oms", "2024-03-15")).toEqual([
      { externalRef: " T1 ", price: 51 },
      { trade_id: "T2", price: 60 },
      { trade_id: "T3", price: 70 },
    ]);
  });

  it("appends records without a readable reference", async () => {
    const feed = new InMemoryTradeFeed();
    feed.ingest("oms", "2024-03-15", [{ symbol: "IBM" }]);
    expect(feed.ingest("oms", "2024-03-15", [{ symbol: "IBM" }, "junk"])).toEqual({
      added: 2,
      replaced: 0,
      total: 3,
    });
  });

  it("registers an empty batch as a source with nothing to report", async () => {
    const feed = new InMemoryTradeFeed();
    expect(feed.ingest("custodian", "2024-03-15", [])).toEqual({ added: 0, replaced: 0, total: 0 });
    expect(await feed.load("custodian", "2024-03-15")).toEqual([]);
  });

  it("fails for a source with nothing loaded", async () => {
    const feed = new InMemoryTradeFeed();
    await expect(feed.load("custodian", "2024-03-15")).rejects.toBeInstanceOf(TradeFeedError);
    await expect(feed.load("custodian", "2024-03-15")).rejects.toMatchObject({
      code: "SOURCE_NOT_LOADED",
    });
  });

  it("forgets a cleared batch", async () => {
    const feed = new InMemoryTradeFeed();
    feed.ingest("oms", "2024-03-15", [{ id: 1 }]);
    expect(feed.clear("oms", "2024-03-15")).toBe(true);
    expect(feed.clear("oms", "2024-03-15")).toBe(false);
    await expect(feed.load("oms", "2024-03-15")).rejects.toMatchObject({ code: "SOURCE_NOT_LOADED" });
  });

  it("honours an aborted signal", async () => {
    const feed = new InMemoryTradeFeed();
    feed.ingest("oms", "2024-03-15", [{ id: 1 }]);
    const controller = new AbortController();
    controller.abort();
    await expect(feed.load("oms", "2024-03-15", controller.signal)).rejects.toBe(
      controller.signal.reason,
    );
  });
});
