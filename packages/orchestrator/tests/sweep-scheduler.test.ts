/**
 * SweepScheduler tests
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { InMemoryBreakStore, WorkflowEngine } from "@tradebreak/workflow";
import { SweepScheduler } from "../src/sweep-scheduler.js";
import { makeBreak, silentLogger } from "./fixtures.js";

const TICK_AT = new Date("2024-03-15T21:00:00.000Z");

describe("SweepScheduler", () => {
  let store: InMemoryBreakStore;
  let engine: WorkflowEngine;

  beforeEach(async () => {
    store = new InMemoryBreakStore();
    engine = new WorkflowEngine(store);
    await store.createManyIfAbsent([
      makeBreak({
        status: "Routed",
        owner: "ops_analyst",
        slaDeadline: "2024-03-15T20:00:00.000Z",
        routedAt: "2024-03-15T12:05:00.000Z",
      }),
      makeBreak({
        id: "brk_00000000000000000000000000000002",
        status: "Resolved",
        owner: "ops_analyst",
        resolvedAt: "2024-03-14T12:00:00.000Z",
        resolutionReason: "booked",
      }),
    ]);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("escalates overdue breaks and closes expired ones in one tick", async () => {
    const scheduler = new SweepScheduler(engine, silentLogger(), { clock: () => TICK_AT });
    const tick = await scheduler.tick();

    expect(tick).toEqual({
      at: "2024-03-15T21:00:00.000Z",
      sweep: { scanned: 1, escalated: 1, skipped: 0, atMaxLevel: 0 },
      closed: { scanned: 1, closed: 1 },
    });
    expect(await store.get("brk_00000000000000000000000000000001")).toMatchObject({
      status: "Escalated",
      escalationLevel: 1,
      owner: "senior_ops_manager",
    });
    expect((await store.get("brk_00000000000000000000000000000002"))?.status).toBe("Closed");
  });

  it("is idempotent for the same instant", async () => {
    const scheduler = new SweepScheduler(engine, silentLogger(), { clock: () => TICK_AT });
    await scheduler.tick();
    const again = await scheduler.tick();

    expect(again?.sweep).toEqual({ scanned: 0, escalated: 0, skipped: 0, atMaxLevel: 0 });
    expect(again?.closed).toEqual({ scanned: 0, closed: 0 });
    expect(await store.listEscalations()).toHaveLength(1);
  });

  it("keeps the escalation trail single under overlapping ticks", async () => {
    const scheduler = new SweepScheduler(engine, silentLogger(), { clock: () => TICK_AT });
    const ticks = await Promise.all([scheduler.tick(), scheduler.tick(), scheduler.tick()]);

    const escalated = ticks.reduce((n, t) => n + (t?.sweep.escalated ?? 0), 0);
    expect(escalated).toBe(1);
    expect(await store.listEscalations()).toHaveLength(1);
  });

  it("logs a failed tick and resolves undefined", async () => {
    vi.spyOn(engine, "sweep").mockRejectedValue(new Error("store offline"));
    const scheduler = new SweepScheduler(engine, silentLogger(), { clock: () => TICK_AT });
    await expect(scheduler.tick()).resolves.toBeUndefined();
  });

  it("ticks on its interval until stopped", async () => {
    vi.useFakeTimers();
    const sweep = vi.spyOn(engine, "sweep");
    const closeExpired = vi.spyOn(engine, "closeExpired");
    const scheduler = new SweepScheduler(engine, silentLogger(), {
      intervalMs: 1000,
      clock: () => TICK_AT,
    });

    scheduler.start();
    expect(scheduler.running).toBe(true);
    await vi.advanceTimersByTimeAsync(2500);
    expect(sweep).toHaveBeenCalledTimes(2);
    expect(closeExpired).toHaveBeenCalledTimes(2);
    expect(sweep).toHaveBeenCalledWith(TICK_AT);

    await scheduler.stop();
    expect(scheduler.running).toBe(false);
    await vi.advanceTimersByTimeAsync(5000);
    expect(sweep).toHaveBeenCalledTimes(2);
  });

  it("ignores a second start", () => {
    vi.useFakeTimers();
    const scheduler = new SweepScheduler(engine, silentLogger());
    scheduler.start();
    scheduler.start();
    expect(vi.getTimerCount()).toBe(1);
    return scheduler.stop();
  });
});
