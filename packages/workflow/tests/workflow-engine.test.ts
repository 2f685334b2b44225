/**
 * WorkflowEngine tests
 */
import { describe, it, expect, beforeEach } from "vitest";
import type { Break } from "@tradebreak/types";
import { WorkflowEngine } from "../src/workflow-engine.js";
import { InMemoryBreakStore } from "../src/in-memory-break-store.js";
import { StateConflictError, WorkflowError } from "../src/errors.js";
import { at, makeBreak } from "./fixtures.js";

describe("WorkflowEngine", () => {
  let store: InMemoryBreakStore;
  let engine: WorkflowEngine;

  async function seed(overrides: Partial<Break> = {}): Promise<Break> {
    const brk = makeBreak(overrides);
    await store.createManyIfAbsent([brk]);
    return brk;
  }

  beforeEach(() => {
    store = new InMemoryBreakStore();
    engine = new WorkflowEngine(store);
  });

  // ─── Operator path ───────────────────────────────────────────────────

  describe("operator path", () => {
    it("routes an open break to its owner with a severity deadline", async () => {
      const brk = await seed();
      const routed = await engine.route(brk.id, at("2024-03-15T18:05:00.000Z"));
      expect(routed).toMatchObject({
        status: "Routed",
        owner: "ops_analyst",
        slaDeadline: "2024-03-15T20:00:00.000Z",
        routedAt: "2024-03-15T18:05:00.000Z",
        version: 1,
      });
    });

    it("walks Routed → InProgress → Resolved → Closed", async () => {
      const brk = await seed();
      await engine.route(brk.id, at("2024-03-15T18:05:00.000Z"));
      const ack = await engine.acknowledge(brk.id, at("2024-03-15T18:10:00.000Z"));
      expect(ack.status).toBe("InProgress");
      expect(ack.acknowledgedAt).toBe("2024-03-15T18:10:00.000Z");
      expect(ack.slaDeadline).toBe("2024-03-15T20:00:00.000Z");

      const resolved = await engine.resolve(brk.id, " booked price corrected ", at("2024-03-15T19:00:00.000Z"));
      expect(resolved.status).toBe("Resolved");
      expect(resolved.resolvedAt).toBe("2024-03-15T19:00:00.000Z");
      expect(resolved.resolutionReason).toBe("booked price corrected");

      const closed = await engine.close(brk.id, at("2024-03-15T19:30:00.000Z"));
      expect(closed.status).toBe("Closed");
      expect(closed.closedAt).toBe("2024-03-15T19:30:00.000Z");
      expect(closed.resolvedAt).toBe("2024-03-15T19:00:00.000Z");
      expect(closed.version).toBe(4);
    });

    it("requires a resolution reason", async () => {
      const brk = await seed({ status: "InProgress" });
      await expect(engine.resolve(brk.id, "  ")).rejects.toMatchObject({ code: "VALIDATION_FAILED" });
    });

    it("refuses an operator resolve straight from Routed", async () => {
      const brk = await seed();
      await engine.route(brk.id);
      await expect(engine.resolve(brk.id, "done")).rejects.toBeInstanceOf(StateConflictError);
    });

    it("rejects every transition on a closed break and leaves it unchanged", async () => {
      const brk = await seed({ status: "Closed", version: 0 });
      for (const attempt of [
        () => engine.route(brk.id),
        () => engine.acknowledge(brk.id),
        () => engine.resolve(brk.id, "again"),
        () => engine.close(brk.id),
        () => engine.escalate(brk.id),
        () => engine.autoRemediate(brk.id),
      ]) {
        await expect(attempt()).rejects.toMatchObject({ code: "STATE_CONFLICT" });
      }
      expect(await store.get(brk.id)).toEqual(brk);
    });

    it("reports unknown breaks", async () => {
      await expect(engine.route("brk_unknown")).rejects.toMatchObject({ code: "BREAK_NOT_FOUND" });
      await expect(engine.escalations("brk_unknown")).rejects.toBeInstanceOf(WorkflowError);
    });

    it("serializes concurrent operations on one break", async () => {
      const brk = await seed();
      const results = await Promise.allSettled([engine.route(brk.id), engine.route(brk.id)]);
      expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
      expect((await store.get(brk.id))!.version).toBe(1);
    });
  });

  // ─── Escalation ──────────────────────────────────────────────────────

  describe("escalate", () => {
    it("climbs the tiers and stops at the last one", async () => {
      const brk = await seed();
      await engine.route(brk.id, at("2024-03-15T18:00:00.000Z"));

      const first = await engine.escalate(brk.id, at("2024-03-15T20:30:00.000Z"));
      expect(first.outcome).toBe("escalated");
      expect(first.break).toMatchObject({
        status: "Escalated",
        escalationLevel: 1,
        owner: "senior_ops_manager",
        slaDeadline: "2024-03-15T21:30:00.000Z",
      });

      expect((await engine.escalate(brk.id, at("2024-03-15T20:45:00.000Z"))).outcome).toBe("not_due");

      const second = await engine.escalate(brk.id, at("2024-03-15T21:31:00.000Z"));
      expect(second.break).toMatchObject({
        escalationLevel: 2,
        owner: "head_of_operations",
        slaDeadline: "2024-03-15T23:31:00.000Z",
      });

      const third = await engine.escalate(brk.id, at("2024-03-15T23:32:00.000Z"));
      expect(third.break).toMatchObject({
        escalationLevel: 3,
        owner: "head_of_operations",
        slaDeadline: "2024-03-16T03:32:00.000Z",
      });

      const fourth = await engine.escalate(brk.id, at("2024-03-16T04:00:00.000Z"));
      expect(fourth.outcome).toBe("at_max_level");
      expect(fourth.break.escalationLevel).toBe(3);

      const trail = await engine.escalations(brk.id);
      expect(trail.map((e) => [e.fromLevel, e.toLevel, e.fromOwner, e.toOwner])).toEqual([
        [0, 1, "ops_analyst", "senior_ops_manager"],
        [1, 2, "senior_ops_manager", "head_of_operations"],
        [2, 3, "head_of_operations", "head_of_operations"],
      ]);
      expect(trail[0]).toMatchObject({ breakId: brk.id, at: "2024-03-15T20:30:00.000Z", reason: "sla_breach" });
    });

    it("refuses to escalate an unrouted break", async () => {
      const brk = await seed();
      await expect(engine.escalate(brk.id, at("2024-03-20T00:00:00.000Z"))).rejects.toBeInstanceOf(StateConflictError);
    });

    it("re-routes an escalated break without resetting level, owner or deadline", async () => {
      const brk = await seed();
      await engine.route(brk.id, at("2024-03-15T18:00:00.000Z"));
      await engine.escalate(brk.id, at("2024-03-15T20:30:00.000Z"));
      const rerouted = await engine.route(brk.id, at("2024-03-15T20:40:00.000Z"));
      expect(rerouted).toMatchObject({
        status: "Routed",
        escalationLevel: 1,
        owner: "senior_ops_manager",
        slaDeadline: "2024-03-15T21:30:00.000Z",
        routedAt: "2024-03-15T20:40:00.000Z",
      });
    });
  });

  // ─── Auto-remediation ────────────────────────────────────────────────

  describe("autoRemediate", () => {
    it("resolves an eligible break as the system", async () => {
      const brk = await seed({ severity: "Low", mismatchMagnitude: 0.1 });
      const result = await engine.autoRemediate(brk.id, at("2024-03-15T18:01:00.000Z"));
      expect(result.outcome).toBe("remediated");
      if (result.outcome !== "remediated") return;
      expect(result.break).toMatchObject({
        status: "Resolved",
        owner: "system",
        resolutionReason: "auto-remediated",
        resolvedAt: "2024-03-15T18:01:00.000Z",
        autoRemediated: true,
      });
    });

    it("never remediates twice", async () => {
      const brk = await seed({ severity: "Low", mismatchMagnitude: 0.1 });
      await engine.autoRemediate(brk.id);
      expect(await engine.autoRemediate(brk.id)).toEqual({ outcome: "rejected", reason: "already_remediated" });
    });

    it("returns a rejection for ineligible breaks without changing them", async () => {
      const brk = await seed({ severity: "High" });
      expect(await engine.autoRemediate(brk.id)).toEqual({ outcome: "rejected", reason: "severity_not_low" });
      expect((await store.get(brk.id))!.version).toBe(0);
    });

    it("honours a disabled policy", async () => {
      const disabled = new WorkflowEngine(store, { autoRemediation: { enabled: false } });
      const brk = await seed({ severity: "Low", mismatchMagnitude: 0.1 });
      expect(await disabled.autoRemediate(brk.id)).toEqual({ outcome: "rejected", reason: "disabled" });
    });
  });

  describe("handoff", () => {
    it("remediates eligible breaks", async () => {
      const brk = await seed({ severity: "Low", category: "settlement_date", mismatchMagnitude: 0.05 });
      expect((await engine.handoff(brk)).status).toBe("Resolved");
    });

    it("routes everything else", async () => {
      const brk = await seed({ kind: "MissingCounterpart", category: "missing_counterpart", severity: "Low", mismatchMagnitude: 1 });
      const routed = await engine.handoff(brk);
      expect(routed.status).toBe("Routed");
      expect(routed.owner).toBe("trade_support_team");
    });
  });

  // ─── Periodic jobs ───────────────────────────────────────────────────

  describe("sweep", () => {
    it("escalates only overdue breaks and is quiet on a repeat", async () => {
      const late1 = await seed();
      const late2 = await seed({ severity: "Critical" });
      const onTime = await seed({ severity: "Low" });
      for (const b of [late1, late2, onTime]) await engine.route(b.id, at("2024-03-15T18:00:00.000Z"));

      const now = at("2024-03-15T20:01:00.000Z");
      expect(await engine.sweep(now)).toEqual({ scanned: 2, escalated: 2, skipped: 0, atMaxLevel: 0 });
      expect(await engine.sweep(now)).toEqual({ scanned: 0, escalated: 0, skipped: 0, atMaxLevel: 0 });
      expect(await store.listEscalations()).toHaveLength(2);
    });

    it("never double-escalates under concurrent sweeps", async () => {
      const other = new WorkflowEngine(store);
      const breaks = [await seed(), await seed(), await seed()];
      for (const b of breaks) await engine.route(b.id, at("2024-03-15T18:00:00.000Z"));

      const now = at("2024-03-15T21:00:00.000Z");
      const [r1, r2] = await Promise.all([engine.sweep(now), other.sweep(now)]);
      expect(r1.escalated + r2.escalated).toBe(3);
      const trail = await store.listEscalations();
      expect(trail).toHaveLength(3);
      expect(new Set(trail.map((e) => e.breakId)).size).toBe(3);
      for (const b of breaks) {
        expect((await store.get(b.id))!.escalationLevel).toBe(1);
      }
    });

    it("counts breaks already at the last tier", async () => {
      const brk = await seed({ status: "Escalated", escalationLevel: 3, owner: "head_of_operations", slaDeadline: "2024-03-15T19:00:00.000Z" });
      expect(await engine.sweep(at("2024-03-15T20:00:00.000Z"))).toEqual({ scanned: 1, escalated: 0, skipped: 0, atMaxLevel: 1 });
      expect((await store.get(brk.id))!.version).toBe(0);
    });
  });

  describe("closeExpired", () => {
    it("closes resolved breaks past the grace period", async () => {
      const old = await seed({ status: "Resolved", resolvedAt: "2024-03-14T12:00:00.000Z" });
      const fresh = await seed({ status: "Resolved", resolvedAt: "2024-03-15T12:00:00.000Z" });
      const result = await engine.closeExpired(at("2024-03-15T18:00:00.000Z"));
      expect(result).toEqual({ scanned: 2, closed: 1 });
      expect((await store.get(old.id))!.status).toBe("Closed");
      expect((await store.get(fresh.id))!.status).toBe("Resolved");
    });
  });
});
