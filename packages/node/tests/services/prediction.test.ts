/**
 * Tests for loadPredictionAdapter.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { ModelArtifactError } from "@tradebreak/analytics";
import { loadPredictionAdapter } from "../../src/services/prediction.js";

const FEATURES = {
  historicalBreakRate: 0.1,
  volume: 40,
  categoryVolatility: 0,
  recentRunCount: 3,
};

const logger = pino({ level: "silent" });

describe("loadPredictionAdapter", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "tradebreak-model-"));
    await writeFile(
      join(dir, "model.json"),
      JSON.stringify({ modelId: "test-logit", intercept: 0, coefficients: {} }),
    );
    await writeFile(join(dir, "broken.json"), "{ not json");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("answers no-model without a path", async () => {
    const adapter = await loadPredictionAdapter({ timeoutMs: 500 }, logger);
    expect(adapter.configured).toBe(false);
    expect(adapter.timeoutMs).toBe(500);
    expect(await adapter.score(FEATURES)).toEqual({ status: "unavailable", reason: "no-model" });
  });

  it("answers no-model when the file is absent", async () => {
    const adapter = await loadPredictionAdapter(
      { modelPath: join(dir, "missing.json"), timeoutMs: 500 },
      logger,
    );
    expect(adapter.configured).toBe(false);
  });

  it("scores with a loaded artifact", async () => {
    const adapter = await loadPredictionAdapter(
      { modelPath: join(dir, "model.json"), timeoutMs: 500 },
      logger,
    );
    expect(adapter.configured).toBe(true);
    expect(await adapter.score(FEATURES)).toEqual({
      status: "scored",
      probability: 0.5,
      modelId: "test-logit",
      riskLevel: "medium",
    });
  });

  it("fails on a file that is not an artifact", async () => {
    await expect(
      loadPredictionAdapter({ modelPath: join(dir, "broken.json"), timeoutMs: 500 }, logger),
    ).rejects.toBeInstanceOf(ModelArtifactError);
  });
});
