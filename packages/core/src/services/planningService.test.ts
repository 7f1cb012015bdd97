import { describe, expect, it, vi } from "vitest";
import { createCatalog } from "../domain/catalog";
import { PathNotFoundError, ValidationError } from "../domain/errors";
import type { Logger } from "../logging/logger";
import { scenarioEdges, scenarioObjects } from "../mock/sampleData";
import { PlanningService } from "./planningService";

const catalog = createCatalog({ objects: scenarioObjects, edges: scenarioEdges });

const record = {
  user_id: 42,
  language: "en",
  device: "mobile",
  bandwidth: "low",
  mastery_level: 0.65,
  time_budget_min: 60
};

const spyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

describe("PlanningService", () => {
  it("plans from a raw user-context record", () => {
    const ticks = [0, 3];
    const service = new PlanningService(catalog, {
      logger: spyLogger(),
      now: () => ticks.shift() ?? 0
    });

    const trace = service.planForRecord(record);

    expect(trace.user_id).toBe("42");
    expect(trace.primary_path).toEqual(["START", "Q_17", "Q_44", "Q_88", "GOAL"]);
    expect(trace.excluded_los).toEqual([
      { lo_id: "L_55", reason: "insufficient bandwidth for media" },
      { lo_id: "Q_210", reason: "requires mastery 0.80 > user mastery 0.65" }
    ]);
    expect(trace.runtime_ms).toBe(3);
    expect(trace.real_time_compliant).toBe(true);
  });

  it("warns when the latency bound is missed", () => {
    const ticks = [0, 250];
    const logger = spyLogger();
    const service = new PlanningService(catalog, {
      logger,
      now: () => ticks.shift() ?? 0
    });

    const trace = service.planForRecord(record);

    expect(trace.real_time_compliant).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Latency bound exceeded", {
      userId: "42",
      runtimeMs: 250,
      latencyBoundMs: 200
    });
  });

  it("rejects records with missing fields", () => {
    const service = new PlanningService(catalog, { logger: spyLogger() });
    const { device: _device, ...partial } = record;

    expect(() => service.planForRecord(partial)).toThrow(ValidationError);
  });

  it("logs and rethrows planning failures", () => {
    const logger = spyLogger();
    const service = new PlanningService(catalog, { logger });

    expect(() => service.planForRecord({ ...record, language: "fr" })).toThrow(
      PathNotFoundError
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "Planning failed",
      expect.objectContaining({ error: "PATH_NOT_FOUND" })
    );
  });
});
