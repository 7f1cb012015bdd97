import { describe, expect, it, vi } from "vitest";
import { createCatalog } from "../domain/catalog";
import { ReasonerUnavailableError } from "../domain/errors";
import type { Logger } from "../logging/logger";
import { scenarioContext, scenarioEdges, scenarioObjects } from "../mock/sampleData";
import { createFeasibilityFilter } from "./filterFactory";
import { ReasonerFilter, type ReasonerClient } from "./reasonerFilter";
import { RuleBasedFilter } from "./ruleBasedFilter";

const catalog = createCatalog({ objects: scenarioObjects, edges: scenarioEdges });

const clientReturning = (reply: unknown): ReasonerClient => ({
  name: "stub-reasoner",
  evaluate: () => reply
});

const spyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

const fixedClock = () => 0;

describe("ReasonerFilter", () => {
  it("normalizes the reasoner verdict to catalog order", () => {
    const filter = new ReasonerFilter({
      client: clientReturning({
        feasible: ["Q_88", "Q_17", "Q_44"],
        infeasible: [
          { lo_id: "Q_210", reason: "SWRL violation" },
          { lo_id: "L_55", reason: "SWRL violation" }
        ]
      }),
      timeoutMs: 50,
      now: fixedClock
    });

    const outcome = filter.filter(catalog, scenarioContext);

    expect([...outcome.feasible]).toEqual(["Q_17", "Q_44", "Q_88"]);
    expect(outcome.infeasible).toEqual([
      { loId: "L_55", reason: "SWRL violation" },
      { loId: "Q_210", reason: "SWRL violation" }
    ]);
  });

  it("passes the catalog and context to the client", () => {
    const evaluate = vi.fn(() => ({
      feasible: scenarioObjects.map(object => object.id),
      infeasible: []
    }));
    const filter = new ReasonerFilter({
      client: { name: "stub-reasoner", evaluate },
      timeoutMs: 50,
      now: fixedClock
    });

    filter.filter(catalog, scenarioContext);

    expect(evaluate).toHaveBeenCalledWith({
      objects: catalog.objects,
      context: scenarioContext
    });
  });

  it("surfaces client failures when no fallback is configured", () => {
    const filter = new ReasonerFilter({
      client: {
        name: "stub-reasoner",
        evaluate: () => {
          throw new Error("connection refused");
        }
      },
      timeoutMs: 50,
      now: fixedClock
    });

    expect(() => filter.filter(catalog, scenarioContext)).toThrow(
      new ReasonerUnavailableError("stub-reasoner", "connection refused")
    );
  });

  it("rejects a verdict that misses catalog objects", () => {
    const filter = new ReasonerFilter({
      client: clientReturning({ feasible: ["Q_17", "Q_999"], infeasible: [] }),
      timeoutMs: 50,
      now: fixedClock
    });

    expect(() => filter.filter(catalog, scenarioContext)).toThrow(ReasonerUnavailableError);
  });

  it("rejects a malformed verdict", () => {
    const filter = new ReasonerFilter({
      client: clientReturning({ feasible: "everything" }),
      timeoutMs: 50,
      now: fixedClock
    });

    expect(() => filter.filter(catalog, scenarioContext)).toThrow(/malformed reply/);
  });

  it("treats a slow answer as unavailable", () => {
    const ticks = [0, 75];
    const filter = new ReasonerFilter({
      client: clientReturning({
        feasible: scenarioObjects.map(object => object.id),
        infeasible: []
      }),
      timeoutMs: 50,
      now: () => ticks.shift() ?? 0
    });

    expect(() => filter.filter(catalog, scenarioContext)).toThrow(
      'Reasoner "stub-reasoner" unavailable: answered in 75.0ms, over the 50ms limit'
    );
  });

  it("falls back to the built-in rules and says so", () => {
    const logger = spyLogger();
    const filter = new ReasonerFilter({
      client: {
        name: "stub-reasoner",
        evaluate: () => {
          throw new Error("timeout");
        }
      },
      timeoutMs: 50,
      fallback: new RuleBasedFilter(),
      logger,
      now: fixedClock
    });

    const outcome = filter.filter(catalog, scenarioContext);

    expect([...outcome.feasible]).toEqual(["Q_17", "Q_44", "Q_88"]);
    expect(logger.warn).toHaveBeenCalledWith("Reasoner failed, falling back", {
      reasoner: "stub-reasoner",
      fallback: "rules",
      error: 'Reasoner "stub-reasoner" unavailable: timeout'
    });
  });
});

describe("createFeasibilityFilter", () => {
  const base = { filter: "rules", reasonerFallback: "rules", reasonerTimeoutMs: 50 } as const;

  it("selects the built-in rules by default", () => {
    expect(createFeasibilityFilter(base).id).toBe("rules");
  });

  it("selects the reasoner when configured", () => {
    const filter = createFeasibilityFilter(
      { ...base, filter: "reasoner" },
      { reasonerClient: clientReturning({ feasible: [], infeasible: [] }) }
    );
    expect(filter.id).toBe("reasoner");
    expect(filter.title).toBe("External reasoner (stub-reasoner)");
  });

  it("fails fast when the reasoner is selected without a client", () => {
    expect(() => createFeasibilityFilter({ ...base, filter: "reasoner" })).toThrow(
      ReasonerUnavailableError
    );
  });

  it("surfaces reasoner failures when the fallback is disabled", () => {
    const filter = createFeasibilityFilter(
      { ...base, filter: "reasoner", reasonerFallback: "none" },
      { reasonerClient: clientReturning(null), now: fixedClock }
    );
    expect(() => filter.filter(catalog, scenarioContext)).toThrow(ReasonerUnavailableError);
  });
});
