import { describe, expect, it } from "vitest";
import { ValidationError } from "../domain/errors";
import { resolvePlannerConfig } from "./plannerConfig";

describe("resolvePlannerConfig", () => {
  it("fills in the defaults", () => {
    expect(resolvePlannerConfig()).toEqual({
      k: 3,
      costWeights: { alpha: 1, beta: 5 },
      latencyBoundMs: 200,
      filter: "rules",
      reasonerFallback: "rules",
      reasonerTimeoutMs: 50
    });
  });

  it("keeps partial cost weights", () => {
    expect(resolvePlannerConfig({ costWeights: { beta: 2 } }).costWeights).toEqual({
      alpha: 1,
      beta: 2
    });
  });

  it("rejects invalid values", () => {
    expect(() => resolvePlannerConfig({ k: -1 })).toThrow(ValidationError);
    expect(() => resolvePlannerConfig({ costWeights: { alpha: 0 } })).toThrow(
      /costWeights\.alpha/
    );
  });
});
