import { describe, expect, it } from "vitest";
import { ValidationError } from "@ctxpath/core";
import { parsePlannerConstantsCsv } from "./plannerConstants";

describe("parsePlannerConstantsCsv", () => {
  it("overrides the listed keys and keeps defaults for the rest", () => {
    const config = parsePlannerConstantsCsv("key,value\nk,2\nbeta,10\nfilter,reasoner\n");

    expect(config).toEqual({
      k: 2,
      costWeights: { alpha: 1, beta: 10 },
      latencyBoundMs: 200,
      filter: "reasoner",
      reasonerFallback: "rules",
      reasonerTimeoutMs: 50
    });
  });

  it("matches keys case-insensitively", () => {
    expect(parsePlannerConstantsCsv("key,value\nLATENCY_BOUND_MS,150").latencyBoundMs).toBe(150);
  });

  it("rejects unknown keys", () => {
    expect(() => parsePlannerConstantsCsv("key,value\ngamma,1")).toThrow(
      'Unknown planner constant "gamma"'
    );
  });

  it.each(["constructor", "__proto__"])("rejects the object member name %s", key => {
    const parse = () => parsePlannerConstantsCsv(`key,value\n${key},3\n`);

    expect(parse).toThrow(ValidationError);
    expect(parse).toThrow(`Unknown planner constant "${key}"`);
  });

  it("rejects non-numeric values", () => {
    expect(() => parsePlannerConstantsCsv("key,value\nalpha,fast")).toThrow(
      'Planner constant "alpha" must be numeric, got "fast"'
    );
  });

  it("runs the parsed values through config validation", () => {
    expect(() => parsePlannerConstantsCsv("key,value\nk,-1")).toThrow(ValidationError);
  });

  it("rejects an unknown filter name", () => {
    expect(() => parsePlannerConstantsCsv("key,value\nfilter,oracle")).toThrow(
      'Planner constant "filter" must be rules or reasoner, got "oracle"'
    );
  });
});
