import {
  ValidationError,
  resolvePlannerConfig,
  type PlannerConfig,
  type PlannerConfigInput
} from "@ctxpath/core";
import { parseCsvTable, toNumber } from "./csv";

type Setter = (input: PlannerConfigInput, value: string) => void;

const numeric = (key: string, value: string): number => {
  const parsed = toNumber(value);
  if (parsed === undefined) {
    throw new ValidationError(`Planner constant "${key}" must be numeric, got "${value}"`);
  }
  return parsed;
};

const SETTER_TABLE: Record<string, Setter> = {
  k: (input, value) => {
    input.k = numeric("k", value);
  },
  alpha: (input, value) => {
    input.costWeights = { ...input.costWeights, alpha: numeric("alpha", value) };
  },
  beta: (input, value) => {
    input.costWeights = { ...input.costWeights, beta: numeric("beta", value) };
  },
  latency_bound_ms: (input, value) => {
    input.latencyBoundMs = numeric("latency_bound_ms", value);
  },
  reasoner_timeout_ms: (input, value) => {
    input.reasonerTimeoutMs = numeric("reasoner_timeout_ms", value);
  },
  filter: (input, value) => {
    if (value !== "rules" && value !== "reasoner") {
      throw new ValidationError(`Planner constant "filter" must be rules or reasoner, got "${value}"`);
    }
    input.filter = value;
  },
  reasoner_fallback: (input, value) => {
    if (value !== "rules" && value !== "none") {
      throw new ValidationError(
        `Planner constant "reasoner_fallback" must be rules or none, got "${value}"`
      );
    }
    input.reasonerFallback = value;
  }
};

// Own keys only, so names like "constructor" stay unknown.
const SETTERS: ReadonlyMap<string, Setter> = new Map(Object.entries(SETTER_TABLE));

/**
 * Reads a `key,value` constants sheet into a planner configuration. Keys not
 * listed keep their defaults.
 */
export const parsePlannerConstantsCsv = (text: string): PlannerConfig => {
  const { rows } = parseCsvTable(text, "planner constants");
  const input: PlannerConfigInput = {};
  rows.forEach((row, index) => {
    const key = row.key?.toLowerCase();
    const value = row.value ?? "";
    if (!key) {
      throw new ValidationError(`Planner constants line ${index + 2} has no key`);
    }
    const setter = SETTERS.get(key);
    if (!setter) {
      throw new ValidationError(`Unknown planner constant "${key}"`);
    }
    setter(input, value);
  });
  return resolvePlannerConfig(input);
};
