import type { BandwidthClass } from "./domain/models";

export const START_NODE = "START";
export const GOAL_NODE = "GOAL";

export const ANY_LANGUAGE = "any";

export const BANDWIDTH_RANK: Readonly<Record<BandwidthClass, number>> = {
  low: 0,
  medium: 1,
  high: 2
};

export const DEFAULT_ALTERNATE_COUNT = 3;
export const DEFAULT_COST_WEIGHTS = { alpha: 1, beta: 5 } as const;
export const DEFAULT_LATENCY_BOUND_MS = 200;
export const DEFAULT_REASONER_TIMEOUT_MS = 50;

// Costs are compared and reported rounded to this many steps per unit, so
// costs within 1e-9 of each other tie.
export const COST_SCALE = 1e9;
