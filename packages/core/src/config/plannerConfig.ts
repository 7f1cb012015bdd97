import { z } from "zod";
import {
  DEFAULT_ALTERNATE_COUNT,
  DEFAULT_COST_WEIGHTS,
  DEFAULT_LATENCY_BOUND_MS,
  DEFAULT_REASONER_TIMEOUT_MS
} from "../constants";
import { parseWith } from "../domain/schemas";

export const CostWeightsSchema = z
  .object({
    alpha: z.number().finite().positive().default(DEFAULT_COST_WEIGHTS.alpha),
    beta: z.number().finite().positive().default(DEFAULT_COST_WEIGHTS.beta)
  })
  .strict();

export const PlannerConfigSchema = z
  .object({
    // number of alternate paths reported next to the primary one
    k: z.number().int().min(0).default(DEFAULT_ALTERNATE_COUNT),
    costWeights: CostWeightsSchema.default({}),
    latencyBoundMs: z.number().finite().positive().default(DEFAULT_LATENCY_BOUND_MS),
    filter: z.enum(["rules", "reasoner"]).default("rules"),
    reasonerFallback: z.enum(["rules", "none"]).default("rules"),
    reasonerTimeoutMs: z
      .number()
      .finite()
      .positive()
      .default(DEFAULT_REASONER_TIMEOUT_MS)
  })
  .strict();

export type CostWeights = z.output<typeof CostWeightsSchema>;
export type PlannerConfig = z.output<typeof PlannerConfigSchema>;
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;

export const resolvePlannerConfig = (input: PlannerConfigInput = {}): PlannerConfig =>
  parseWith(PlannerConfigSchema, input, "planner configuration");
