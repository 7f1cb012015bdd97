import { PathNotFoundError, type PlanningError } from "../domain/errors";
import type { PathResult } from "../domain/models";

export interface ExcludedLoRecord {
  lo_id: string;
  reason: string;
}

export interface PathTraceRecord {
  user_id: string;
  runtime_ms: number;
  real_time_compliant: boolean;
  latency_bound_ms: number;
  primary_path: string[];
  total_cost: number;
  total_duration_min: number;
  time_budget_min: number;
  within_time_budget: boolean;
  primary_cost_breakdown: {
    from: string;
    to: string;
    details: { duration: number; inaccuracy: number; total: number };
  }[];
  excluded_los: ExcludedLoRecord[];
  alternate_paths: {
    rank: number;
    path: string[];
    cost: number;
    duration_min: number;
    within_time_budget: boolean;
  }[];
}

export interface PathFailureRecord {
  error: PlanningError["code"];
  message: string;
  excluded_los: ExcludedLoRecord[];
}

export const serializePathTrace = (result: PathResult): PathTraceRecord => ({
  user_id: result.userId,
  runtime_ms: result.runtimeMs,
  real_time_compliant: result.realTimeCompliant,
  latency_bound_ms: result.latencyBoundMs,
  primary_path: [...result.primaryPath],
  total_cost: result.totalCost,
  total_duration_min: result.totalDurationMin,
  time_budget_min: result.timeBudgetMin,
  within_time_budget: result.withinTimeBudget,
  primary_cost_breakdown: result.costBreakdown.map(step => ({
    from: step.from,
    to: step.to,
    details: {
      duration: step.duration,
      inaccuracy: step.inaccuracy,
      total: step.total
    }
  })),
  excluded_los: result.excludedLos.map(entry => ({
    lo_id: entry.loId,
    reason: entry.reason
  })),
  alternate_paths: result.alternatePaths.map(alternate => ({
    rank: alternate.rank,
    path: [...alternate.path],
    cost: alternate.cost,
    duration_min: alternate.durationMin,
    within_time_budget: alternate.withinTimeBudget
  }))
});

export const toFailureRecord = (error: PlanningError): PathFailureRecord => ({
  error: error.code,
  message: error.message,
  excluded_los:
    error instanceof PathNotFoundError
      ? error.excluded.map(entry => ({ lo_id: entry.loId, reason: entry.reason }))
      : []
});
