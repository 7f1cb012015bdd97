import type { ExclusionRecord, PathResult, UserContext } from "../domain/models";
import type { RankedPath, SearchOutcome } from "../search/pathSearch";

export interface AssembleInput {
  context: UserContext;
  search: SearchOutcome;
  infeasible: readonly ExclusionRecord[];
  runtimeMs: number;
  latencyBoundMs: number;
}

const freezeList = <T extends object>(items: readonly T[]): readonly T[] =>
  Object.freeze(items.map(item => Object.freeze({ ...item })));

const summarize = (path: RankedPath) =>
  Object.freeze({
    rank: path.rank,
    path: Object.freeze([...path.nodes]),
    cost: path.cost,
    durationMin: path.durationMin,
    withinTimeBudget: path.withinTimeBudget
  });

export const assemblePathResult = ({
  context,
  search,
  infeasible,
  runtimeMs,
  latencyBoundMs
}: AssembleInput): PathResult =>
  Object.freeze({
    userId: context.userId,
    primaryPath: Object.freeze([...search.primary.nodes]),
    totalCost: search.primary.cost,
    totalDurationMin: search.primary.durationMin,
    timeBudgetMin: context.timeBudgetMin,
    withinTimeBudget: search.budgetCompliant,
    costBreakdown: freezeList(search.primary.steps),
    excludedLos: freezeList(infeasible),
    alternatePaths: Object.freeze(search.alternates.map(summarize)),
    runtimeMs,
    latencyBoundMs,
    realTimeCompliant: runtimeMs < latencyBoundMs
  });
