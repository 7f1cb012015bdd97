import type { EdgeCostTrace } from "../domain/models";
import type { WeightedDag } from "../domain/prerequisiteGraph";
import { kShortestPaths } from "./kShortestPaths";
import { roundCost } from "./pathOrder";
import type { IndexedPath } from "./shortestPath";

export interface RankedPath {
  rank: number;
  nodes: readonly string[];
  cost: number;
  durationMin: number;
  withinTimeBudget: boolean;
  steps: readonly EdgeCostTrace[];
}

export interface SearchOutcome {
  primary: RankedPath;
  alternates: readonly RankedPath[];
  // every enumerated path, cheapest first; primary is one of them
  ranked: readonly RankedPath[];
  budgetCompliant: boolean;
}

const toRankedPath = (
  dag: WeightedDag,
  path: IndexedPath,
  index: number,
  timeBudgetMin: number
): RankedPath => {
  const durationMin = roundCost(
    path.nodes.reduce((sum, node) => sum + dag.durations[node], 0)
  );
  return {
    rank: index + 1,
    nodes: path.nodes.map(node => dag.nodes[node]),
    cost: path.cost,
    durationMin,
    withinTimeBudget: durationMin <= timeBudgetMin,
    steps: path.edges.map(edgeIndex => {
      const edge = dag.edges[edgeIndex];
      return {
        from: dag.nodes[edge.from],
        to: dag.nodes[edge.to],
        ...edge.breakdown
      };
    })
  };
};

/**
 * Ranks up to `k + 1` START-to-GOAL paths by cost and picks the cheapest one
 * that fits the time budget. When none fits, the cheapest path is returned
 * and `budgetCompliant` is false.
 */
export const searchPaths = (
  dag: WeightedDag,
  timeBudgetMin: number,
  k: number
): SearchOutcome => {
  const ranked = kShortestPaths(dag, dag.start, dag.goal, k + 1).map((path, index) =>
    toRankedPath(dag, path, index, timeBudgetMin)
  );
  if (ranked.length === 0) {
    throw new Error("No START to GOAL path in a graph that was checked for one");
  }

  const compliant = ranked.find(path => path.withinTimeBudget);
  const primary = compliant ?? ranked[0];
  return {
    primary,
    alternates: ranked.filter(path => path !== primary),
    ranked,
    budgetCompliant: compliant !== undefined
  };
};
