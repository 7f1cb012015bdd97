import { GOAL_NODE, START_NODE } from "../constants";
import type { CostWeights } from "../config/plannerConfig";
import type { Catalog } from "./catalog";
import { GraphIntegrityError, PathNotFoundError } from "./errors";
import type { CostBreakdown, ExclusionRecord, LearningObject } from "./models";

export interface WeightedEdge {
  from: number;
  to: number;
  cost: number;
  breakdown: CostBreakdown;
}

/**
 * Prerequisite graph restricted to the feasible learning objects, with the
 * START and GOAL sentinels wired in. Nodes and edges live in flat arrays and
 * are referred to by index, so searches can mask them without copying.
 */
export interface WeightedDag {
  readonly nodes: readonly string[];
  readonly indexById: ReadonlyMap<string, number>;
  readonly edges: readonly WeightedEdge[];
  readonly outgoing: readonly (readonly number[])[];
  readonly incoming: readonly (readonly number[])[];
  readonly durations: readonly number[];
  readonly start: number;
  readonly goal: number;
}

export interface DagBuildOptions {
  costWeights: CostWeights;
  // Reported with PathNotFoundError when GOAL cannot be reached.
  excluded?: readonly ExclusionRecord[];
}

const ZERO_COST: CostBreakdown = Object.freeze({ duration: 0, inaccuracy: 0, total: 0 });

export const computeEdgeCost = (
  target: LearningObject,
  weights: CostWeights
): CostBreakdown => {
  const inaccuracy = 1 - target.accuracyStat;
  const total = weights.alpha * target.durationMin + weights.beta * inaccuracy;
  if (!Number.isFinite(total) || total < 0) {
    throw new Error(
      `Edge cost into "${target.id}" is not a finite non-negative number (${total})`
    );
  }
  return { duration: target.durationMin, inaccuracy, total };
};

export const topologicalSort = (
  nodeCount: number,
  edges: readonly WeightedEdge[],
  outgoing: readonly (readonly number[])[]
): number[] => {
  const inDegree = new Array<number>(nodeCount).fill(0);
  edges.forEach(edge => {
    inDegree[edge.to] += 1;
  });

  const queue: number[] = [];
  inDegree.forEach((count, node) => {
    if (count === 0) {
      queue.push(node);
    }
  });

  const order: number[] = [];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    order.push(current);
    outgoing[current].forEach(edgeIndex => {
      const target = edges[edgeIndex].to;
      inDegree[target] -= 1;
      if (inDegree[target] === 0) {
        queue.push(target);
      }
    });
  }

  return order;
};

/**
 * Extracts one cycle from the nodes Kahn's algorithm could not order. Every
 * such node keeps a predecessor that is also unordered, so walking
 * predecessors must revisit a node.
 */
export const findCycle = (
  nodes: readonly string[],
  ordered: ReadonlySet<number>,
  edges: readonly WeightedEdge[],
  incoming: readonly (readonly number[])[]
): string[] => {
  const first = nodes.findIndex((_, index) => !ordered.has(index));
  if (first < 0) {
    return [];
  }

  const walk: number[] = [];
  const seenAt = new Map<number, number>();
  let current = first;
  while (!seenAt.has(current)) {
    seenAt.set(current, walk.length);
    walk.push(current);
    const predecessor = incoming[current]
      .map(edgeIndex => edges[edgeIndex].from)
      .find(node => !ordered.has(node));
    if (predecessor === undefined) {
      throw new Error(`Unordered node "${nodes[current]}" has no unordered predecessor`);
    }
    current = predecessor;
  }

  const cycle = walk
    .slice(seenAt.get(current))
    .reverse()
    .map(index => nodes[index]);
  let pivot = 0;
  cycle.forEach((id, index) => {
    if (id < cycle[pivot]) {
      pivot = index;
    }
  });
  const rotated = [...cycle.slice(pivot), ...cycle.slice(0, pivot)];
  return [...rotated, rotated[0]];
};

const isReachable = (dag: WeightedDag): boolean => {
  const seen = new Uint8Array(dag.nodes.length);
  const stack = [dag.start];
  seen[dag.start] = 1;
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) {
      break;
    }
    if (current === dag.goal) {
      return true;
    }
    dag.outgoing[current].forEach(edgeIndex => {
      const next = dag.edges[edgeIndex].to;
      if (!seen[next]) {
        seen[next] = 1;
        stack.push(next);
      }
    });
  }
  return false;
};

export const buildWeightedDag = (
  catalog: Catalog,
  feasible: ReadonlySet<string>,
  options: DagBuildOptions
): WeightedDag => {
  const objects = catalog.objects.filter(object => feasible.has(object.id));
  const nodes = [START_NODE, ...objects.map(object => object.id), GOAL_NODE];
  const start = 0;
  const goal = nodes.length - 1;
  const indexById = new Map<string, number>();
  objects.forEach((object, offset) => indexById.set(object.id, offset + 1));

  const edges: WeightedEdge[] = [];
  const outgoing: number[][] = nodes.map(() => []);
  const incoming: number[][] = nodes.map(() => []);
  const addEdge = (from: number, to: number, breakdown: CostBreakdown) => {
    outgoing[from].push(edges.length);
    incoming[to].push(edges.length);
    edges.push({ from, to, cost: breakdown.total, breakdown });
  };

  const seenPairs = new Set<string>();
  catalog.edges.forEach(edge => {
    const from = indexById.get(edge.fromId);
    const to = indexById.get(edge.toId);
    if (from === undefined || to === undefined) {
      return;
    }
    const key = `${from}:${to}`;
    if (seenPairs.has(key)) {
      return;
    }
    seenPairs.add(key);
    addEdge(from, to, computeEdgeCost(objects[to - 1], options.costWeights));
  });

  const order = topologicalSort(nodes.length, edges, outgoing);
  if (order.length < nodes.length) {
    throw new GraphIntegrityError(findCycle(nodes, new Set(order), edges, incoming));
  }

  for (let node = 1; node < goal; node += 1) {
    if (incoming[node].length === 0) {
      addEdge(start, node, ZERO_COST);
    }
  }
  for (let node = 1; node < goal; node += 1) {
    if (outgoing[node].length === 0) {
      addEdge(node, goal, ZERO_COST);
    }
  }

  const durations = nodes.map((_, index) =>
    index === start || index === goal ? 0 : objects[index - 1].durationMin
  );
  const dag: WeightedDag = {
    nodes,
    indexById,
    edges,
    outgoing,
    incoming,
    durations,
    start,
    goal
  };
  if (!isReachable(dag)) {
    throw new PathNotFoundError(options.excluded ?? []);
  }
  return dag;
};
