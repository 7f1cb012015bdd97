import type { WeightedDag } from "../domain/prerequisiteGraph";
import { MinHeap } from "./minHeap";
import { compareIds, roundCost } from "./pathOrder";

export interface IndexedPath {
  nodes: readonly number[];
  edges: readonly number[];
  cost: number;
}

// Set entries are excluded from a search; the DAG itself is never touched.
export interface SearchMask {
  nodes: Uint8Array;
  edges: Uint8Array;
}

export const createMask = (dag: WeightedDag): SearchMask => ({
  nodes: new Uint8Array(dag.nodes.length),
  edges: new Uint8Array(dag.edges.length)
});

export const pathCost = (dag: WeightedDag, edges: readonly number[]): number =>
  roundCost(edges.reduce((sum, edgeIndex) => sum + dag.edges[edgeIndex].cost, 0));

// Same equality the ranking applies: costs equal once rounded to COST_SCALE.
const isTight = (through: number, best: number): boolean =>
  through === best || roundCost(through) === roundCost(best);

/**
 * Costs of the cheapest route from every node to `target`, by Dijkstra over
 * incoming edges. Unreachable and masked nodes stay at Infinity.
 */
export const distancesTo = (
  dag: WeightedDag,
  target: number,
  mask: SearchMask
): Float64Array => {
  const distance = new Float64Array(dag.nodes.length).fill(Infinity);
  if (mask.nodes[target]) {
    return distance;
  }
  distance[target] = 0;
  const heap = new MinHeap<{ node: number; cost: number }>(
    (a, b) => a.cost - b.cost || a.node - b.node
  );
  heap.push({ node: target, cost: 0 });

  while (heap.size > 0) {
    const entry = heap.pop();
    if (!entry || entry.cost > distance[entry.node]) {
      continue;
    }
    dag.incoming[entry.node].forEach(edgeIndex => {
      if (mask.edges[edgeIndex]) {
        return;
      }
      const edge = dag.edges[edgeIndex];
      if (mask.nodes[edge.from]) {
        return;
      }
      const candidate = entry.cost + edge.cost;
      if (candidate < distance[edge.from]) {
        distance[edge.from] = candidate;
        heap.push({ node: edge.from, cost: candidate });
      }
    });
  }

  return distance;
};

/**
 * Cheapest path from `source` to `target` avoiding the masked nodes and
 * edges. Among equally cheap paths the one whose node ids are smallest at the
 * first point of divergence wins.
 */
export const shortestPath = (
  dag: WeightedDag,
  source: number,
  target: number,
  mask: SearchMask = createMask(dag)
): IndexedPath | undefined => {
  if (mask.nodes[source]) {
    return undefined;
  }
  const distance = distancesTo(dag, target, mask);
  if (!Number.isFinite(distance[source])) {
    return undefined;
  }

  const nodes = [source];
  const edges: number[] = [];
  let current = source;
  while (current !== target) {
    let chosen: number | undefined;
    for (const edgeIndex of dag.outgoing[current]) {
      const edge = dag.edges[edgeIndex];
      if (mask.edges[edgeIndex] || mask.nodes[edge.to]) {
        continue;
      }
      if (!isTight(edge.cost + distance[edge.to], distance[current])) {
        continue;
      }
      if (
        chosen === undefined ||
        compareIds(dag.nodes[edge.to], dag.nodes[dag.edges[chosen].to]) < 0
      ) {
        chosen = edgeIndex;
      }
    }
    if (chosen === undefined) {
      throw new Error(`Shortest path walk stalled at "${dag.nodes[current]}"`);
    }
    edges.push(chosen);
    current = dag.edges[chosen].to;
    nodes.push(current);
  }

  return { nodes, edges, cost: pathCost(dag, edges) };
};
