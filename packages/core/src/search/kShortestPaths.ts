import type { WeightedDag } from "../domain/prerequisiteGraph";
import { compareIdSequences } from "./pathOrder";
import {
  createMask,
  pathCost,
  shortestPath,
  type IndexedPath
} from "./shortestPath";

const pathKey = (path: IndexedPath): string => path.nodes.join(",");

const sharesRoot = (path: IndexedPath, root: readonly number[]): boolean =>
  path.nodes.length > root.length &&
  root.every((node, index) => path.nodes[index] === node);

export const comparePaths = (dag: WeightedDag) => (
  a: IndexedPath,
  b: IndexedPath
): number =>
  a.cost - b.cost ||
  compareIdSequences(
    a.nodes.map(node => dag.nodes[node]),
    b.nodes.map(node => dag.nodes[node])
  );

/**
 * Up to `count` loopless source-to-target paths in ranked order (Yen). Each
 * spur search runs on a fresh exclusion mask instead of an edited graph.
 */
export const kShortestPaths = (
  dag: WeightedDag,
  source: number,
  target: number,
  count: number
): IndexedPath[] => {
  if (count <= 0) {
    return [];
  }
  const first = shortestPath(dag, source, target);
  if (!first) {
    return [];
  }

  const order = comparePaths(dag);
  const accepted: IndexedPath[] = [first];
  const seen = new Set<string>([pathKey(first)]);
  const candidates: IndexedPath[] = [];

  while (accepted.length < count) {
    const previous = accepted[accepted.length - 1];

    for (let spurIndex = 0; spurIndex < previous.nodes.length - 1; spurIndex += 1) {
      const root = previous.nodes.slice(0, spurIndex + 1);
      const mask = createMask(dag);
      accepted.forEach(path => {
        if (sharesRoot(path, root)) {
          mask.edges[path.edges[spurIndex]] = 1;
        }
      });
      root.slice(0, -1).forEach(node => {
        mask.nodes[node] = 1;
      });

      const spur = shortestPath(dag, previous.nodes[spurIndex], target, mask);
      if (!spur) {
        continue;
      }
      const edges = [...previous.edges.slice(0, spurIndex), ...spur.edges];
      const candidate: IndexedPath = {
        nodes: [...root, ...spur.nodes.slice(1)],
        edges,
        cost: pathCost(dag, edges)
      };
      const key = pathKey(candidate);
      if (!seen.has(key)) {
        seen.add(key);
        candidates.push(candidate);
      }
    }

    if (candidates.length === 0) {
      break;
    }
    candidates.sort(order);
    const next = candidates.shift();
    if (!next) {
      break;
    }
    accepted.push(next);
  }

  return accepted;
};
