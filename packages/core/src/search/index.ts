export { searchPaths } from "./pathSearch";
export type { RankedPath, SearchOutcome } from "./pathSearch";
export { kShortestPaths, comparePaths } from "./kShortestPaths";
export { shortestPath, distancesTo, createMask, pathCost } from "./shortestPath";
export type { IndexedPath, SearchMask } from "./shortestPath";
export { MinHeap } from "./minHeap";
export { compareIdSequences, roundCost } from "./pathOrder";
