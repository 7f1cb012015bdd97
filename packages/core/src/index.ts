export * from "./domain/models";
export * from "./domain/errors";
export * from "./constants";
export {
  BandwidthClassSchema,
  LearningObjectSchema,
  PrerequisiteEdgeSchema,
  UserContextSchema,
  UserContextRecordSchema,
  formatIssues,
  parseWith
} from "./domain/schemas";
export type { UserContextRecord } from "./domain/schemas";
export { createCatalog } from "./domain/catalog";
export type { Catalog, CatalogInput } from "./domain/catalog";
export {
  buildWeightedDag,
  computeEdgeCost,
  findCycle,
  topologicalSort
} from "./domain/prerequisiteGraph";
export type {
  DagBuildOptions,
  WeightedDag,
  WeightedEdge
} from "./domain/prerequisiteGraph";
export {
  PlannerConfigSchema,
  CostWeightsSchema,
  resolvePlannerConfig
} from "./config/plannerConfig";
export type {
  CostWeights,
  PlannerConfig,
  PlannerConfigInput
} from "./config/plannerConfig";
export * from "./feasibility";
export * from "./search";
export * from "./trace";
export { ContextPathPlanner } from "./planner/pathPlanner";
export type { PathPlannerOptions } from "./planner/pathPlanner";
export { PlanningService } from "./services/planningService";
export {
  createLogger,
  resolveLogLevel,
  silentLogger,
  DEFAULT_LOG_LEVEL
} from "./logging/logger";
export type { LogLevel, LogMeta, Logger } from "./logging/logger";
