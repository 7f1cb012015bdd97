import {
  resolvePlannerConfig,
  type PlannerConfig,
  type PlannerConfigInput
} from "../config/plannerConfig";
import type { Catalog } from "../domain/catalog";
import type { PathResult, UserContext } from "../domain/models";
import { buildWeightedDag } from "../domain/prerequisiteGraph";
import { UserContextSchema, parseWith } from "../domain/schemas";
import { createFeasibilityFilter } from "../feasibility/filterFactory";
import type { ReasonerClient } from "../feasibility/reasonerFilter";
import type { FeasibilityFilter, RuleMessages } from "../feasibility/types";
import { createLogger, type Logger } from "../logging/logger";
import { searchPaths } from "../search/pathSearch";
import { assemblePathResult } from "../trace/traceGenerator";

export interface PathPlannerOptions {
  config?: PlannerConfigInput;
  // Takes precedence over the filter selected by `config.filter`.
  filter?: FeasibilityFilter;
  reasonerClient?: ReasonerClient;
  ruleMessages?: Partial<RuleMessages>;
  logger?: Logger;
  now?: () => number;
}

export class ContextPathPlanner {
  private readonly catalog: Catalog;
  private readonly config: PlannerConfig;
  private readonly filter: FeasibilityFilter;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(catalog: Catalog, options: PathPlannerOptions = {}) {
    this.catalog = catalog;
    this.config = resolvePlannerConfig(options.config);
    this.logger = options.logger ?? createLogger("planner");
    this.now = options.now ?? (() => performance.now());
    this.filter =
      options.filter ??
      createFeasibilityFilter(this.config, {
        messages: options.ruleMessages,
        reasonerClient: options.reasonerClient,
        logger: this.logger,
        now: this.now
      });
  }

  public getConfig(): PlannerConfig {
    return this.config;
  }

  public getFilter(): FeasibilityFilter {
    return this.filter;
  }

  public plan(context: UserContext): PathResult {
    const checked = parseWith(UserContextSchema, context, "user context");
    const startedAt = this.now();

    const outcome = this.filter.filter(this.catalog, checked);
    const dag = buildWeightedDag(this.catalog, outcome.feasible, {
      costWeights: this.config.costWeights,
      excluded: outcome.infeasible
    });
    const search = searchPaths(dag, checked.timeBudgetMin, this.config.k);

    const runtimeMs = this.now() - startedAt;
    this.logger.debug("Planned path", {
      userId: checked.userId,
      filter: this.filter.id,
      feasible: outcome.feasible.size,
      excluded: outcome.infeasible.length,
      edges: dag.edges.length,
      ranked: search.ranked.length,
      runtimeMs
    });

    return assemblePathResult({
      context: checked,
      search,
      infeasible: outcome.infeasible,
      runtimeMs,
      latencyBoundMs: this.config.latencyBoundMs
    });
  }
}
