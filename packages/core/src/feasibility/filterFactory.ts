import type { PlannerConfig } from "../config/plannerConfig";
import { ReasonerUnavailableError } from "../domain/errors";
import type { Logger } from "../logging/logger";
import { ReasonerFilter, type ReasonerClient } from "./reasonerFilter";
import { RuleBasedFilter, type RuleBasedFilterOptions } from "./ruleBasedFilter";
import type { FeasibilityFilter } from "./types";

export interface FilterFactoryOptions extends RuleBasedFilterOptions {
  reasonerClient?: ReasonerClient;
  logger?: Logger;
  now?: () => number;
}

export const createFeasibilityFilter = (
  config: Pick<PlannerConfig, "filter" | "reasonerFallback" | "reasonerTimeoutMs">,
  options: FilterFactoryOptions = {}
): FeasibilityFilter => {
  const rules = new RuleBasedFilter({ messages: options.messages });
  if (config.filter === "rules") {
    return rules;
  }
  if (!options.reasonerClient) {
    throw new ReasonerUnavailableError(
      "unconfigured",
      "filter is set to \"reasoner\" but no reasoner client was supplied"
    );
  }
  return new ReasonerFilter({
    client: options.reasonerClient,
    timeoutMs: config.reasonerTimeoutMs,
    fallback: config.reasonerFallback === "rules" ? rules : undefined,
    logger: options.logger,
    now: options.now
  });
};
