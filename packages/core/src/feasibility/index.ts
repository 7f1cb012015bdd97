export { RuleBasedFilter } from "./ruleBasedFilter";
export type { RuleBasedFilterOptions } from "./ruleBasedFilter";
export { ReasonerFilter, ReasonerVerdictSchema } from "./reasonerFilter";
export type {
  ReasonerClient,
  ReasonerFilterOptions,
  ReasonerRequest
} from "./reasonerFilter";
export {
  RULE_ORDER,
  DEFAULT_RULE_MESSAGES,
  createFeasibilityRules,
  evaluateFeasibility
} from "./rules";
export { createFeasibilityFilter } from "./filterFactory";
export type { FilterFactoryOptions } from "./filterFactory";
export type {
  FeasibilityFilter,
  FeasibilityRule,
  FeasibilityRuleId,
  FilterOutcome,
  RuleMessages,
  RuleVerdict
} from "./types";
