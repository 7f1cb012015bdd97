import type { Catalog } from "../domain/catalog";
import type { ExclusionRecord, LearningObject, UserContext } from "../domain/models";

export type RuleVerdict = { pass: true } | { pass: false; reason: string };

export type FeasibilityRuleId = "language" | "device" | "bandwidth" | "mastery";

export interface FeasibilityRule {
  id: FeasibilityRuleId;
  evaluate(object: LearningObject, context: UserContext): RuleVerdict;
}

export type RuleMessages = Record<
  FeasibilityRuleId,
  (object: LearningObject, context: UserContext) => string
>;

export interface FilterOutcome {
  feasible: ReadonlySet<string>;
  infeasible: readonly ExclusionRecord[];
}

export interface FeasibilityFilter {
  id: string;
  title: string;
  filter(catalog: Catalog, context: UserContext): FilterOutcome;
}
