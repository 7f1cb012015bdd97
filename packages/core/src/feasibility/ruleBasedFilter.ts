import type { Catalog } from "../domain/catalog";
import type { ExclusionRecord, UserContext } from "../domain/models";
import { createFeasibilityRules, evaluateFeasibility } from "./rules";
import type {
  FeasibilityFilter,
  FeasibilityRule,
  FilterOutcome,
  RuleMessages
} from "./types";

export interface RuleBasedFilterOptions {
  messages?: Partial<RuleMessages>;
}

export class RuleBasedFilter implements FeasibilityFilter {
  public readonly id = "rules";
  public readonly title = "Ordered context rules";

  private readonly rules: readonly FeasibilityRule[];

  constructor(options: RuleBasedFilterOptions = {}) {
    this.rules = createFeasibilityRules(options.messages);
  }

  public getRules(): readonly FeasibilityRule[] {
    return this.rules;
  }

  public filter(catalog: Catalog, context: UserContext): FilterOutcome {
    const feasible = new Set<string>();
    const infeasible: ExclusionRecord[] = [];

    catalog.objects.forEach(object => {
      const verdict = evaluateFeasibility(object, context, this.rules);
      if (verdict.pass) {
        feasible.add(object.id);
      } else {
        infeasible.push({ loId: object.id, reason: verdict.reason });
      }
    });

    return { feasible, infeasible };
  }
}
