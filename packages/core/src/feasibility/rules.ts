import { ANY_LANGUAGE, BANDWIDTH_RANK } from "../constants";
import type { LearningObject, UserContext } from "../domain/models";
import type {
  FeasibilityRule,
  FeasibilityRuleId,
  RuleMessages,
  RuleVerdict
} from "./types";

export const RULE_ORDER: readonly FeasibilityRuleId[] = [
  "language",
  "device",
  "bandwidth",
  "mastery"
];

export const DEFAULT_RULE_MESSAGES: RuleMessages = {
  language: () => "language mismatch",
  device: () => "device incompatible",
  bandwidth: () => "insufficient bandwidth for media",
  mastery: (object, context) =>
    `requires mastery ${object.requiredMastery.toFixed(2)} > user mastery ${context.masteryLevel.toFixed(2)}`
};

const PASS: RuleVerdict = { pass: true };

const checks: Record<
  FeasibilityRuleId,
  (object: LearningObject, context: UserContext) => boolean
> = {
  language: (object, context) =>
    object.requiredLanguage === ANY_LANGUAGE ||
    object.requiredLanguage === context.language,
  device: (object, context) => object.deviceCompat.includes(context.device),
  bandwidth: (object, context) =>
    BANDWIDTH_RANK[object.mediaBandwidthClass] <= BANDWIDTH_RANK[context.bandwidth],
  mastery: (object, context) => context.masteryLevel >= object.requiredMastery
};

export const createFeasibilityRules = (
  messages: Partial<RuleMessages> = {}
): readonly FeasibilityRule[] =>
  RULE_ORDER.map(id => {
    const message = messages[id] ?? DEFAULT_RULE_MESSAGES[id];
    const check = checks[id];
    return {
      id,
      evaluate: (object: LearningObject, context: UserContext): RuleVerdict =>
        check(object, context) ? PASS : { pass: false, reason: message(object, context) }
    };
  });

export const evaluateFeasibility = (
  object: LearningObject,
  context: UserContext,
  rules: readonly FeasibilityRule[]
): RuleVerdict => {
  for (const rule of rules) {
    const verdict = rule.evaluate(object, context);
    if (!verdict.pass) {
      return verdict;
    }
  }
  return PASS;
};
