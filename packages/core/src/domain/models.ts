export type LearningObjectKind = "question" | "lecture";

export type BandwidthClass = "low" | "medium" | "high";

export interface LearningObject {
  id: string;
  kind: LearningObjectKind;
  durationMin: number;
  requiredMastery: number; // 0-1
  requiredLanguage: string; // language code or "any"
  deviceCompat: readonly string[];
  mediaBandwidthClass: BandwidthClass;
  accuracyStat: number; // historical success rate, 0-1
}

export interface PrerequisiteEdge {
  fromId: string;
  toId: string;
}

export interface UserContext {
  userId: string;
  language: string;
  device: string;
  bandwidth: BandwidthClass;
  masteryLevel: number; // 0-1
  timeBudgetMin: number;
}

export interface ExclusionRecord {
  loId: string;
  reason: string;
}

export interface CostBreakdown {
  duration: number;
  inaccuracy: number;
  total: number;
}

export interface EdgeCostTrace extends CostBreakdown {
  from: string;
  to: string;
}

export interface PathSummary {
  rank: number;
  path: readonly string[];
  cost: number;
  durationMin: number;
  withinTimeBudget: boolean;
}

export interface PathResult {
  readonly userId: string;
  readonly primaryPath: readonly string[];
  readonly totalCost: number;
  readonly totalDurationMin: number;
  readonly timeBudgetMin: number;
  readonly withinTimeBudget: boolean;
  readonly costBreakdown: readonly EdgeCostTrace[];
  readonly excludedLos: readonly ExclusionRecord[];
  readonly alternatePaths: readonly PathSummary[];
  readonly runtimeMs: number;
  readonly latencyBoundMs: number;
  readonly realTimeCompliant: boolean;
}
