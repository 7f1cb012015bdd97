import type { ExclusionRecord } from "./models";

export type PlanningErrorCode =
  | "VALIDATION"
  | "GRAPH_INTEGRITY"
  | "PATH_NOT_FOUND"
  | "REASONER_UNAVAILABLE";

export class PlanningError extends Error {
  public readonly code: PlanningErrorCode;

  constructor(code: PlanningErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PlanningError";
    this.code = code;
  }
}

export class ValidationError extends PlanningError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super("VALIDATION", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class GraphIntegrityError extends PlanningError {
  public readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super("GRAPH_INTEGRITY", `Prerequisite cycle detected: ${cycle.join(" -> ")}`);
    this.name = "GraphIntegrityError";
    this.cycle = cycle;
  }
}

export class PathNotFoundError extends PlanningError {
  public readonly excluded: readonly ExclusionRecord[];

  constructor(excluded: readonly ExclusionRecord[]) {
    super(
      "PATH_NOT_FOUND",
      `No feasible learning object reaches GOAL (${excluded.length} excluded)`
    );
    this.name = "PathNotFoundError";
    this.excluded = excluded;
  }
}

export class ReasonerUnavailableError extends PlanningError {
  public readonly reasoner: string;

  constructor(reasoner: string, message: string, options?: { cause?: unknown }) {
    super("REASONER_UNAVAILABLE", `Reasoner "${reasoner}" unavailable: ${message}`, options);
    this.name = "ReasonerUnavailableError";
    this.reasoner = reasoner;
  }
}
