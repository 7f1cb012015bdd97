import type { Catalog } from "../domain/catalog";
import { PlanningError } from "../domain/errors";
import { UserContextRecordSchema, parseWith } from "../domain/schemas";
import { createLogger, type Logger } from "../logging/logger";
import { ContextPathPlanner, type PathPlannerOptions } from "../planner/pathPlanner";
import {
  serializePathTrace,
  toFailureRecord,
  type PathTraceRecord
} from "../trace/pathTraceRecord";

/**
 * JSON boundary around the planner: takes the user-context record as the
 * ingestion side produces it and returns the path trace record.
 */
export class PlanningService {
  private readonly planner: ContextPathPlanner;
  private readonly logger: Logger;

  constructor(catalog: Catalog, options: PathPlannerOptions = {}) {
    this.logger = options.logger ?? createLogger("service");
    this.planner = new ContextPathPlanner(catalog, { ...options, logger: this.logger });
  }

  public getPlanner(): ContextPathPlanner {
    return this.planner;
  }

  public planForRecord(record: unknown): PathTraceRecord {
    try {
      const context = parseWith(UserContextRecordSchema, record, "user context record");
      const trace = serializePathTrace(this.planner.plan(context));
      this.logger.info("Path planned", {
        userId: trace.user_id,
        steps: trace.primary_path.length,
        excluded: trace.excluded_los.length,
        runtimeMs: trace.runtime_ms,
        realTimeCompliant: trace.real_time_compliant,
        withinTimeBudget: trace.within_time_budget
      });
      if (!trace.real_time_compliant) {
        this.logger.warn("Latency bound exceeded", {
          userId: trace.user_id,
          runtimeMs: trace.runtime_ms,
          latencyBoundMs: trace.latency_bound_ms
        });
      }
      return trace;
    } catch (error) {
      if (error instanceof PlanningError) {
        this.logger.warn("Planning failed", { ...toFailureRecord(error) });
      }
      throw error;
    }
  }
}
