import { z } from "zod";
import type { Catalog } from "../domain/catalog";
import { ReasonerUnavailableError } from "../domain/errors";
import type { ExclusionRecord, LearningObject, UserContext } from "../domain/models";
import { formatIssues } from "../domain/schemas";
import { silentLogger, type Logger } from "../logging/logger";
import type { FeasibilityFilter, FilterOutcome } from "./types";

export interface ReasonerRequest {
  objects: readonly LearningObject[];
  context: UserContext;
}

/**
 * Synchronous client of an external rule/ontology reasoner. The reply is
 * validated before use, so it is typed as unknown here.
 */
export interface ReasonerClient {
  name: string;
  evaluate(request: ReasonerRequest): unknown;
}

export const ReasonerVerdictSchema = z.object({
  feasible: z.array(z.string()),
  infeasible: z.array(
    z.object({
      lo_id: z.string(),
      reason: z.string().min(1)
    })
  )
});

export interface ReasonerFilterOptions {
  client: ReasonerClient;
  timeoutMs: number;
  fallback?: FeasibilityFilter;
  logger?: Logger;
  now?: () => number;
}

export class ReasonerFilter implements FeasibilityFilter {
  public readonly id = "reasoner";
  public readonly title: string;

  private readonly client: ReasonerClient;
  private readonly timeoutMs: number;
  private readonly fallback?: FeasibilityFilter;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ReasonerFilterOptions) {
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
    this.fallback = options.fallback;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.title = `External reasoner (${options.client.name})`;
  }

  public filter(catalog: Catalog, context: UserContext): FilterOutcome {
    try {
      return this.consult(catalog, context);
    } catch (error) {
      const failure =
        error instanceof ReasonerUnavailableError
          ? error
          : new ReasonerUnavailableError(this.client.name, describe(error), {
              cause: error
            });
      if (!this.fallback) {
        throw failure;
      }
      this.logger.warn("Reasoner failed, falling back", {
        reasoner: this.client.name,
        fallback: this.fallback.id,
        error: failure.message
      });
      return this.fallback.filter(catalog, context);
    }
  }

  private consult(catalog: Catalog, context: UserContext): FilterOutcome {
    const startedAt = this.now();
    const reply = this.client.evaluate({ objects: catalog.objects, context });
    const elapsed = this.now() - startedAt;
    if (elapsed > this.timeoutMs) {
      throw new ReasonerUnavailableError(
        this.client.name,
        `answered in ${elapsed.toFixed(1)}ms, over the ${this.timeoutMs}ms limit`
      );
    }

    const parsed = ReasonerVerdictSchema.safeParse(reply);
    if (!parsed.success) {
      throw new ReasonerUnavailableError(
        this.client.name,
        `malformed reply (${formatIssues(parsed.error).join("; ")})`
      );
    }
    return this.normalize(catalog, parsed.data);
  }

  // Re-orders the verdict by catalog order and checks it covers every object once.
  private normalize(
    catalog: Catalog,
    verdict: z.output<typeof ReasonerVerdictSchema>
  ): FilterOutcome {
    const reasons = new Map<string, string>();
    const accepted = new Set<string>();
    const problems: string[] = [];

    verdict.feasible.forEach(id => {
      if (accepted.has(id)) {
        problems.push(`"${id}" listed twice`);
      }
      accepted.add(id);
    });
    verdict.infeasible.forEach(entry => {
      if (accepted.has(entry.lo_id) || reasons.has(entry.lo_id)) {
        problems.push(`"${entry.lo_id}" listed twice`);
      }
      reasons.set(entry.lo_id, entry.reason);
    });
    [...accepted, ...reasons.keys()].forEach(id => {
      if (!catalog.has(id)) {
        problems.push(`unknown learning object "${id}"`);
      }
    });

    const feasible = new Set<string>();
    const infeasible: ExclusionRecord[] = [];
    catalog.objects.forEach(object => {
      const reason = reasons.get(object.id);
      if (reason !== undefined) {
        infeasible.push({ loId: object.id, reason });
      } else if (accepted.has(object.id)) {
        feasible.add(object.id);
      } else {
        problems.push(`no verdict for "${object.id}"`);
      }
    });

    if (problems.length > 0) {
      throw new ReasonerUnavailableError(
        this.client.name,
        `inconsistent reply (${problems.join("; ")})`
      );
    }
    return { feasible, infeasible };
  }
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
