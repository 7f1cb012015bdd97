import { z } from "zod";
import { ValidationError } from "./errors";
import type { LearningObject, PrerequisiteEdge } from "./models";
import { LearningObjectSchema, PrerequisiteEdgeSchema, parseWith } from "./schemas";

export interface CatalogInput {
  objects: readonly LearningObject[];
  edges: readonly PrerequisiteEdge[];
}

/**
 * Read-only handle over the learning-object table and its prerequisite
 * edges. Shared by any number of planning calls; nothing in the planner
 * writes to it.
 */
export interface Catalog {
  readonly objects: readonly LearningObject[];
  readonly edges: readonly PrerequisiteEdge[];
  readonly size: number;
  get(id: string): LearningObject | undefined;
  has(id: string): boolean;
}

const freezeObject = (object: LearningObject): LearningObject =>
  Object.freeze({
    ...object,
    deviceCompat: Object.freeze([...object.deviceCompat])
  });

export const createCatalog = (input: CatalogInput): Catalog => {
  const objects = parseWith(
    z.array(LearningObjectSchema),
    input.objects,
    "learning objects"
  ).map(freezeObject);
  const edges = parseWith(
    z.array(PrerequisiteEdgeSchema),
    input.edges,
    "prerequisite edges"
  ).map(edge => Object.freeze({ ...edge }));

  const objectById = new Map<string, LearningObject>();
  const issues: string[] = [];
  objects.forEach(object => {
    if (objectById.has(object.id)) {
      issues.push(`duplicate learning object id "${object.id}"`);
      return;
    }
    objectById.set(object.id, object);
  });
  edges.forEach((edge, index) => {
    if (!objectById.has(edge.fromId)) {
      issues.push(`edge ${index} references unknown learning object "${edge.fromId}"`);
    }
    if (!objectById.has(edge.toId)) {
      issues.push(`edge ${index} references unknown learning object "${edge.toId}"`);
    }
  });
  if (issues.length > 0) {
    throw new ValidationError("Invalid catalog", issues);
  }

  return Object.freeze({
    objects: Object.freeze(objects),
    edges: Object.freeze(edges),
    size: objects.length,
    get: (id: string) => objectById.get(id),
    has: (id: string) => objectById.has(id)
  });
};
