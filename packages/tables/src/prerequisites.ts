import {
  ValidationError,
  type LearningObject,
  type PrerequisiteEdge
} from "@ctxpath/core";
import { parseCsvTable, readCell } from "./csv";

const FROM_COLUMNS = ["from_id", "src"] as const;
const TO_COLUMNS = ["to_id", "dst"] as const;

export const parsePrerequisitesCsv = (text: string): PrerequisiteEdge[] => {
  const { fields, rows } = parseCsvTable(text, "prerequisite");
  const hasColumns = (columns: readonly string[]) =>
    columns.some(column => fields.includes(column));
  if (!hasColumns(FROM_COLUMNS) || !hasColumns(TO_COLUMNS)) {
    throw new ValidationError(
      "Prerequisite CSV must contain columns from_id,to_id (or src,dst)"
    );
  }

  const issues: string[] = [];
  const edges: PrerequisiteEdge[] = [];
  rows.forEach((row, index) => {
    const fromId = readCell(row, FROM_COLUMNS);
    const toId = readCell(row, TO_COLUMNS);
    if (!fromId || !toId) {
      issues.push(`line ${index + 2}: both endpoints are required`);
      return;
    }
    edges.push({ fromId, toId });
  });

  if (issues.length > 0) {
    throw new ValidationError("Invalid prerequisite table", issues);
  }
  return edges;
};

// Fallback when no edge table exists: each object requires the one before it.
export const chainPrerequisites = (
  objects: readonly LearningObject[]
): PrerequisiteEdge[] =>
  objects.slice(1).map((object, index) => ({
    fromId: objects[index].id,
    toId: object.id
  }));
