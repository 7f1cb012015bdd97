import Papa from "papaparse";
import { ValidationError } from "@ctxpath/core";

export type CsvRecord = Record<string, string | undefined>;

export interface ParsedTable {
  fields: string[];
  rows: CsvRecord[];
}

export const parseCsvTable = (text: string, label: string): ParsedTable => {
  const parsed = Papa.parse<CsvRecord>(text.trim(), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: header => header.trim().toLowerCase(),
    transform: value => value.trim()
  });
  if (parsed.errors.length > 0) {
    throw new ValidationError(
      `Unreadable ${label} CSV`,
      parsed.errors.map(error =>
        error.row !== undefined ? `row ${error.row + 1}: ${error.message}` : error.message
      )
    );
  }
  return { fields: parsed.meta.fields ?? [], rows: parsed.data };
};

// First non-empty cell among the column and its aliases.
export const readCell = (
  row: CsvRecord,
  columns: readonly string[]
): string | undefined => {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
};

export const toNumber = (value?: string): number | undefined => {
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
};
