import {
  LearningObjectSchema,
  ValidationError,
  formatIssues,
  type LearningObject
} from "@ctxpath/core";
import { parseCsvTable, readCell, toNumber, type CsvRecord } from "./csv";

// Column names, followed by the names the upstream statistics export uses.
const COLUMNS = {
  id: ["lo_id", "id"],
  kind: ["kind", "type"],
  durationMin: ["duration_min"],
  requiredMastery: ["required_mastery", "requires_mastery"],
  requiredLanguage: ["required_language", "language"],
  deviceCompat: ["device_compat"],
  mediaBandwidthClass: ["media_bandwidth_class"],
  accuracyStat: ["accuracy_stat", "pedagogical_weight"]
} as const;

export const DEVICE_SEPARATOR = "|";

const splitDevices = (value?: string): string[] | undefined =>
  value
    ?.split(DEVICE_SEPARATOR)
    .map(device => device.trim())
    .filter(device => device.length > 0);

const toLearningObjectDraft = (row: CsvRecord) => ({
  id: readCell(row, COLUMNS.id),
  kind: readCell(row, COLUMNS.kind),
  durationMin: toNumber(readCell(row, COLUMNS.durationMin)),
  requiredMastery: toNumber(readCell(row, COLUMNS.requiredMastery)) ?? 0,
  requiredLanguage: readCell(row, COLUMNS.requiredLanguage) ?? "any",
  deviceCompat: splitDevices(readCell(row, COLUMNS.deviceCompat)),
  mediaBandwidthClass: readCell(row, COLUMNS.mediaBandwidthClass),
  accuracyStat: toNumber(readCell(row, COLUMNS.accuracyStat))
});

export const parseLearningObjectsCsv = (text: string): LearningObject[] => {
  const { rows } = parseCsvTable(text, "learning object");
  const objects: LearningObject[] = [];
  const issues: string[] = [];

  rows.forEach((row, index) => {
    const result = LearningObjectSchema.safeParse(toLearningObjectDraft(row));
    if (result.success) {
      objects.push(result.data);
    } else {
      // +2: header line plus 1-based numbering
      formatIssues(result.error).forEach(issue => issues.push(`line ${index + 2}: ${issue}`));
    }
  });

  if (issues.length > 0) {
    throw new ValidationError("Invalid learning object table", issues);
  }
  return objects;
};
