export { parseCsvTable, readCell, toNumber } from "./csv";
export type { CsvRecord, ParsedTable } from "./csv";
export { parseLearningObjectsCsv, DEVICE_SEPARATOR } from "./learningObjects";
export { parsePrerequisitesCsv, chainPrerequisites } from "./prerequisites";
export { parseUserContextJson } from "./userContext";
export { parsePlannerConstantsCsv } from "./plannerConstants";
export { loadCatalogFromCsv } from "./dataset";
export type { CatalogTables } from "./dataset";
