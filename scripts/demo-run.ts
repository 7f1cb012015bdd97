import { readFileSync } from "node:fs";
import {
  PlanningError,
  PlanningService,
  createLogger,
  toFailureRecord
} from "@ctxpath/core";
import {
  loadCatalogFromCsv,
  parsePlannerConstantsCsv
} from "@ctxpath/tables";

const readData = (name: string): string =>
  readFileSync(new URL(`./data/${name}`, import.meta.url), "utf-8");

const logger = createLogger("demo", "info");

const catalog = loadCatalogFromCsv({
  learningObjectsCsv: readData("learning_objects.csv"),
  prerequisitesCsv: readData("prerequisites.csv")
});
const config = parsePlannerConstantsCsv(readData("planner_constants.csv"));
logger.info("Loaded catalog", {
  objects: catalog.size,
  edges: catalog.edges.length
});

const service = new PlanningService(catalog, { config, logger });
const record: unknown = JSON.parse(readData("user_context.json"));

try {
  console.log(JSON.stringify(service.planForRecord(record), null, 2));
} catch (error) {
  if (!(error instanceof PlanningError)) {
    throw error;
  }
  console.log(JSON.stringify(toFailureRecord(error), null, 2));
  process.exitCode = 1;
}
