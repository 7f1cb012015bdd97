import { createCatalog, type Catalog } from "@ctxpath/core";
import { parseLearningObjectsCsv } from "./learningObjects";
import { chainPrerequisites, parsePrerequisitesCsv } from "./prerequisites";

export interface CatalogTables {
  learningObjectsCsv: string;
  // Without an edge table the objects are chained in table order.
  prerequisitesCsv?: string;
}

export const loadCatalogFromCsv = (tables: CatalogTables): Catalog => {
  const objects = parseLearningObjectsCsv(tables.learningObjectsCsv);
  const edges =
    tables.prerequisitesCsv !== undefined
      ? parsePrerequisitesCsv(tables.prerequisitesCsv)
      : chainPrerequisites(objects);
  return createCatalog({ objects, edges });
};
