import { describe, expect, it } from "vitest";
import { ValidationError, type LearningObject } from "@ctxpath/core";
import { chainPrerequisites, parsePrerequisitesCsv } from "./prerequisites";

describe("parsePrerequisitesCsv", () => {
  it("reads from_id,to_id rows", () => {
    expect(parsePrerequisitesCsv("from_id,to_id\nA,B\nB,C\n")).toEqual([
      { fromId: "A", toId: "B" },
      { fromId: "B", toId: "C" }
    ]);
  });

  it("accepts src,dst headers", () => {
    expect(parsePrerequisitesCsv("src,dst\nA,B")).toEqual([{ fromId: "A", toId: "B" }]);
  });

  it("requires both endpoint columns", () => {
    expect(() => parsePrerequisitesCsv("from_id,target\nA,B")).toThrow(
      "Prerequisite CSV must contain columns from_id,to_id (or src,dst)"
    );
  });

  it("flags rows with a missing endpoint", () => {
    let caught: unknown;
    try {
      parsePrerequisitesCsv("from_id,to_id\nA,B\nB,\n");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.issues).toEqual(["line 3: both endpoints are required"]);
    }
  });
});

const sampleObject = (id: string): LearningObject => ({
  id,
  kind: "question",
  durationMin: 5,
  requiredMastery: 0,
  requiredLanguage: "en",
  deviceCompat: ["desktop"],
  mediaBandwidthClass: "low",
  accuracyStat: 1
});

describe("chainPrerequisites", () => {
  it("links each object to the one after it", () => {
    const objects = ["A", "B", "C"].map(id => sampleObject(id));

    expect(chainPrerequisites(objects)).toEqual([
      { fromId: "A", toId: "B" },
      { fromId: "B", toId: "C" }
    ]);
  });

  it("yields no edges for a single object", () => {
    expect(chainPrerequisites([sampleObject("A")])).toEqual([]);
  });
});
