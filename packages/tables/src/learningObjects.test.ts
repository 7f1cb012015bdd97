import { describe, expect, it } from "vitest";
import { ValidationError } from "@ctxpath/core";
import { parseLearningObjectsCsv } from "./learningObjects";

describe("parseLearningObjectsCsv", () => {
  it("reads the canonical columns", () => {
    const csv = [
      "lo_id,kind,duration_min,required_mastery,required_language,device_compat,media_bandwidth_class,accuracy_stat",
      "Q_1,question,3,0.2,en,mobile|desktop,low,0.9",
      "L_2,lecture,12,0,fr, desktop ,high,0.8"
    ].join("\n");

    expect(parseLearningObjectsCsv(csv)).toEqual([
      {
        id: "Q_1",
        kind: "question",
        durationMin: 3,
        requiredMastery: 0.2,
        requiredLanguage: "en",
        deviceCompat: ["mobile", "desktop"],
        mediaBandwidthClass: "low",
        accuracyStat: 0.9
      },
      {
        id: "L_2",
        kind: "lecture",
        durationMin: 12,
        requiredMastery: 0,
        requiredLanguage: "fr",
        deviceCompat: ["desktop"],
        mediaBandwidthClass: "high",
        accuracyStat: 0.8
      }
    ]);
  });

  it("accepts the statistics-export aliases and fills optional columns", () => {
    const csv = [
      "ID,Type,Duration_Min,Requires_Mastery,Device_Compat,Media_Bandwidth_Class,Pedagogical_Weight",
      "Q_9,question,5,,tablet,medium,0.6"
    ].join("\n");

    expect(parseLearningObjectsCsv(csv)).toEqual([
      {
        id: "Q_9",
        kind: "question",
        durationMin: 5,
        requiredMastery: 0,
        requiredLanguage: "any",
        deviceCompat: ["tablet"],
        mediaBandwidthClass: "medium",
        accuracyStat: 0.6
      }
    ]);
  });

  it("reports bad rows by line", () => {
    const csv = [
      "lo_id,kind,duration_min,required_mastery,required_language,device_compat,media_bandwidth_class,accuracy_stat",
      "Q_1,question,3,0,en,mobile,low,0.9",
      "Q_2,question,soon,0,en,mobile,low,0.9"
    ].join("\n");

    let caught: unknown;
    try {
      parseLearningObjectsCsv(csv);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.issues).toEqual(["line 3: durationMin: Required"]);
    }
  });
});
