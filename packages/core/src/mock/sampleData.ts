import type { LearningObject, PrerequisiteEdge, UserContext } from "../domain/models";

const learningObject = (
  id: string,
  overrides: Partial<LearningObject> = {}
): LearningObject => ({
  id,
  kind: "question",
  durationMin: 5,
  requiredMastery: 0,
  requiredLanguage: "en",
  deviceCompat: ["mobile", "desktop"],
  mediaBandwidthClass: "low",
  accuracyStat: 1,
  ...overrides
});

export const sampleObject = learningObject;

// Q_17 -> Q_44 -> Q_88 stays feasible for a low-bandwidth learner at 0.65
// mastery; the video lecture L_55 and the advanced Q_210 drop out.
export const scenarioObjects: LearningObject[] = [
  learningObject("Q_17", { durationMin: 3, accuracyStat: 0.9 }),
  learningObject("Q_44", { durationMin: 4, accuracyStat: 0.75 }),
  learningObject("L_55", {
    kind: "lecture",
    durationMin: 12,
    mediaBandwidthClass: "high",
    accuracyStat: 0.8
  }),
  learningObject("Q_88", { durationMin: 6, accuracyStat: 0.5, requiredMastery: 0.6 }),
  learningObject("Q_210", { durationMin: 8, accuracyStat: 0.4, requiredMastery: 0.8 })
];

export const scenarioEdges: PrerequisiteEdge[] = [
  { fromId: "Q_17", toId: "Q_44" },
  { fromId: "Q_17", toId: "L_55" },
  { fromId: "Q_44", toId: "Q_88" },
  { fromId: "L_55", toId: "Q_88" },
  { fromId: "Q_88", toId: "Q_210" }
];

export const scenarioContext: UserContext = {
  userId: "learner-1",
  language: "en",
  device: "mobile",
  bandwidth: "low",
  masteryLevel: 0.65,
  timeBudgetMin: 60
};

// A fans out to B, C and E, which all lead to D.
//   A->B->D costs 6 (7 min), A->C->D 7 (8 min), A->E->D 7.5 (6 min)
// with the default weights.
export const diamondObjects: LearningObject[] = [
  learningObject("A", { durationMin: 1 }),
  learningObject("B", { durationMin: 2 }),
  learningObject("C", { durationMin: 3 }),
  learningObject("D", { durationMin: 4 }),
  learningObject("E", { durationMin: 1, accuracyStat: 0.5 })
];

export const diamondEdges: PrerequisiteEdge[] = [
  { fromId: "A", toId: "B" },
  { fromId: "A", toId: "C" },
  { fromId: "A", toId: "E" },
  { fromId: "B", toId: "D" },
  { fromId: "C", toId: "D" },
  { fromId: "E", toId: "D" }
];

export const diamondContext: UserContext = {
  userId: "learner-2",
  language: "en",
  device: "desktop",
  bandwidth: "high",
  masteryLevel: 1,
  timeBudgetMin: 60
};
