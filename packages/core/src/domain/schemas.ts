import { z } from "zod";
import { ValidationError } from "./errors";

export const BandwidthClassSchema = z.enum(["low", "medium", "high"]);

export const LearningObjectSchema = z
  .object({
    id: z.string().trim().min(1),
    kind: z.enum(["question", "lecture"]),
    durationMin: z.number().finite().positive(),
    requiredMastery: z.number().min(0).max(1),
    requiredLanguage: z.string().trim().min(1),
    deviceCompat: z.array(z.string().trim().min(1)),
    mediaBandwidthClass: BandwidthClassSchema,
    accuracyStat: z.number().min(0).max(1)
  })
  .strict();

export const PrerequisiteEdgeSchema = z
  .object({
    fromId: z.string().trim().min(1),
    toId: z.string().trim().min(1)
  })
  .strict();

export const UserContextSchema = z
  .object({
    userId: z.string().min(1),
    language: z.string().trim().min(1),
    device: z.string().trim().min(1),
    bandwidth: BandwidthClassSchema,
    masteryLevel: z.number().min(0).max(1),
    timeBudgetMin: z.number().finite().positive()
  })
  .strict();

// JSON record as produced by the ingestion side.
export const UserContextRecordSchema = z
  .object({
    user_id: z.union([z.string().min(1), z.number()]),
    language: z.string().trim().min(1),
    device: z.string().trim().min(1),
    bandwidth: BandwidthClassSchema,
    mastery_level: z.number().min(0).max(1),
    time_budget_min: z.number().finite().positive()
  })
  .transform(record => ({
    userId: String(record.user_id),
    language: record.language,
    device: record.device,
    bandwidth: record.bandwidth,
    masteryLevel: record.mastery_level,
    timeBudgetMin: record.time_budget_min
  }));

export type UserContextRecord = z.input<typeof UserContextRecordSchema>;

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });

export const parseWith = <S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
};
