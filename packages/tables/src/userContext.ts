import {
  UserContextRecordSchema,
  ValidationError,
  parseWith,
  type UserContext
} from "@ctxpath/core";

export const parseUserContextJson = (text: string): UserContext => {
  let record: unknown;
  try {
    record = JSON.parse(text);
  } catch (error) {
    throw new ValidationError("User context is not valid JSON", [
      error instanceof Error ? error.message : String(error)
    ]);
  }
  return parseWith(UserContextRecordSchema, record, "user context record");
};
