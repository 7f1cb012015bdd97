export { assemblePathResult } from "./traceGenerator";
export type { AssembleInput } from "./traceGenerator";
export { serializePathTrace, toFailureRecord } from "./pathTraceRecord";
export type {
  ExcludedLoRecord,
  PathFailureRecord,
  PathTraceRecord
} from "./pathTraceRecord";
