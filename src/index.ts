export * from "./youtube/index.js";
export { AnalysisService } from "./analysis/service.js";
export type { AnalysisResult, AnalyzeOptions, AnalysisServiceDeps } from "./analysis/service.js";
export { AnalysisStore } from "./analysis/store.js";
export { analysisVerdictSchema } from "./analysis/types.js";
export type { AnalysisRecord, AnalysisVerdict, TranscriptAnalyzer } from "./analysis/types.js";
export { openDatabase, closeDatabase } from "./db/connection.js";
export type { Db } from "./db/connection.js";
export { loadConfig, parseLanguageList } from "./lib/env.js";
export type { PipelineConfig } from "./lib/env.js";
export {
  AnalysisError,
  InvalidReferenceError,
  StorageError,
  TranscriptAcquisitionError,
  TranscriptError,
  isTerminalFailure,
} from "./lib/errors.js";
export type { TierAttempt, TierName, TranscriptErrorCode } from "./lib/errors.js";
export { logger } from "./lib/logger.js";
