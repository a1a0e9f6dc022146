// Concurrency
export { Semaphore } from "./concurrency.js";
// Config
export type { ImportCommandOptions, ImportConfig } from "./config.js";
export { DEFAULT_IMPORT_CONFIG, resolveImportConfig } from "./config.js";
// Import engine
export { ImportEngine } from "./engine.js";
// Errors
export {
  ConfigurationError,
  errorMessage,
  FatalImportError,
  ImportError,
  MalformedMboxError,
  UndecodableMessageError,
} from "./errors.js";
// Labels
export {
  joinLabelPath,
  LABEL_SEPARATOR,
  labelAncestors,
  sanitizeLabelComponent,
  stripMboxSuffix,
} from "./labels.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Outcome log
export { createOutcomeLog, JsonlOutcomeLog } from "./output.js";
// Rate limiter
export { createRateLimiter, TokenBucketRateLimiter } from "./rate-limiter.js";
// Resume tracking
export { ResumeTracker } from "./resume.js";
// Retry timing
export { backoffDelay, DEFAULT_RETRY_POLICY, sleep } from "./retry.js";
// Run state
export { RunState } from "./state.js";
// Types
export type {
  ImportEngineConfig,
  ImportOutcome,
  ImportTarget,
  InsertAdapter,
  InsertResult,
  Logger,
  NormalizedMessage,
  OutcomeSink,
  RateLimiter,
  RateLimiterConfig,
  RawMessage,
  RetryPolicy,
  RunCounters,
  RunSummary,
  SourceItem,
} from "./types.js";
