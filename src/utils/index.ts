/**
 * Utility exports
 */

// Conditions and errors
export {
  ConfigError,
  HaltError,
  TransformCondition,
  VisitorCondition,
  condition,
  formatDiagnostic,
  severityLabel,
} from "./conditions";

// Identifiers and ordering
export { IdGenerator } from "./id-generator";
export { OrderCounter, processCounter } from "./order-counter";

// String utilities
export { generateSlug, filenameToTitle, normalizeNewlines } from "./string";

// Logging and tracking
export { Logger, logger, type LogLevel } from "./logger";
export { Tracker } from "./tracker";
