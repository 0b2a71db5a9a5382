/**
 * docpress public API
 */

export * from "./types";

// Document model
export { Document } from "./document/tree";
export {
  DIAGNOSTICS_TITLE,
  paragraph,
  title,
  section,
  sectionTitle,
  findSectionsByTitle,
  systemMessage,
} from "./document/nodes";

// Settings
export { Settings, normalizeOptionName } from "./settings/settings";
export { SettingsRegistry, CORE_OPTIONS, defaultRegistry } from "./settings/registry";
export { optionTypes, parseOptionValue, describeOptionType, formatSettingValue } from "./settings/option-types";
export {
  resolveSettings,
  configSearchPath,
  standardConfigPaths,
  sourceConfigPath,
  getUserConfigPath,
  CONFIG_FILENAME,
  SYSTEM_CONFIG_PATH,
  type ResolveOptions,
  type ResolveResult,
  type InvalidValuePolicy,
} from "./settings/resolver";

// Transforms, readers and writers
export * from "./transforms";
export * from "./readers";
export * from "./writers";

// Pipeline
export * from "./modules";

// Errors and utilities
export {
  ConfigError,
  HaltError,
  TransformCondition,
  VisitorCondition,
  condition,
  isCondition,
  formatDiagnostic,
  severityLabel,
  clampSeverity,
  MIN_SEVERITY,
  MAX_SEVERITY,
} from "./utils/conditions";
export { OrderCounter, processCounter } from "./utils/order-counter";
export { IdGenerator } from "./utils/id-generator";
export { Logger, logger, type LogLevel } from "./utils/logger";
export { Tracker } from "./utils/tracker";
