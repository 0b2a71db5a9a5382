/**
 * Central type exports
 */

// Document
export type {
  NodeId,
  NodeKind,
  AttributeValue,
  Attributes,
  NodeRecord,
} from "./document";
export { NODE_KINDS } from "./document";

// Conditions
export type {
  Severity,
  SeverityLabel,
  Condition,
  StructuralWarning,
} from "./conditions";

// Settings
export type {
  ScalarOptionType,
  OptionType,
  ScalarValue,
  SettingValue,
  OptionDefinition,
  InvalidValueAction,
} from "./settings";

// Pipeline
export type {
  Source,
  Destination,
  TransformRunResult,
  PublishResult,
} from "./pipeline";

// Run tracking
export type {
  Issue,
  IssueType,
  ConfigIssue,
  ReadIssue,
  HaltIssue,
  WriteIssue,
  RunStats,
} from "./run";
