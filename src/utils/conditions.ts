/**
 * Conditions and Errors
 * Shared severity scale and error classes for transforms, writers and settings
 */

import type {
  Condition,
  NodeId,
  NodeKind,
  Severity,
  SeverityLabel,
} from "../types";

// ============================================================================
// Severity
// ============================================================================

export const MIN_SEVERITY = 0;
export const MAX_SEVERITY = 10;

const SEVERITY_BANDS: Array<{ from: Severity; label: SeverityLabel }> = [
  { from: 10, label: "FATAL" },
  { from: 8, label: "SEVERE" },
  { from: 6, label: "ERROR" },
  { from: 4, label: "WARNING" },
  { from: 2, label: "INFO" },
  { from: 0, label: "DEBUG" },
];

export function clampSeverity(severity: Severity): Severity {
  return Math.min(MAX_SEVERITY, Math.max(MIN_SEVERITY, Math.trunc(severity)));
}

export function severityLabel(severity: Severity): SeverityLabel {
  const level = clampSeverity(severity);
  for (const band of SEVERITY_BANDS) {
    if (level >= band.from) return band.label;
  }
  return "DEBUG";
}

/**
 * Format a condition as a single diagnostics line
 *
 * @example
 * formatDiagnostic({ severity: 5, message: "Duplicate title", line: 3 });
 * // "WARNING [line 3] Duplicate title"
 */
export function formatDiagnostic(condition: Condition): string {
  const label = severityLabel(condition.severity);
  const line = condition.line !== undefined ? ` [line ${condition.line}]` : "";
  return `${label}${line} ${condition.message}`;
}

export function condition(
  severity: Severity,
  message: string,
  options: { line?: number; node?: NodeId } = {},
): Condition {
  return { severity: clampSeverity(severity), message, ...options };
}

export function isCondition(value: unknown): value is Condition {
  return (
    typeof value === "object" &&
    value !== null &&
    "severity" in value &&
    typeof value.severity === "number" &&
    "message" in value &&
    typeof value.message === "string"
  );
}

// ============================================================================
// Error classes
// ============================================================================

/**
 * Thrown by a transform to report a condition to the scheduler
 */
export class TransformCondition extends Error implements Condition {
  readonly severity: Severity;
  readonly line?: number;
  readonly node?: NodeId;

  constructor(
    severity: Severity,
    message: string,
    options: { line?: number; node?: NodeId } = {},
  ) {
    super(message);
    this.name = "TransformCondition";
    this.severity = clampSeverity(severity);
    this.line = options.line;
    this.node = options.node;
  }

  toCondition(): Condition {
    return condition(this.severity, this.message, {
      line: this.line,
      node: this.node,
    });
  }
}

/**
 * Fatal error: a condition reached the run's halt-level
 */
export class HaltError extends Error {
  constructor(
    readonly condition: Condition,
    readonly transform: string,
  ) {
    super(`${transform}: ${formatDiagnostic(condition)}`);
    this.name = "HaltError";
  }
}

/**
 * Invalid configuration value or unreadable configuration source
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly details: {
      path?: string;
      line?: number;
      key?: string;
      value?: string;
    } = {},
  ) {
    const location = details.path
      ? `${details.path}${details.line !== undefined ? `:${details.line}` : ""}: `
      : "";
    super(`${location}${message}`);
    this.name = "ConfigError";
  }
}

/**
 * A visitor failed while a writer was traversing a document
 */
export class VisitorCondition extends Error {
  constructor(
    readonly node: NodeId,
    readonly kind: NodeKind,
    readonly error: unknown,
  ) {
    const reason = error instanceof Error ? error.message : String(error);
    super(`Failed to visit ${kind} node ${node}: ${reason}`);
    this.name = "VisitorCondition";
  }
}
