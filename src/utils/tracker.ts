/**
 * Run Tracker
 * Unified tracking for publish stats and issues
 */

import { ZodError } from "zod";
import { ConfigError, HaltError, VisitorCondition, severityLabel } from "./conditions";
import type {
  Condition,
  Issue,
  IssueType,
  ReadIssue,
  RunStats,
  StructuralWarning,
  WriteIssue,
} from "../types";

type IssueOfType<T extends IssueType> = Extract<Issue, { type: T }>;

// ============================================================================
// Error Mapping (private)
// ============================================================================

function describe(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => issue.message).join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

function mapReadError(path: string, error: unknown): ReadIssue {
  const notFound = error instanceof Error && "code" in error && error.code === "ENOENT";
  return {
    type: "read",
    path,
    reason: notFound ? "not-found" : "read-error",
    details: describe(error),
  };
}

function mapWriteError(path: string, error: unknown): WriteIssue {
  return {
    type: "write",
    path,
    reason: error instanceof VisitorCondition ? "visitor-error" : "write-error",
    details: describe(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalSources = 0;
  private publishedSources = 0;
  private haltedSources = 0;
  private failedSources = 0;
  private conditionCounts = new Map<string, number>();
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalSources(count: number): void {
    this.totalSources = count;
  }

  incrementPublished(): void {
    this.publishedSources++;
  }

  trackConditions(conditions: readonly Condition[]): void {
    for (const { severity } of conditions) {
      const label = severityLabel(severity);
      this.conditionCounts.set(label, (this.conditionCounts.get(label) ?? 0) + 1);
    }
  }

  trackWarnings(warnings: readonly StructuralWarning[]): void {
    for (const warning of warnings) {
      this.issues.push({
        type: "config",
        path: warning.path ?? "<unknown>",
        // Only unreadable files are reported without a line
        reason: warning.line === undefined ? "read-error" : "malformed-line",
        details: warning.line !== undefined ? `line ${warning.line}: ${warning.message}` : warning.message,
      });
    }
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Record the failure of one source. Invalid configuration values and
   * halts are recorded with their own issue types; "read" covers
   * everything before the output is delivered.
   */
  trackError(path: string, error: unknown, stage: "read" | "write"): void {
    if (error instanceof HaltError) {
      this.haltedSources++;
      this.issues.push({
        type: "halt",
        path,
        severity: error.condition.severity,
        transform: error.transform,
        details: error.condition.message,
      });
      return;
    }

    this.failedSources++;

    if (error instanceof ConfigError) {
      this.issues.push({
        type: "config",
        path: error.details.path ?? path,
        reason: "invalid-value",
        details: error.message,
      });
      return;
    }

    const writing = stage === "write" || error instanceof VisitorCondition;
    this.issues.push(writing ? mapWriteError(path, error) : mapReadError(path, error));
  }

  /**
   * Invalid configuration values replaced by their defaults
   */
  trackConfigErrors(errors: readonly ConfigError[]): void {
    for (const error of errors) {
      this.issues.push({
        type: "config",
        path: error.details.path ?? "<unknown>",
        reason: "invalid-value",
        details: error.message,
      });
    }
  }

  trackVisitorErrors(path: string, errors: readonly VisitorCondition[]): void {
    for (const error of errors) {
      this.issues.push(mapWriteError(path, error));
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): IssueOfType<T>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((issue) => issue.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalSources: this.totalSources,
      publishedSources: this.publishedSources,
      haltedSources: this.haltedSources,
      failedSources: this.failedSources,
      conditions: Object.fromEntries(this.conditionCounts),
      issues: this.issues,
      duration,
    };
  }

  hasFailures(): boolean {
    return this.haltedSources > 0 || this.failedSources > 0;
  }
}
