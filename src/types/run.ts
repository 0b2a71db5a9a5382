/**
 * Run tracking type definitions
 */

// Discriminated union - each type has its own subset of reasons
export interface ConfigIssue {
  type: "config";
  path: string;
  reason: "invalid-value" | "malformed-line" | "read-error";
  details?: string;
}

export interface ReadIssue {
  type: "read";
  path: string;
  reason: "not-found" | "read-error";
  details?: string;
}

export interface HaltIssue {
  type: "halt";
  path: string;
  severity: number;
  transform: string;
  details: string;
}

export interface WriteIssue {
  type: "write";
  path: string;
  reason: "write-error" | "visitor-error";
  details?: string;
}

export type Issue = ConfigIssue | ReadIssue | HaltIssue | WriteIssue;
export type IssueType = Issue["type"];

export interface RunStats {
  totalSources: number;
  publishedSources: number;
  haltedSources: number;
  failedSources: number;

  // Conditions recorded below halt-level, keyed by severity label
  conditions: Record<string, number>;

  issues: Issue[];
  duration: number;
}
