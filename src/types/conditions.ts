/**
 * Condition and diagnostic type definitions
 */

import type { NodeId } from "./document";

/**
 * Severity scale: 0 (least severe) to 10 (fatal)
 */
export type Severity = number;

export type SeverityLabel =
  | "DEBUG"
  | "INFO"
  | "WARNING"
  | "ERROR"
  | "SEVERE"
  | "FATAL";

/**
 * A recoverable or fatal problem raised while rewriting a document
 */
export interface Condition {
  severity: Severity;
  message: string;
  line?: number;
  node?: NodeId;
}

/**
 * A non-fatal structural problem (malformed config line, duplicated
 * diagnostics section). Recorded and logged, never thrown.
 */
export interface StructuralWarning {
  type: "structural";
  message: string;
  path?: string;
  line?: number;
}
