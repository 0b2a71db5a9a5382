/**
 * Pipeline data types: sources, destinations and run results
 */

import type { Readable, Writable } from "node:stream";
import type { Condition } from "./conditions";
import type { Document } from "../document/tree";

// ============================================================================
// Sources
// ============================================================================

export type Source =
  | { kind: "path"; path: string }
  | { kind: "text"; text: string; name?: string }
  | { kind: "lines"; lines: readonly string[]; name?: string }
  | { kind: "stream"; stream: Readable; name?: string };

// ============================================================================
// Destinations
// ============================================================================

/**
 * A file path (parent directories are created) or a writable stream
 */
export type Destination = string | Writable;

// ============================================================================
// Results
// ============================================================================

export interface TransformRunResult {
  document: Document;
  // Conditions below halt-level, in the order they were raised
  conditions: Condition[];
  // Transform names in execution order
  applied: string[];
}

export interface PublishResult {
  document: Document;
  output: string;
  conditions: Condition[];
  configFiles: string[];
}
