/**
 * Reader contract
 */

import type { Document } from "../document/tree";
import type { Settings } from "../settings/settings";
import type { TransformSpec } from "../transforms/transform";
import type { OptionDefinition } from "../types";

export interface Reader {
  readonly name: string;
  // Options read by the parser itself; transform options are collected separately
  readonly options: readonly OptionDefinition[];
  // Always run after parsing, by readDocument
  readonly transforms: readonly TransformSpec[];
  parse(text: string, document: Document, settings: Settings): void;
}
