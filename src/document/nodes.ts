/**
 * Node builders
 * Small helpers for the node shapes readers and transforms create
 */

import type { Document } from "./tree";
import type { Attributes, Condition, NodeId } from "../types";
import { severityLabel } from "../utils/conditions";

export const DIAGNOSTICS_TITLE = "System Messages";

export function paragraph(doc: Document, text: string, attributes: Attributes = {}): NodeId {
  return doc.createElement("paragraph", attributes, [doc.createText(text)]);
}

export function title(doc: Document, text: string): NodeId {
  return doc.createElement("title", {}, [doc.createText(text)]);
}

export function section(
  doc: Document,
  heading: string,
  children: NodeId[] = [],
  attributes: Attributes = {},
): NodeId {
  return doc.createElement("section", attributes, [title(doc, heading), ...children]);
}

/**
 * Title text of a section, or null when its first child is not a title
 */
export function sectionTitle(doc: Document, node: NodeId): string | null {
  const first = doc.child(node, 0);
  if (first === undefined || doc.kind(first) !== "title") return null;
  return doc.textContent(first);
}

/**
 * Root-level sections whose title matches exactly, in document order
 */
export function findSectionsByTitle(doc: Document, heading: string): NodeId[] {
  return doc
    .children(doc.root)
    .filter((child) => doc.kind(child) === "section" && sectionTitle(doc, child) === heading);
}

/**
 * Build a system_message node describing a condition
 */
export function systemMessage(doc: Document, condition: Condition, source: string): NodeId {
  const attributes: Attributes = {
    level: condition.severity,
    type: severityLabel(condition.severity),
    source,
  };
  if (condition.line !== undefined) {
    attributes.line = condition.line;
  }
  return doc.createElement("system_message", attributes, [paragraph(doc, condition.message)]);
}
