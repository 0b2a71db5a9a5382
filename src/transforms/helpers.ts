import type { Document } from "../document/tree";
import type { NodeId } from "../types";

/**
 * Source line recorded by the reader, if any
 */
export function nodeLine(document: Document, node: NodeId): number | undefined {
  const line = document.attribute(node, "line");
  return typeof line === "number" ? line : undefined;
}
