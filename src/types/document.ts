/**
 * Document tree type definitions
 */

/**
 * Stable index of a node inside its document arena.
 * Ids are never reused, even after a node is removed.
 */
export type NodeId = number;

export type NodeKind =
  | "document"
  | "section"
  | "title"
  | "paragraph"
  | "text"
  | "comment"
  | "system_message"
  | "element";

export const NODE_KINDS: readonly NodeKind[] = [
  "document",
  "section",
  "title",
  "paragraph",
  "text",
  "comment",
  "system_message",
  "element",
];

export type AttributeValue = string | number | boolean | string[];

export type Attributes = Record<string, AttributeValue>;

export interface NodeRecord {
  kind: NodeKind;
  attributes: Attributes;
  children: NodeId[];
  parent: NodeId | null;
  // Only text and comment nodes carry a value
  value?: string;
  attached: boolean;
}
