/**
 * Document Tree
 * Arena of nodes addressed by stable ids, with single ownership and
 * non-owning back-references
 */

import type {
  AttributeValue,
  Attributes,
  NodeId,
  NodeKind,
  NodeRecord,
} from "../types";

export class Document {
  private nodes: NodeRecord[] = [];
  // from -> to, in registration order
  private backrefIndex = new Map<NodeId, NodeId[]>();
  readonly root: NodeId;

  constructor(attributes: Attributes = {}) {
    this.root = this.allocate({
      kind: "document",
      attributes: { ...attributes },
      children: [],
      parent: null,
      attached: true,
    });
  }

  // ============================================================================
  // Creation
  // ============================================================================

  private allocate(record: NodeRecord): NodeId {
    this.nodes.push(record);
    return this.nodes.length - 1;
  }

  private record(node: NodeId): NodeRecord {
    const record = this.nodes[node];
    if (!record) {
      throw new Error(`Unknown node ${node}`);
    }
    return record;
  }

  createElement(
    kind: Exclude<NodeKind, "text" | "comment" | "document">,
    attributes: Attributes = {},
    children: NodeId[] = [],
  ): NodeId {
    const node = this.allocate({
      kind,
      attributes: { ...attributes },
      children: [],
      parent: null,
      attached: false,
    });
    for (const child of children) {
      this.append(node, child);
    }
    return node;
  }

  createText(value: string): NodeId {
    return this.allocate({
      kind: "text",
      attributes: {},
      children: [],
      parent: null,
      value,
      attached: false,
    });
  }

  createComment(value: string): NodeId {
    return this.allocate({
      kind: "comment",
      attributes: {},
      children: [],
      parent: null,
      value,
      attached: false,
    });
  }

  // ============================================================================
  // Structure
  // ============================================================================

  kind(node: NodeId): NodeKind {
    return this.record(node).kind;
  }

  value(node: NodeId): string {
    return this.record(node).value ?? "";
  }

  parent(node: NodeId): NodeId | null {
    return this.record(node).parent;
  }

  children(node: NodeId): readonly NodeId[] {
    return this.record(node).children;
  }

  childCount(node: NodeId): number {
    return this.record(node).children.length;
  }

  child(node: NodeId, index: number): NodeId | undefined {
    return this.record(node).children[index];
  }

  isAttached(node: NodeId): boolean {
    return this.record(node).attached;
  }

  append(parent: NodeId, child: NodeId): void {
    this.insert(parent, this.childCount(parent), child);
  }

  insert(parent: NodeId, index: number, child: NodeId): void {
    const parentRecord = this.record(parent);
    const childRecord = this.record(child);

    if (parentRecord.value !== undefined) {
      throw new Error(`${parentRecord.kind} node ${parent} cannot have children`);
    }
    if (child === this.root) {
      throw new Error("The document root cannot be a child");
    }
    if (childRecord.parent !== null) {
      throw new Error(`Node ${child} already has a parent (${childRecord.parent})`);
    }
    for (let at: NodeId | null = parent; at !== null; at = this.record(at).parent) {
      if (at === child) {
        throw new Error(`Node ${child} is an ancestor of node ${parent}`);
      }
    }

    const position = Math.max(0, Math.min(index, parentRecord.children.length));
    parentRecord.children.splice(position, 0, child);
    childRecord.parent = parent;
    this.markSubtree(child, parentRecord.attached);
  }

  /**
   * Re-parent a node. Unlike remove(), back-references are kept.
   */
  move(node: NodeId, parent: NodeId, index: number = this.childCount(parent)): void {
    const record = this.record(node);
    for (let at: NodeId | null = parent; at !== null; at = this.record(at).parent) {
      if (at === node) {
        throw new Error(`Node ${node} is an ancestor of node ${parent}`);
      }
    }
    if (record.parent !== null) {
      const siblings = this.record(record.parent).children;
      siblings.splice(siblings.indexOf(node), 1);
      record.parent = null;
    }
    this.insert(parent, index, node);
  }

  /**
   * Detach a node (and its subtree) from its parent.
   * Back-references into or out of the subtree are dropped.
   */
  remove(node: NodeId): void {
    if (node === this.root) {
      throw new Error("The document root cannot be removed");
    }
    const record = this.record(node);
    if (record.parent === null) return;

    const siblings = this.record(record.parent).children;
    siblings.splice(siblings.indexOf(node), 1);
    record.parent = null;

    const detached = new Set(this.subtree(node));
    this.markSubtree(node, false);
    this.dropBackrefs(detached);
  }

  private markSubtree(node: NodeId, attached: boolean): void {
    for (const id of this.subtree(node)) {
      this.record(id).attached = attached;
    }
  }

  /**
   * Node and all of its descendants, pre-order
   */
  *subtree(node: NodeId): Generator<NodeId> {
    yield node;
    for (const child of [...this.record(node).children]) {
      yield* this.subtree(child);
    }
  }

  descendants(node: NodeId, kind?: NodeKind): NodeId[] {
    const found: NodeId[] = [];
    for (const id of this.subtree(node)) {
      if (id !== node && (kind === undefined || this.kind(id) === kind)) {
        found.push(id);
      }
    }
    return found;
  }

  textContent(node: NodeId): string {
    const record = this.record(node);
    if (record.kind === "text") return record.value ?? "";
    if (record.kind === "comment") return "";
    return record.children.map((child) => this.textContent(child)).join("");
  }

  // ============================================================================
  // Attributes
  // ============================================================================

  attributes(node: NodeId): Readonly<Attributes> {
    return this.record(node).attributes;
  }

  attribute(node: NodeId, name: string): AttributeValue | undefined {
    return this.record(node).attributes[name];
  }

  setAttribute(node: NodeId, name: string, value: AttributeValue): void {
    this.record(node).attributes[name] = value;
  }

  ids(node: NodeId): string[] {
    const ids = this.attribute(node, "ids");
    return Array.isArray(ids) ? ids : [];
  }

  /**
   * Return the node's first id, assigning a generated one if it has none
   */
  ensureId(node: NodeId, generate: () => string): string {
    const ids = this.ids(node);
    if (ids.length > 0) return ids[0];
    const id = generate();
    this.setAttribute(node, "ids", [id]);
    return id;
  }

  findById(id: string): NodeId | undefined {
    for (const node of this.subtree(this.root)) {
      if (this.ids(node).includes(id)) return node;
    }
    return undefined;
  }

  allIds(): string[] {
    const all: string[] = [];
    for (const node of this.subtree(this.root)) {
      all.push(...this.ids(node));
    }
    return all;
  }

  // ============================================================================
  // Back-references
  // ============================================================================

  addBackref(from: NodeId, to: NodeId): void {
    this.record(from);
    this.record(to);
    const targets = this.backrefIndex.get(from) ?? [];
    if (!targets.includes(to)) {
      targets.push(to);
    }
    this.backrefIndex.set(from, targets);
  }

  backrefs(node: NodeId): readonly NodeId[] {
    return this.backrefIndex.get(node) ?? [];
  }

  private dropBackrefs(detached: Set<NodeId>): void {
    for (const [from, targets] of this.backrefIndex) {
      const kept = targets.filter((to) => !detached.has(to));
      if (detached.has(from) || kept.length === 0) {
        this.backrefIndex.delete(from);
      } else {
        this.backrefIndex.set(from, kept);
      }
    }
  }
}
