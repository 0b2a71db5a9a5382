/**
 * Writer base class
 * Named output parts filled by a depth-first visitor traversal
 */

import type { Document } from "../document/tree";
import type { Settings } from "../settings/settings";
import { VisitorCondition } from "../utils/conditions";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import type { NodeId, NodeKind } from "../types";

/**
 * Returned by a visitor to steer the traversal
 * - "continue": visit the node's children next (default)
 * - "skip-children": the visitor handled or suppressed the children itself
 * - "skip-siblings": after this node, skip the rest of its siblings
 */
export type VisitSignal = "continue" | "skip-children" | "skip-siblings";

export interface VisitContext {
  document: Document;
  settings: Settings;
  visitChildren(node: NodeId): void;
}

export type Visitor = (node: NodeId, context: VisitContext) => VisitSignal | void;

/**
 * One visitor per node kind
 */
export type NodeVisitors = Record<NodeKind, Visitor>;

export abstract class Writer<P extends string = string> {
  readonly conditions: VisitorCondition[] = [];

  private buffers = new Map<P, string[]>();
  private activePart: P | null = null;
  private current: Document | null = null;

  // Part that is active while the document is traversed
  readonly mainPart: P;
  protected readonly logger: Logger;

  protected abstract readonly visitors: NodeVisitors;

  constructor(
    readonly parts: readonly P[],
    options: { mainPart?: P; logger?: Logger } = {},
  ) {
    const mainPart = options.mainPart ?? parts[0];
    if (mainPart === undefined) {
      throw new Error("A writer needs at least one part");
    }
    if (!parts.includes(mainPart)) {
      throw new Error(`Main part "${mainPart}" is not one of the writer's parts`);
    }
    this.mainPart = mainPart;
    this.logger = options.logger ?? defaultLogger;
    this.resetParts();
  }

  get document(): Document | null {
    return this.current;
  }

  // ============================================================================
  // Parts
  // ============================================================================

  private resetParts(): void {
    this.buffers = new Map(this.parts.map((part) => [part, []]));
    this.activePart = null;
  }

  private activeBuffer(): string[] {
    if (this.activePart === null) {
      throw new Error("No active part; wrap output in withPart()");
    }
    return this.buffer(this.activePart);
  }

  private buffer(part: P): string[] {
    const buffer = this.buffers.get(part);
    if (!buffer) {
      throw new Error(`Unknown part "${part}"`);
    }
    return buffer;
  }

  /**
   * Run body with `part` as the active part; the previous part is
   * restored afterwards, also when body throws
   */
  withPart<T>(part: P, body: () => T): T {
    this.buffer(part);
    const previous = this.activePart;
    this.activePart = part;
    try {
      return body();
    } finally {
      this.activePart = previous;
    }
  }

  get currentPart(): P | null {
    return this.activePart;
  }

  append(...fragments: string[]): void {
    this.activeBuffer().push(...fragments);
  }

  prepend(...fragments: string[]): void {
    this.activeBuffer().unshift(...fragments);
  }

  fragments(part: P): readonly string[] {
    return this.buffer(part);
  }

  part(part: P): string {
    return this.buffer(part).join("");
  }

  /**
   * Final output: every part in declaration order
   */
  output(): string {
    return this.parts.map((part) => this.part(part)).join("");
  }

  // ============================================================================
  // Traversal
  // ============================================================================

  /**
   * Render a document into the parts. Attaching the document the writer
   * already holds does nothing; use detach() to force a re-render.
   */
  attach(document: Document, settings: Settings): void {
    if (this.current === document) return;

    this.current = document;
    this.resetParts();
    this.conditions.length = 0;

    const context: VisitContext = {
      document,
      settings,
      visitChildren: (node) => this.visitNodes(document.children(node), context),
    };

    try {
      this.withPart(this.mainPart, () => {
        this.start(context);
        this.visitNodes([document.root], context);
        this.finish(context);
      });
    } catch (error) {
      // Partial output must not satisfy the next attach of the same document
      this.current = null;
      throw error;
    }
  }

  detach(): void {
    this.current = null;
    this.resetParts();
  }

  /**
   * Called before the traversal, with every part empty and the main part active
   */
  protected start(_context: VisitContext): void {}

  /**
   * Called after the traversal, with the main part active
   */
  protected finish(_context: VisitContext): void {}

  private visitNodes(nodes: readonly NodeId[], context: VisitContext): void {
    for (const node of [...nodes]) {
      if (this.visitNode(node, context) === "skip-siblings") break;
    }
  }

  private visitNode(node: NodeId, context: VisitContext): VisitSignal {
    const { document, settings } = context;
    const kind = document.kind(node);

    let signal: VisitSignal;
    try {
      signal = this.visitors[kind](node, context) ?? "continue";
    } catch (error) {
      this.recover(node, kind, error, settings);
      return "continue";
    }

    if (signal !== "skip-children") {
      this.visitNodes(document.children(node), context);
    }
    return signal;
  }

  private recover(node: NodeId, kind: NodeKind, error: unknown, settings: Settings): void {
    const failure = error instanceof VisitorCondition ? error : new VisitorCondition(node, kind, error);
    const policy = settings.has("visitor-errors") ? settings.string("visitor-errors") : "continue";

    if (policy === "propagate") {
      throw failure;
    }

    this.conditions.push(failure);
    this.logger.warn(failure.message);
  }
}
