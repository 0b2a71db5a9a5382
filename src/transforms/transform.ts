/**
 * Transform base classes
 */

import type { Document } from "../document/tree";
import type { Settings } from "../settings/settings";
import type { Condition, NodeId, OptionDefinition, Severity } from "../types";

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 999;

/**
 * Priority given to plain functions passed to the scheduler.
 * They run after every class-based transform below 950.
 */
export const CALLABLE_PRIORITY = 950;

export interface TransformContext {
  document: Document;
  settings: Settings;
  // Subtree root this transform rewrites
  target: NodeId;
  // Add a transform to the current run
  schedule(spec: TransformSpec): void;
  // Abort this transform with a condition
  fail(severity: Severity, message: string, options?: { line?: number; node?: NodeId }): never;
  // Identifier of a node, assigning one if it has none
  ensureId(node: NodeId): string;
}

export abstract class Transform {
  // Options this transform reads; registered before a run
  static readonly options: readonly OptionDefinition[] = [];

  abstract readonly priority: number;

  constructor(
    readonly target: NodeId,
    readonly order: number,
  ) {}

  get name(): string {
    return this.constructor.name;
  }

  /**
   * Rewrite the target subtree. Return (or throw) a condition to report a failure.
   */
  abstract apply(context: TransformContext): Condition | void;
}

export type TransformFunction = (context: TransformContext) => Condition | void;

export interface TransformClass {
  new (target: NodeId, order: number): Transform;
  readonly options: readonly OptionDefinition[];
  readonly prototype: Transform;
}

export type TransformSpec = Transform | TransformClass | TransformFunction;

export function isTransformClass(spec: unknown): spec is TransformClass {
  return typeof spec === "function" && spec.prototype instanceof Transform;
}

/**
 * Wraps a plain function. Every wrapped function shares order 0, so
 * among themselves they keep the order they were scheduled in.
 */
export class CallableTransform extends Transform {
  readonly priority = CALLABLE_PRIORITY;

  constructor(
    private readonly fn: TransformFunction,
    target: NodeId,
  ) {
    super(target, 0);
  }

  get name(): string {
    return this.fn.name || "anonymous";
  }

  apply(context: TransformContext): Condition | void {
    return this.fn(context);
  }
}

/**
 * Options declared by the class-based specs of a transform list
 */
export function transformOptions(specs: readonly TransformSpec[]): OptionDefinition[] {
  const options: OptionDefinition[] = [];
  for (const spec of specs) {
    if (isTransformClass(spec)) {
      options.push(...spec.options);
    } else if (spec instanceof Transform) {
      const ctor = spec.constructor;
      if (isTransformClass(ctor)) options.push(...ctor.options);
    }
  }
  return options;
}
