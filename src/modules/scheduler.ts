/**
 * Transform Scheduler
 * Orders transforms by (priority, order), runs them one at a time and turns
 * their failures into diagnostics or a halt
 */

import { DIAGNOSTICS_TITLE, findSectionsByTitle, section, systemMessage } from "../document/nodes";
import type { Document } from "../document/tree";
import type { Settings } from "../settings/settings";
import {
  CallableTransform,
  MAX_PRIORITY,
  MIN_PRIORITY,
  Transform,
  isTransformClass,
  type TransformContext,
  type TransformSpec,
} from "../transforms/transform";
import {
  HaltError,
  MAX_SEVERITY,
  TransformCondition,
  condition,
  formatDiagnostic,
} from "../utils/conditions";
import { IdGenerator } from "../utils/id-generator";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { processCounter, type OrderCounter } from "../utils/order-counter";
import type { Condition, NodeId, TransformRunResult } from "../types";

export { DIAGNOSTICS_TITLE };

export interface TransformRunOptions {
  // Sequence used for transforms instantiated by this run
  counter?: OrderCounter;
  idGenerator?: IdGenerator;
  // Destination of reported diagnostics lines (defaults to stderr)
  report?: (line: string) => void;
  logger?: Logger;
}

export function compareTransforms(a: Transform, b: Transform): number {
  return a.priority - b.priority || a.order - b.order;
}

/**
 * Stable sort by ascending priority, then ascending order
 */
export function sortTransforms(transforms: Transform[]): Transform[] {
  return [...transforms].sort(compareTransforms);
}

function toCondition(error: unknown, transform: Transform): Condition {
  if (error instanceof TransformCondition) {
    return error.toCondition();
  }
  const message = error instanceof Error ? error.message : String(error);
  return condition(MAX_SEVERITY, `${transform.name} failed: ${message}`);
}

/**
 * Run transforms over a document
 *
 * Conditions below halt-level are recorded in a "System Messages" section and
 * returned; a condition at or above halt-level throws HaltError and no later
 * transform runs. Transforms added through `context.schedule` join the
 * not-yet-run remainder, which is re-sorted.
 *
 * @throws HaltError
 */
export function doTransforms(
  document: Document,
  specs: readonly TransformSpec[],
  settings: Settings,
  options: TransformRunOptions = {},
): TransformRunResult {
  const result: TransformRunResult = { document, conditions: [], applied: [] };

  if (document.childCount(document.root) === 0) {
    return result;
  }

  const counter = options.counter ?? processCounter;
  const log = options.logger ?? defaultLogger;
  const report = options.report ?? ((line: string) => log.report(line));
  const reportLevel = settings.integer("report-level");
  const haltLevel = settings.integer("halt-level");

  let ids = options.idGenerator;
  const ensureId = (node: NodeId): string =>
    document.ensureId(node, () => {
      const generator = (ids ??= IdGenerator.fromIds(document.allIds(), settings.string("id-prefix")));
      return generator.generate();
    });

  // ============================================================================
  // Instantiation
  // ============================================================================

  function instantiate(spec: TransformSpec): Transform {
    let transform: Transform;
    if (isTransformClass(spec)) {
      transform = new spec(document.root, counter.next());
    } else if (spec instanceof Transform) {
      transform = spec;
    } else {
      transform = new CallableTransform(spec, document.root);
    }

    const { priority } = transform;
    if (!Number.isInteger(priority) || priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
      throw new RangeError(
        `${transform.name}: priority must be an integer between ${MIN_PRIORITY} and ${MAX_PRIORITY}, got ${priority}`,
      );
    }
    return transform;
  }

  let pending = sortTransforms(specs.map(instantiate));

  function schedule(spec: TransformSpec): void {
    pending = sortTransforms([...pending, instantiate(spec)]);
  }

  // ============================================================================
  // Diagnostics
  // ============================================================================

  function diagnosticsSection(): NodeId {
    const existing = findSectionsByTitle(document, DIAGNOSTICS_TITLE);
    if (existing.length > 1) {
      log.warn(`Found ${existing.length} "${DIAGNOSTICS_TITLE}" sections; using the last one`);
    }

    const found = existing.at(-1);
    if (found !== undefined) return found;

    const created = section(document, DIAGNOSTICS_TITLE, [], { classes: ["system-messages"] });
    document.append(document.root, created);
    return created;
  }

  function recordFailure(failure: Condition, transform: Transform): void {
    const message = systemMessage(document, failure, transform.name);
    document.append(diagnosticsSection(), message);

    if (failure.node !== undefined && document.isAttached(failure.node)) {
      const id = ensureId(failure.node);
      document.addBackref(message, failure.node);
      document.setAttribute(message, "backrefs", [id]);
    }

    if (failure.severity >= reportLevel) {
      report(formatDiagnostic(failure));
    }

    if (failure.severity >= haltLevel) {
      throw new HaltError(failure, transform.name);
    }

    result.conditions.push(failure);
  }

  function removeEmptyDiagnostics(): void {
    for (const found of findSectionsByTitle(document, DIAGNOSTICS_TITLE)) {
      if (document.childCount(found) < 2) {
        document.remove(found);
      }
    }
  }

  // ============================================================================
  // Execution
  // ============================================================================

  try {
    for (let transform = pending.shift(); transform !== undefined; transform = pending.shift()) {
      const context: TransformContext = {
        document,
        settings,
        target: transform.target,
        schedule,
        ensureId,
        fail(severity, message, failOptions) {
          throw new TransformCondition(severity, message, failOptions);
        },
      };

      let outcome: Condition | void;
      try {
        outcome = transform.apply(context);
      } catch (error) {
        if (error instanceof HaltError) throw error;
        outcome = toCondition(error, transform);
      }

      result.applied.push(transform.name);
      if (outcome) {
        recordFailure(outcome, transform);
      }
    }
  } finally {
    removeEmptyDiagnostics();
  }

  return result;
}
