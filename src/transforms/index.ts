/**
 * Transforms export
 */

export {
  Transform,
  CallableTransform,
  CALLABLE_PRIORITY,
  MIN_PRIORITY,
  MAX_PRIORITY,
  isTransformClass,
  transformOptions,
} from "./transform";
export type {
  TransformClass,
  TransformContext,
  TransformFunction,
  TransformSpec,
} from "./transform";
export { SectionIds } from "./section-ids";
export { DocTitle } from "./doc-title";
export { StripComments } from "./strip-comments";
export { SectionContent, EMPTY_SECTION_SEVERITY } from "./section-content";
