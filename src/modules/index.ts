/**
 * Pipeline modules export
 */

export { doTransforms, compareTransforms, sortTransforms, type TransformRunOptions } from "./scheduler";
export { readDocument, loadSource, newDocument, sourceName } from "./reader";
export { writeDocument, writePart, deliver, toBufferEncoding } from "./writer";
export { publish, runRegistry, componentOptions, type PublishOptions, type PublishReport } from "./publisher";
export { stats, formatDuration } from "./stats";
