/**
 * Publisher Module
 * Resolves settings, reads a source and writes it through one writer
 */

import type { Reader } from "../readers/reader";
import { defaultRegistry, type SettingsRegistry } from "../settings/registry";
import { resolveSettings, type ResolveOptions } from "../settings/resolver";
import type { Settings } from "../settings/settings";
import { transformOptions } from "../transforms/transform";
import { logger as defaultLogger } from "../utils/logger";
import type { WriterDefinition } from "../writers";
import type { ConfigError, VisitorCondition } from "../utils/conditions";
import { readDocument } from "./reader";
import type { TransformRunOptions } from "./scheduler";
import { writeDocument } from "./writer";
import type {
  Destination,
  OptionDefinition,
  PublishResult,
  Source,
  StructuralWarning,
} from "../types";

export interface PublishOptions
  extends Omit<ResolveOptions, "registry">,
    Pick<TransformRunOptions, "counter" | "report"> {
  source: Source;
  reader: Reader;
  writer: WriterDefinition;
  // Output is always returned; it is also written here when given
  destination?: Destination;
  // Catalogue to extend with the reader, transform and writer options
  registry?: SettingsRegistry;
}

export interface PublishReport extends PublishResult {
  settings: Settings;
  warnings: StructuralWarning[];
  configErrors: ConfigError[];
  visitorErrors: VisitorCondition[];
}

/**
 * Options a reader and writer pair reads, including the reader's transforms
 */
export function componentOptions(reader: Reader, writer: WriterDefinition): OptionDefinition[] {
  return [...reader.options, ...transformOptions(reader.transforms), ...writer.options];
}

/**
 * Catalogue for one run: a copy of the base registry with the component
 * options added, so runs never leak options into each other
 */
export function runRegistry(
  reader: Reader,
  writer: WriterDefinition,
  base: SettingsRegistry = defaultRegistry,
): SettingsRegistry {
  const registry = base.clone();
  registry.registerAll(componentOptions(reader, writer));
  return registry;
}

/**
 * Publish one source
 *
 * @throws ConfigError when an invalid value is met under the "abort" policy
 * @throws HaltError when a transform condition reaches halt-level
 */
export async function publish(options: PublishOptions): Promise<PublishReport> {
  const { source, reader, writer: definition, destination, counter, report, ...resolveOptions } = options;
  const log = options.logger ?? defaultLogger;

  const registry = runRegistry(reader, definition, options.registry);
  const resolved = await resolveSettings(source, { ...resolveOptions, registry });
  if (resolved.files.length > 0) {
    log.debug(`Configuration files: ${resolved.files.join(", ")}`);
  }

  const { document, conditions } = await readDocument(source, reader, resolved.settings, {
    counter,
    report,
    logger: log,
  });

  const writer = await definition.create(resolved.settings, log);
  const output = await writeDocument(writer, document, resolved.settings, destination);

  return {
    document,
    output,
    conditions,
    configFiles: resolved.files,
    settings: resolved.settings,
    warnings: resolved.warnings,
    configErrors: resolved.errors,
    visitorErrors: [...writer.conditions],
  };
}
