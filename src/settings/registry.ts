/**
 * Settings Registry
 * Process-wide catalogue of recognized options
 */

import { ZodError } from "zod";
import { ConfigError } from "../utils/conditions";
import { optionTypes, valueSchema } from "./option-types";
import { Settings, copySettingValue, normalizeOptionName } from "./settings";
import type { OptionDefinition, OptionType, SettingValue } from "../types";

export class SettingsRegistry {
  private options = new Map<string, OptionDefinition>();

  /**
   * Add an option to the catalogue. Registering a name again replaces
   * its previous definition.
   */
  register(
    name: string,
    type: OptionType,
    defaultValue: SettingValue,
    description: string,
  ): OptionDefinition {
    const key = normalizeOptionName(name);
    if (!key) {
      throw new ConfigError("Option name must not be empty");
    }

    const result = valueSchema(type).safeParse(defaultValue);
    if (!result.success) {
      throw new ConfigError(
        `Invalid default for option "${key}": ${describeZodError(result.error)}`,
        { key },
      );
    }

    const definition: OptionDefinition = {
      name: key,
      type,
      default: copySettingValue(result.data),
      description,
    };
    this.options.set(key, definition);
    return copyDefinition(definition);
  }

  registerAll(definitions: readonly OptionDefinition[]): void {
    for (const definition of definitions) {
      this.register(definition.name, definition.type, definition.default, definition.description);
    }
  }

  get(name: string): OptionDefinition | undefined {
    const definition = this.options.get(normalizeOptionName(name));
    return definition && copyDefinition(definition);
  }

  has(name: string): boolean {
    return this.options.has(normalizeOptionName(name));
  }

  /**
   * All definitions, sorted by name
   */
  list(): OptionDefinition[] {
    return [...this.options.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(copyDefinition);
  }

  /**
   * Mapping holding every option's default value
   */
  defaults(): Settings {
    return new Settings(this.list().map((option) => [option.name, option.default]));
  }

  clone(): SettingsRegistry {
    const copy = new SettingsRegistry();
    copy.registerAll(this.list());
    return copy;
  }
}

// Callers get copies; the catalogue's own definitions never leave it
function copyDefinition(definition: OptionDefinition): OptionDefinition {
  return { ...definition, default: copySettingValue(definition.default) };
}

export function describeZodError(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

// ============================================================================
// Core options
// ============================================================================

export const CORE_OPTIONS: readonly OptionDefinition[] = [
  {
    name: "report-level",
    type: optionTypes.integer(0, 10),
    default: 4,
    description: "Report conditions at or above this severity (0-10)",
  },
  {
    name: "halt-level",
    type: optionTypes.integer(0, 10),
    default: 8,
    description: "Abort the run on conditions at or above this severity (0-10)",
  },
  {
    name: "visitor-errors",
    type: optionTypes.enum(["continue", "propagate"]),
    default: "continue",
    description: "Whether a failing writer visitor skips to the next node or aborts the write",
  },
  {
    name: "id-prefix",
    type: optionTypes.string(),
    default: "id-",
    description: "Prefix for generated node identifiers",
  },
  {
    name: "output-encoding",
    type: optionTypes.enum(["utf-8", "utf-16le", "latin1", "ascii"]),
    default: "utf-8",
    description: "Encoding used when writing output files",
  },
];

export const defaultRegistry = new SettingsRegistry();
defaultRegistry.registerAll(CORE_OPTIONS);
