/**
 * Settings Resolver
 * Builds one settings mapping from defaults, configuration files and overrides
 *
 * Precedence (later wins, key by key):
 * defaults < system file < user file < source directory file < --config file < overrides
 *
 * Inside one file, lines apply in order: a `config: <path>` line merges the
 * included file at that position, so keys after it override the included values.
 */

import { readFile } from "fs/promises";
import path from "node:path";
import envPaths from "env-paths";
import { ZodError } from "zod";
import { ConfigError } from "../utils/conditions";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { parseOptionValue } from "./option-types";
import { defaultRegistry, describeZodError, type SettingsRegistry } from "./registry";
import { Settings, normalizeOptionName } from "./settings";
import type {
  InvalidValueAction,
  SettingValue,
  Source,
  StructuralWarning,
} from "../types";

export const CONFIG_FILENAME = "docpress.conf";
export const SYSTEM_CONFIG_PATH = path.join("/etc", CONFIG_FILENAME);

// Key whose value names another configuration file to include
const INCLUDE_KEY = "config";
const OVERRIDES_PATH = "<overrides>";

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("docpress", { suffix: "" });

export type InvalidValuePolicy =
  | InvalidValueAction
  | ((error: ConfigError) => InvalidValueAction);

export interface ResolveOptions {
  registry?: SettingsRegistry;
  // Standard files, lowest precedence first
  searchPath?: readonly string[];
  // Consult docpress.conf beside a path-backed source
  sourceConfig?: boolean;
  // Extra file applied after the search path (--config)
  configFile?: string;
  // Raw values applied last (command line)
  overrides?: Record<string, string>;
  onInvalid?: InvalidValuePolicy;
  logger?: Logger;
}

export interface ResolveResult {
  settings: Settings;
  warnings: StructuralWarning[];
  // Invalid values that were replaced by their defaults
  errors: ConfigError[];
  // Files actually read, in processing order
  files: string[];
}

interface ResolutionState {
  registry: SettingsRegistry;
  onInvalid: InvalidValuePolicy;
  logger: Logger;
  processed: Set<string>;
  files: string[];
  warnings: StructuralWarning[];
  errors: ConfigError[];
}

// ============================================================================
// Search path
// ============================================================================

/**
 * User configuration file
 * - Linux: $XDG_CONFIG_HOME/docpress/docpress.conf or ~/.config/docpress/docpress.conf
 * - macOS: ~/Library/Preferences/docpress/docpress.conf
 * - Windows: %APPDATA%\docpress\docpress.conf
 */
export function getUserConfigPath(): string {
  return path.join(paths.config, CONFIG_FILENAME);
}

export function standardConfigPaths(): string[] {
  return [SYSTEM_CONFIG_PATH, getUserConfigPath()];
}

/**
 * Configuration file beside a path-backed source, or null for in-memory sources
 */
export function sourceConfigPath(source: Source | null): string | null {
  if (source?.kind !== "path") return null;
  return path.join(path.dirname(path.resolve(source.path)), CONFIG_FILENAME);
}

export function configSearchPath(
  source: Source | null,
  options: Pick<ResolveOptions, "searchPath" | "sourceConfig" | "configFile"> = {},
): string[] {
  const files = [...(options.searchPath ?? standardConfigPaths())];

  if (options.sourceConfig ?? true) {
    const local = sourceConfigPath(source);
    if (local) files.push(local);
  }

  if (options.configFile) {
    files.push(path.resolve(options.configFile));
  }

  return files;
}

// ============================================================================
// Parsing
// ============================================================================

function decide(policy: InvalidValuePolicy, error: ConfigError): InvalidValueAction {
  return typeof policy === "function" ? policy(error) : policy;
}

function warn(state: ResolutionState, warning: Omit<StructuralWarning, "type">): void {
  const entry: StructuralWarning = { type: "structural", ...warning };
  state.warnings.push(entry);
  const location = warning.path ? `${warning.path}${warning.line !== undefined ? `:${warning.line}` : ""}: ` : "";
  state.logger.warn(`${location}${warning.message}`);
}

/**
 * Parse one raw value for a known option; unknown keys stay raw strings
 */
function parseValue(
  state: ResolutionState,
  name: string,
  raw: string,
  location: { path: string; line?: number; baseDir: string },
): SettingValue {
  const definition = state.registry.get(name);
  if (!definition) return raw;

  try {
    return parseOptionValue(definition.type, raw, location.baseDir);
  } catch (error) {
    const reason = error instanceof ZodError ? describeZodError(error) : String(error);
    const configError = new ConfigError(`Invalid value "${raw}" for "${name}": ${reason}`, {
      path: location.path,
      line: location.line,
      key: name,
      value: raw,
    });

    if (decide(state.onInvalid, configError) === "abort") {
      throw configError;
    }

    state.errors.push(configError);
    state.logger.warn(`${configError.message}; using default`);
    return definition.default;
  }
}

async function readSource(state: ResolutionState, file: string): Promise<string | null> {
  try {
    return await readFile(file, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    const details = error instanceof Error ? error.message : String(error);
    warn(state, { path: file, message: `Cannot read configuration file: ${details}` });
    return null;
  }
}

/**
 * Read one configuration file (and the files it includes) into a mapping.
 * Returns an empty mapping for missing or already processed files.
 */
async function readConfigFile(
  state: ResolutionState,
  file: string,
): Promise<Map<string, SettingValue>> {
  const values = new Map<string, SettingValue>();
  const absolute = path.resolve(file);

  if (state.processed.has(absolute)) {
    state.logger.debug(`Skipping already processed configuration file ${absolute}`);
    return values;
  }
  state.processed.add(absolute);

  const text = await readSource(state, absolute);
  if (text === null) return values;
  state.files.push(absolute);

  const baseDir = path.dirname(absolute);
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1;
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith("#")) continue;

    const separator = trimmed.indexOf(":");
    const name = separator === -1 ? "" : normalizeOptionName(trimmed.slice(0, separator));
    if (!name) {
      warn(state, {
        path: absolute,
        line: lineNumber,
        message: `Malformed line ignored (expected "name: value"): ${trimmed}`,
      });
      continue;
    }

    const raw = trimmed.slice(separator + 1).trim();

    if (name === INCLUDE_KEY) {
      const included = await readConfigFile(state, path.resolve(baseDir, raw));
      for (const [key, value] of included) {
        values.set(key, value);
      }
      continue;
    }

    values.set(name, parseValue(state, name, raw, { path: absolute, line: lineNumber, baseDir }));
  }

  return values;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve the settings for one run
 *
 * @param source - Document source; path-backed sources add their directory's docpress.conf
 */
export async function resolveSettings(
  source: Source | null,
  options: ResolveOptions = {},
): Promise<ResolveResult> {
  const registry = options.registry ?? defaultRegistry;
  const state: ResolutionState = {
    registry,
    onInvalid: options.onInvalid ?? "default",
    logger: options.logger ?? defaultLogger,
    processed: new Set(),
    files: [],
    warnings: [],
    errors: [],
  };

  const result = new Map<string, SettingValue>(registry.defaults().entries());

  for (const file of configSearchPath(source, options)) {
    const values = await readConfigFile(state, file);
    for (const [key, value] of values) {
      result.set(key, value);
    }
  }

  const cwd = process.cwd();
  for (const [name, raw] of Object.entries(options.overrides ?? {})) {
    const key = normalizeOptionName(name);
    if (key === INCLUDE_KEY) {
      throw new ConfigError(`"${INCLUDE_KEY}" cannot be overridden; pass the file as configFile`, {
        path: OVERRIDES_PATH,
        key,
      });
    }
    result.set(key, parseValue(state, key, raw, { path: OVERRIDES_PATH, baseDir: cwd }));
  }

  return {
    settings: new Settings(result),
    warnings: state.warnings,
    errors: state.errors,
    files: state.files,
  };
}
