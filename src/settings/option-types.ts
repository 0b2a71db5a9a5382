/**
 * Option Types
 * Type descriptors for settings and the zod schemas that parse them
 */

import path from "node:path";
import { z } from "zod";
import type {
  OptionType,
  ScalarOptionType,
  ScalarValue,
  SettingValue,
} from "../types";

// Raw values that mean "no value" for nil-allowed strings and paths
const NIL_VALUES = ["", "nil", "none", "null"];

// ============================================================================
// Constructors
// ============================================================================

export const optionTypes = {
  boolean: (): ScalarOptionType => ({ kind: "boolean" }),
  integer: (min: number = Number.MIN_SAFE_INTEGER, max: number = Number.MAX_SAFE_INTEGER): ScalarOptionType => ({
    kind: "integer",
    min,
    max,
  }),
  string: (nullable: boolean = false): ScalarOptionType => ({ kind: "string", nullable }),
  path: (nullable: boolean = false): ScalarOptionType => ({ kind: "path", nullable }),
  enum: (values: readonly string[]): ScalarOptionType => ({ kind: "enum", values }),
  list: (of: ScalarOptionType): OptionType => ({ kind: "list", of }),
};

// ============================================================================
// Raw string parsing (config files, command line)
// ============================================================================

function matchEnum(values: readonly string[], raw: string): string | undefined {
  const lowered = raw.toLowerCase();
  return values.find((value) => value.toLowerCase() === lowered);
}

function scalarRawSchema(type: ScalarOptionType, baseDir: string): z.ZodType<ScalarValue, string> {
  switch (type.kind) {
    case "boolean":
      return z.stringbool({ case: "insensitive" });
    case "integer":
      return z
        .string()
        .regex(/^[+-]?\d+$/, "expected an integer")
        .transform(Number)
        .pipe(z.number().int().min(type.min).max(type.max));
    case "string":
      return z
        .string()
        .transform((raw) => (type.nullable && NIL_VALUES.includes(raw.toLowerCase()) ? null : raw));
    case "path":
      return z
        .string()
        .refine((raw) => raw.length > 0 || type.nullable, "expected a path")
        .transform((raw) =>
          type.nullable && NIL_VALUES.includes(raw.toLowerCase()) ? null : path.resolve(baseDir, raw),
        );
    case "enum":
      return z
        .string()
        .refine((raw) => matchEnum(type.values, raw) !== undefined, {
          message: `expected one of: ${type.values.join(", ")}`,
        })
        .transform((raw) => matchEnum(type.values, raw) ?? raw);
  }
}

/**
 * Schema that turns a raw string into a typed setting value
 *
 * @param baseDir - Directory relative paths are resolved against
 */
export function rawSchema(type: OptionType, baseDir: string): z.ZodType<SettingValue, string> {
  if (type.kind === "list") {
    return z
      .string()
      .transform((raw) =>
        raw
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0),
      )
      .pipe(z.array(scalarRawSchema(type.of, baseDir)));
  }
  return scalarRawSchema(type, baseDir);
}

export function parseOptionValue(type: OptionType, raw: string, baseDir: string): SettingValue {
  return rawSchema(type, baseDir).parse(raw.trim());
}

// ============================================================================
// Typed value validation (registered defaults)
// ============================================================================

function scalarValueSchema(type: ScalarOptionType): z.ZodType<ScalarValue> {
  switch (type.kind) {
    case "boolean":
      return z.boolean();
    case "integer":
      return z.number().int().min(type.min).max(type.max);
    case "string":
    case "path":
      return type.nullable ? z.string().nullable() : z.string();
    case "enum":
      return z.string().refine((value) => type.values.includes(value), {
        message: `expected one of: ${type.values.join(", ")}`,
      });
  }
}

export function valueSchema(type: OptionType): z.ZodType<SettingValue> {
  if (type.kind === "list") {
    return z.array(scalarValueSchema(type.of));
  }
  return scalarValueSchema(type);
}

// ============================================================================
// Display
// ============================================================================

export function describeOptionType(type: OptionType): string {
  switch (type.kind) {
    case "boolean":
      return "boolean";
    case "integer":
      return type.min === Number.MIN_SAFE_INTEGER && type.max === Number.MAX_SAFE_INTEGER
        ? "integer"
        : `integer ${type.min}..${type.max}`;
    case "string":
      return type.nullable ? "string | nil" : "string";
    case "path":
      return type.nullable ? "path | nil" : "path";
    case "enum":
      return type.values.join(" | ");
    case "list":
      return `list of ${describeOptionType(type.of)}`;
  }
}

export function formatSettingValue(value: SettingValue): string {
  if (value === null) return "nil";
  if (Array.isArray(value)) return value.map(formatSettingValue).join(", ");
  return String(value);
}
