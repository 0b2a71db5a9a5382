/**
 * Settings type definitions
 */

export type ScalarOptionType =
  | { kind: "boolean" }
  | { kind: "integer"; min: number; max: number }
  | { kind: "string"; nullable: boolean }
  | { kind: "path"; nullable: boolean }
  | { kind: "enum"; values: readonly string[] };

export type OptionType = ScalarOptionType | { kind: "list"; of: ScalarOptionType };

export type ScalarValue = boolean | number | string | null;

export type SettingValue = ScalarValue | ScalarValue[];

export interface OptionDefinition {
  name: string;
  type: OptionType;
  default: SettingValue;
  description: string;
}

/**
 * What to do when a configuration value fails validation
 * - "default": use the option's default and keep going
 * - "abort": stop resolution with the ConfigError
 */
export type InvalidValueAction = "default" | "abort";
