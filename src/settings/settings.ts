/**
 * Resolved Settings
 * Immutable name -> value mapping built once per run
 */

import type { SettingValue } from "../types";

/**
 * Normalize an option name: case-insensitive, "_" and "-" interchangeable
 */
export function normalizeOptionName(name: string): string {
  return name.trim().toLowerCase().replace(/_/g, "-");
}

/**
 * Copy of a value that shares no array with the caller
 */
export function copySettingValue(value: SettingValue): SettingValue {
  return Array.isArray(value) ? [...value] : value;
}

export class Settings {
  private readonly values: ReadonlyMap<string, SettingValue>;

  constructor(values: Iterable<[string, SettingValue]> = []) {
    const normalized = new Map<string, SettingValue>();
    for (const [name, value] of values) {
      normalized.set(normalizeOptionName(name), copySettingValue(value));
    }
    this.values = normalized;
    Object.freeze(this);
  }

  has(name: string): boolean {
    return this.values.has(normalizeOptionName(name));
  }

  get(name: string): SettingValue | undefined {
    const value = this.values.get(normalizeOptionName(name));
    return value === undefined ? undefined : copySettingValue(value);
  }

  private require(name: string): SettingValue {
    const value = this.get(name);
    if (value === undefined) {
      throw new Error(`Unknown setting "${name}"`);
    }
    return value;
  }

  boolean(name: string): boolean {
    const value = this.require(name);
    if (typeof value !== "boolean") {
      throw new TypeError(`Setting "${name}" is not a boolean`);
    }
    return value;
  }

  integer(name: string): number {
    const value = this.require(name);
    if (typeof value !== "number") {
      throw new TypeError(`Setting "${name}" is not an integer`);
    }
    return value;
  }

  string(name: string): string {
    const value = this.require(name);
    if (typeof value !== "string") {
      throw new TypeError(`Setting "${name}" is not a string`);
    }
    return value;
  }

  optionalString(name: string): string | null {
    const value = this.require(name);
    if (value !== null && typeof value !== "string") {
      throw new TypeError(`Setting "${name}" is not a string`);
    }
    return value;
  }

  list(name: string): SettingValue[] {
    const value = this.require(name);
    if (!Array.isArray(value)) {
      throw new TypeError(`Setting "${name}" is not a list`);
    }
    return value;
  }

  /**
   * New mapping with some values replaced
   */
  with(overrides: Record<string, SettingValue>): Settings {
    return new Settings([...this.values, ...Object.entries(overrides)]);
  }

  entries(): Array<[string, SettingValue]> {
    return [...this.values].map(([name, value]): [string, SettingValue] => [
      name,
      copySettingValue(value),
    ]);
  }

  toJSON(): Record<string, SettingValue> {
    return Object.fromEntries(this.entries());
  }
}
