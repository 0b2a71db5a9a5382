/**
 * Reader exports and the registry of readers selectable by name
 */

import type { Reader } from "./reader";
import { TextReader } from "./text";

export type { Reader } from "./reader";
export { TextReader, splitBlocks } from "./text";

export const READERS: Readonly<Record<string, () => Reader>> = {
  text: () => new TextReader(),
};

export function getReader(name: string): Reader {
  const key = name.toLowerCase();
  const create = Object.hasOwn(READERS, key) ? READERS[key] : undefined;
  if (!create) {
    throw new Error(`Unknown reader "${name}" (available: ${Object.keys(READERS).join(", ")})`);
  }
  return create();
}
