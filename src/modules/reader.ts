/**
 * Reader Module
 * Loads a source, parses it into a document and runs the reader's transforms
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { Document } from "../document/tree";
import type { Reader } from "../readers/reader";
import type { Settings } from "../settings/settings";
import { doTransforms, type TransformRunOptions } from "./scheduler";
import type { Source, TransformRunResult } from "../types";

/**
 * Display name of a source (file path, or the name given to in-memory sources)
 */
export function sourceName(source: Source): string {
  if (source.kind === "path") return path.resolve(source.path);
  return source.name ?? `<${source.kind}>`;
}

/**
 * Read the whole source as text
 */
export async function loadSource(source: Source): Promise<string> {
  switch (source.kind) {
    case "path":
      return readFile(source.path, "utf-8");
    case "text":
      return source.text;
    case "lines":
      return source.lines.join("\n");
    case "stream": {
      const chunks: string[] = [];
      source.stream.setEncoding("utf-8");
      for await (const chunk of source.stream) {
        chunks.push(String(chunk));
      }
      return chunks.join("");
    }
  }
}

/**
 * Empty document whose root records where it came from
 */
export function newDocument(source: Source): Document {
  return new Document({ source: sourceName(source) });
}

/**
 * Parse a source and run the reader's transforms over the result
 *
 * @throws HaltError when a transform condition reaches halt-level
 */
export async function readDocument(
  source: Source,
  reader: Reader,
  settings: Settings,
  options: TransformRunOptions = {},
): Promise<TransformRunResult> {
  const text = await loadSource(source);
  const document = newDocument(source);
  reader.parse(text, document, settings);
  return doTransforms(document, reader.transforms, settings, options);
}
