/**
 * Writer Module
 * Renders a document through a writer and delivers the output
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { Writable } from "node:stream";
import type { Document } from "../document/tree";
import type { Settings } from "../settings/settings";
import type { Writer } from "../writers/writer";
import type { Destination } from "../types";

const ENCODINGS: Record<string, BufferEncoding> = {
  "utf-8": "utf-8",
  "utf-16le": "utf16le",
  latin1: "latin1",
  ascii: "ascii",
};

/**
 * Node encoding for an output-encoding setting value
 */
export function toBufferEncoding(encoding: string): BufferEncoding {
  const found = ENCODINGS[encoding.toLowerCase()];
  if (!found) {
    throw new Error(`Unsupported output encoding "${encoding}"`);
  }
  return found;
}

function writeStream(stream: Writable, text: string, encoding: BufferEncoding): Promise<void> {
  return new Promise((resolve, reject) => {
    // A failed write is also emitted as "error"; the listener stays for it
    stream.once("error", reject);
    stream.write(text, encoding, (error) => {
      if (error) {
        reject(error);
        return;
      }
      stream.off("error", reject);
      resolve();
    });
  });
}

/**
 * Write text to a file (creating parent directories) or a stream
 */
export async function deliver(
  text: string,
  destination: Destination,
  encoding: BufferEncoding = "utf-8",
): Promise<void> {
  if (typeof destination === "string") {
    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, text, encoding);
    return;
  }
  await writeStream(destination, text, encoding);
}

function outputEncoding(settings: Settings): BufferEncoding {
  return toBufferEncoding(settings.has("output-encoding") ? settings.string("output-encoding") : "utf-8");
}

/**
 * Render a document and write the assembled output
 *
 * @returns The assembled output
 */
export async function writeDocument<P extends string>(
  writer: Writer<P>,
  document: Document,
  settings: Settings,
  destination?: Destination,
): Promise<string> {
  writer.attach(document, settings);
  const output = writer.output();
  if (destination !== undefined) {
    await deliver(output, destination, outputEncoding(settings));
  }
  return output;
}

/**
 * Write a single part of an already attached document
 */
export async function writePart<P extends string>(
  writer: Writer<P>,
  part: P,
  settings: Settings,
  destination: Destination,
): Promise<string> {
  if (writer.document === null) {
    throw new Error("No document attached to the writer");
  }
  const text = writer.part(part);
  await deliver(text, destination, outputEncoding(settings));
  return text;
}
