import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { describe, it, expect } from "vitest";
import { DIAGNOSTICS_TITLE, sectionTitle } from "../document/nodes";
import { TextReader } from "../readers/text";
import { runRegistry } from "./publisher";
import { textWriter } from "../writers";
import { Logger } from "../utils/logger";
import { OrderCounter } from "../utils/order-counter";
import { loadSource, newDocument, readDocument, sourceName } from "./reader";

const reader = new TextReader();
const settings = runRegistry(reader, textWriter).defaults();

function options(reported: string[] = []) {
  return {
    counter: new OrderCounter(),
    logger: new Logger("silent"),
    report: (line: string) => reported.push(line),
  };
}

describe("loadSource", () => {
  it("reads every kind of source", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "docpress-reader-"));
    try {
      const file = path.join(dir, "doc.txt");
      await writeFile(file, "from disk", "utf-8");

      expect(await loadSource({ kind: "path", path: file })).toBe("from disk");
      expect(await loadSource({ kind: "text", text: "inline" })).toBe("inline");
      expect(await loadSource({ kind: "lines", lines: ["one", "two"] })).toBe("one\ntwo");
      const stream = Readable.from([Buffer.from("str"), Buffer.from("eam")], { objectMode: false });
      expect(await loadSource({ kind: "stream", stream })).toBe("stream");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("newDocument", () => {
  it("records the source name on the root", () => {
    const doc = newDocument({ kind: "text", text: "", name: "inline.txt" });
    expect(doc.attribute(doc.root, "source")).toBe("inline.txt");
    expect(sourceName({ kind: "lines", lines: [] })).toBe("<lines>");
  });
});

describe("readDocument", () => {
  it("parses and always runs the reader's transforms", async () => {
    const source = { kind: "text" as const, text: "# Manual\n\nIntro.\n" };
    const { document, applied } = await readDocument(source, reader, settings, options());

    expect(applied).toEqual(["SectionIds", "DocTitle", "StripComments", "SectionContent"]);
    expect(document.attribute(document.root, "title")).toBe("Manual");
    expect(document.ids(document.root)).toEqual(["manual"]);
  });

  it("records recovered conditions in the diagnostics section", async () => {
    const reported: string[] = [];
    const source = { kind: "text" as const, text: "# One\n\nBody.\n\n# Two\n" };
    const { document, conditions } = await readDocument(source, reader, settings, options(reported));

    expect(conditions).toHaveLength(1);
    expect(conditions[0].message).toBe('Section "Two" has no content');
    expect(reported).toEqual(['WARNING [line 5] Section "Two" has no content']);

    const last = document.children(document.root).at(-1);
    expect(last !== undefined && sectionTitle(document, last)).toBe(DIAGNOSTICS_TITLE);
  });

  it("skips the transforms for an empty source", async () => {
    const { document, applied } = await readDocument({ kind: "text", text: "\n\n" }, reader, settings, options());
    expect(applied).toEqual([]);
    expect(document.childCount(document.root)).toBe(0);
  });
});
