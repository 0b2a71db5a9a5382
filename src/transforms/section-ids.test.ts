import { describe, it, expect } from "vitest";
import { paragraph, section } from "../document/nodes";
import { Document } from "../document/tree";
import { doTransforms } from "../modules/scheduler";
import { defaultRegistry } from "../settings/registry";
import { Logger } from "../utils/logger";
import { OrderCounter } from "../utils/order-counter";
import { SectionIds } from "./section-ids";
import type { SettingValue } from "../types";

function run(doc: Document, overrides: Record<string, SettingValue> = {}) {
  const settings = defaultRegistry.defaults().with({ "section-prefix": "", ...overrides });
  return doTransforms(doc, [SectionIds], settings, {
    counter: new OrderCounter(),
    logger: new Logger("silent"),
    report: () => {},
  });
}

describe("SectionIds", () => {
  it("derives ids from section titles", () => {
    const doc = new Document();
    const intro = section(doc, "Getting Started (v2)", [paragraph(doc, "x")]);
    doc.append(doc.root, intro);

    run(doc);
    expect(doc.ids(intro)).toEqual(["getting-started-v2"]);
  });

  it("adds the configured prefix", () => {
    const doc = new Document();
    const intro = section(doc, "Intro", [paragraph(doc, "x")]);
    doc.append(doc.root, intro);

    run(doc, { "section-prefix": "sec-" });
    expect(doc.ids(intro)).toEqual(["sec-intro"]);
  });

  it("numbers repeated titles and reports the first repeat", () => {
    const doc = new Document();
    const first = section(doc, "Notes", [paragraph(doc, "a")]);
    const second = section(doc, "Notes", [paragraph(doc, "b")], { line: 9 });
    const third = section(doc, "Notes", [paragraph(doc, "c")]);
    doc.append(doc.root, first);
    doc.append(doc.root, second);
    doc.append(doc.root, third);

    const { conditions } = run(doc);
    expect([first, second, third].map((node) => doc.ids(node)[0])).toEqual([
      "notes",
      "notes--1",
      "notes--2",
    ]);
    expect(conditions).toEqual([
      { severity: 3, message: 'Duplicate section title "Notes"', node: second, line: 9 },
    ]);
  });

  it("keeps existing ids and avoids taking them again", () => {
    const doc = new Document();
    const fixed = section(doc, "Custom", [paragraph(doc, "a")], { ids: ["notes"] });
    const notes = section(doc, "Notes", [paragraph(doc, "b")]);
    doc.append(doc.root, fixed);
    doc.append(doc.root, notes);

    run(doc);
    expect(doc.ids(fixed)).toEqual(["notes"]);
    expect(doc.ids(notes)).toEqual(["notes--1"]);
  });
});
