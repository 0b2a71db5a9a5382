import { describe, it, expect } from "vitest";
import { paragraph, section } from "../document/nodes";
import { Document } from "../document/tree";
import { defaultRegistry } from "../settings/registry";
import { VisitorCondition } from "../utils/conditions";
import { Logger } from "../utils/logger";
import { Writer, type NodeVisitors, type Visitor } from "./writer";

type TestPart = "head" | "body";

function visitorTable(fallback: Visitor, overrides: Partial<NodeVisitors> = {}): NodeVisitors {
  return {
    document: overrides.document ?? fallback,
    section: overrides.section ?? fallback,
    title: overrides.title ?? fallback,
    paragraph: overrides.paragraph ?? fallback,
    text: overrides.text ?? fallback,
    comment: overrides.comment ?? fallback,
    system_message: overrides.system_message ?? fallback,
    element: overrides.element ?? fallback,
  };
}

/**
 * Writer that records "<kind>:<text>" for every visited node unless a
 * visitor is replaced
 */
class RecordingWriter extends Writer<TestPart> {
  protected readonly visitors: NodeVisitors;

  constructor(overrides: Partial<NodeVisitors> = {}) {
    super(["head", "body"], { mainPart: "body", logger: new Logger("silent") });
    const record: Visitor = (node, { document }) => {
      const value = document.kind(node) === "text" ? document.value(node) : "";
      this.append(`${document.kind(node)}${value ? `:${value}` : ""};`);
    };
    this.visitors = visitorTable(record, overrides);
  }
}

const settings = defaultRegistry.defaults();

function sample(): Document {
  const doc = new Document();
  doc.append(doc.root, section(doc, "One", [paragraph(doc, "a")]));
  doc.append(doc.root, paragraph(doc, "b"));
  return doc;
}

describe("Writer", () => {
  // ==========================================================================
  // Parts
  // ==========================================================================
  describe("parts", () => {
    it("appends and prepends in content order", () => {
      const writer = new RecordingWriter();
      writer.withPart("head", () => {
        writer.append("a");
        writer.append("b");
        writer.prepend("c");
      });
      expect(writer.fragments("head")).toEqual(["c", "a", "b"]);
      expect(writer.part("head")).toBe("cab");
    });

    it("requires an active part", () => {
      const writer = new RecordingWriter();
      expect(() => writer.append("x")).toThrow(/No active part/);
    });

    it("restores the previous part when the body throws", () => {
      const writer = new RecordingWriter();
      writer.withPart("body", () => {
        expect(() =>
          writer.withPart("head", () => {
            throw new Error("inner failure");
          }),
        ).toThrow("inner failure");
        expect(writer.currentPart).toBe("body");
      });
      expect(writer.currentPart).toBeNull();
    });

    it("rejects a main part that is not one of its parts", () => {
      class Bare extends Writer<string> {
        protected readonly visitors = visitorTable(() => "continue");
      }
      expect(() => new Bare(["body"], { mainPart: "head" })).toThrow(/not one of the writer's parts/);
    });

    it("emits every part in declaration order", () => {
      const writer = new RecordingWriter();
      writer.withPart("body", () => writer.append("B"));
      writer.withPart("head", () => writer.append("H"));
      expect(writer.output()).toBe("HB");
    });
  });

  // ==========================================================================
  // Traversal
  // ==========================================================================
  describe("traversal", () => {
    it("visits depth-first in pre-order into the main part", () => {
      const writer = new RecordingWriter();
      writer.attach(sample(), settings);
      expect(writer.part("body")).toBe(
        "document;section;title;text:One;paragraph;text:a;paragraph;text:b;",
      );
      expect(writer.part("head")).toBe("");
    });

    it("does nothing when the same document is attached again", () => {
      let visits = 0;
      const writer = new RecordingWriter({
        document: () => {
          visits++;
        },
      });
      const doc = sample();
      writer.attach(doc, settings);
      writer.attach(doc, settings);
      expect(visits).toBe(1);

      writer.attach(sample(), settings);
      expect(visits).toBe(2);
    });

    it("resets every part for a new document", () => {
      const writer = new RecordingWriter();
      writer.attach(sample(), settings);
      const doc = new Document();
      writer.attach(doc, settings);
      expect(writer.part("body")).toBe("document;");
    });

    it("skips children on skip-children", () => {
      const writer = new RecordingWriter({
        section: () => "skip-children",
      });
      writer.attach(sample(), settings);
      expect(writer.part("body")).toBe("document;paragraph;text:b;");
    });

    it("scopes skip-siblings to the current frame", () => {
      const doc = new Document();
      const first = section(doc, "One", [paragraph(doc, "a"), paragraph(doc, "hidden")]);
      doc.append(doc.root, first);
      doc.append(doc.root, paragraph(doc, "after"));

      const writer = new RecordingWriter({
        paragraph: (node, { document }) => {
          writer.append(`p:${document.textContent(node)};`);
          return document.textContent(node) === "a" ? "skip-siblings" : "skip-children";
        },
      });
      writer.attach(doc, settings);

      expect(writer.part("body")).toBe("document;section;title;text:One;p:a;text:a;p:after;");
    });

    it("lets visitors render children explicitly", () => {
      const writer = new RecordingWriter({
        section: (node, { visitChildren }) => {
          writer.append("<");
          visitChildren(node);
          writer.append(">");
          return "skip-children";
        },
      });
      writer.attach(sample(), settings);
      expect(writer.part("body")).toBe("document;<title;text:One;paragraph;text:a;>paragraph;text:b;");
    });
  });

  // ==========================================================================
  // Visitor errors
  // ==========================================================================
  describe("visitor errors", () => {
    const failingSection: Partial<NodeVisitors> = {
      section: () => {
        throw new Error("cannot render");
      },
    };

    it("records the failure and continues with the next sibling", () => {
      const writer = new RecordingWriter(failingSection);
      writer.attach(sample(), settings);

      expect(writer.part("body")).toBe("document;paragraph;text:b;");
      expect(writer.conditions).toHaveLength(1);
      expect(writer.conditions[0]).toBeInstanceOf(VisitorCondition);
      expect(writer.conditions[0].kind).toBe("section");
      expect(writer.conditions[0].message).toContain("cannot render");
    });

    it("propagates the failure under visitor-errors: propagate", () => {
      const writer = new RecordingWriter(failingSection);
      const doc = sample();
      expect(() => writer.attach(doc, settings.with({ "visitor-errors": "propagate" }))).toThrow(
        VisitorCondition,
      );
      expect(writer.document).toBeNull();
      expect(writer.currentPart).toBeNull();
    });
  });
});
