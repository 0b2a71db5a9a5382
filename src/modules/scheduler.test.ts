import { describe, it, expect } from "vitest";
import { DIAGNOSTICS_TITLE, paragraph, section, sectionTitle } from "../document/nodes";
import { Document } from "../document/tree";
import { defaultRegistry } from "../settings/registry";
import { Transform, type TransformContext, type TransformSpec } from "../transforms/transform";
import { HaltError, condition } from "../utils/conditions";
import { Logger } from "../utils/logger";
import { OrderCounter } from "../utils/order-counter";
import { doTransforms, type TransformRunOptions } from "./scheduler";
import type { Condition, NodeId, SettingValue } from "../types";

const quiet = new Logger("silent");

function settingsWith(overrides: Record<string, SettingValue> = {}) {
  return defaultRegistry.defaults().with(overrides);
}

function documentWithContent(): { doc: Document; para: NodeId } {
  const doc = new Document();
  const para = paragraph(doc, "content");
  doc.append(doc.root, para);
  return { doc, para };
}

/**
 * Transform class that records its name when applied
 */
function recorder(
  log: string[],
  label: string,
  level: number,
  outcome?: (context: TransformContext) => Condition | void,
) {
  return class extends Transform {
    readonly priority = level;

    get name(): string {
      return label;
    }

    apply(context: TransformContext): Condition | void {
      log.push(label);
      return outcome?.(context);
    }
  };
}

function run(
  doc: Document,
  specs: TransformSpec[],
  overrides: Record<string, SettingValue> = {},
  options: TransformRunOptions = {},
) {
  return doTransforms(doc, specs, settingsWith(overrides), {
    counter: new OrderCounter(),
    logger: quiet,
    report: () => {},
    ...options,
  });
}

function diagnosticsSections(doc: Document): NodeId[] {
  return doc
    .children(doc.root)
    .filter((child) => doc.kind(child) === "section" && sectionTitle(doc, child) === DIAGNOSTICS_TITLE);
}

describe("doTransforms", () => {
  // ==========================================================================
  // Ordering
  // ==========================================================================
  describe("ordering", () => {
    it("runs distinct priorities in ascending order whatever the input order", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      const specs = [recorder(log, "late", 700), recorder(log, "early", 10), recorder(log, "middle", 300)];

      const result = run(doc, specs);
      expect(log).toEqual(["early", "middle", "late"]);
      expect(result.applied).toEqual(["early", "middle", "late"]);
    });

    it("keeps scheduling order among equal priorities", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      const labels = ["t0", "t1", "t2", "t3", "t4", "t5", "t6", "t7"];

      run(doc, labels.map((label) => recorder(log, label, 500)));
      expect(log).toEqual(labels);
    });

    it("reuses transform instances and orders them by their order", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      const Second = recorder(log, "second", 400);
      const First = recorder(log, "first", 400);

      run(doc, [new Second(doc.root, 9), new First(doc.root, 2)]);
      expect(log).toEqual(["first", "second"]);
    });

    it("runs plain functions at priority 950 in list order", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      function one() {
        log.push("one");
      }
      function two() {
        log.push("two");
      }

      run(doc, [two, recorder(log, "after", 960), one, recorder(log, "before", 900)]);
      expect(log).toEqual(["before", "two", "one", "after"]);
    });

    it("rejects priorities outside 0-999", () => {
      const { doc } = documentWithContent();
      expect(() => run(doc, [recorder([], "bad", 1000)])).toThrow(RangeError);
    });

    it("sorts transforms scheduled during the run into the pending remainder", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      const scheduler = recorder(log, "schedules", 100, ({ schedule }) => {
        schedule(recorder(log, "added-low", 50));
        schedule(recorder(log, "added-high", 300));
      });

      run(doc, [recorder(log, "existing", 200), scheduler]);
      expect(log).toEqual(["schedules", "added-low", "existing", "added-high"]);
    });
  });

  // ==========================================================================
  // Empty documents
  // ==========================================================================
  describe("empty documents", () => {
    it("skips every transform and creates no diagnostics section", () => {
      const log: string[] = [];
      const doc = new Document();

      const result = run(doc, [recorder(log, "fails", 100, () => condition(5, "never"))]);
      expect(log).toEqual([]);
      expect(result.applied).toEqual([]);
      expect(doc.childCount(doc.root)).toBe(0);
    });
  });

  // ==========================================================================
  // Diagnostics section
  // ==========================================================================
  describe("diagnostics section", () => {
    it("creates the section on the first failure and reuses it", () => {
      const { doc } = documentWithContent();
      const result = run(doc, [
        recorder([], "a", 100, () => condition(3, "first")),
        recorder([], "b", 200, () => condition(5, "second")),
      ]);

      const sections = diagnosticsSections(doc);
      expect(sections).toHaveLength(1);
      expect(doc.children(doc.root).at(-1)).toBe(sections[0]);

      const messages = doc.children(sections[0]).slice(1);
      expect(messages.map((message) => doc.textContent(message))).toEqual(["first", "second"]);
      expect(messages.map((message) => doc.attribute(message, "source"))).toEqual(["a", "b"]);
      expect(result.conditions.map((c) => c.message)).toEqual(["first", "second"]);
    });

    it("creates no section when nothing fails", () => {
      const { doc } = documentWithContent();
      run(doc, [recorder([], "ok", 100)]);
      expect(diagnosticsSections(doc)).toEqual([]);
    });

    it("removes an existing section that holds only its title", () => {
      const { doc } = documentWithContent();
      doc.append(doc.root, section(doc, DIAGNOSTICS_TITLE));

      run(doc, [recorder([], "ok", 100)]);
      expect(diagnosticsSections(doc)).toEqual([]);
    });

    it("appends into the last of several existing sections", () => {
      const { doc } = documentWithContent();
      const first = section(doc, DIAGNOSTICS_TITLE, [paragraph(doc, "old")]);
      const last = section(doc, DIAGNOSTICS_TITLE, [paragraph(doc, "older")]);
      doc.append(doc.root, first);
      doc.append(doc.root, last);

      run(doc, [recorder([], "a", 100, () => condition(3, "new"))]);
      expect(doc.childCount(first)).toBe(2);
      expect(doc.childCount(last)).toBe(3);
    });

    it("links the diagnostic to the originating node", () => {
      const { doc, para } = documentWithContent();
      run(doc, [recorder([], "a", 100, () => condition(3, "points at para", { node: para, line: 7 }))]);

      const [sectionNode] = diagnosticsSections(doc);
      const message = doc.children(sectionNode)[1];
      const [id] = doc.ids(para);

      expect(id).toMatch(/^id-[a-z0-9]{6}$/);
      expect(doc.backrefs(message)).toEqual([para]);
      expect(doc.attribute(message, "backrefs")).toEqual([id]);
      expect(doc.attribute(message, "line")).toBe(7);
      expect(doc.attribute(message, "type")).toBe("INFO");
    });
  });

  // ==========================================================================
  // Escalation
  // ==========================================================================
  describe("escalation", () => {
    it("reports conditions at or above report-level", () => {
      const reported: string[] = [];
      const { doc } = documentWithContent();

      run(
        doc,
        [
          recorder([], "warns", 100, () => condition(5, "Reported", { line: 2 })),
          recorder([], "informs", 200, () => condition(3, "Quiet")),
        ],
        { "report-level": 4 },
        { report: (line) => reported.push(line) },
      );

      expect(reported).toEqual(["WARNING [line 2] Reported"]);
      const [sectionNode] = diagnosticsSections(doc);
      expect(doc.childCount(sectionNode)).toBe(3);
    });

    it("halts at halt-level and runs nothing after the failing transform", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      const specs = [
        recorder(log, "before", 100),
        recorder(log, "fatal", 200, () => condition(8, "Stop here")),
        recorder(log, "after", 300),
      ];

      let caught: unknown;
      try {
        run(doc, specs, { "halt-level": 8 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(HaltError);
      expect(caught instanceof HaltError && caught.transform).toBe("fatal");
      expect(caught instanceof HaltError && caught.condition.severity).toBe(8);
      expect(log).toEqual(["before", "fatal"]);
    });

    it("recovers below halt-level and continues with the next transform", () => {
      const log: string[] = [];
      const { doc } = documentWithContent();
      const result = run(
        doc,
        [recorder(log, "fails", 100, () => condition(7, "Recovered")), recorder(log, "next", 200)],
        { "halt-level": 8 },
      );
      expect(log).toEqual(["fails", "next"]);
      expect(result.conditions).toEqual([{ severity: 7, message: "Recovered" }]);
    });

    it("treats a condition raised through fail() like a returned one", () => {
      const { doc } = documentWithContent();
      const result = run(doc, [recorder([], "raises", 100, ({ fail }) => fail(5, "Raised", { line: 4 }))]);
      expect(result.conditions).toEqual([{ severity: 5, message: "Raised", line: 4, node: undefined }]);
    });

    it("turns other errors into fatal conditions", () => {
      const { doc } = documentWithContent();
      const crashing = recorder([], "Crashing", 100, () => {
        throw new Error("kaboom");
      });

      expect(() => run(doc, [crashing])).toThrow("Crashing: FATAL Crashing failed: kaboom");
    });
  });
});
