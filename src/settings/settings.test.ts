import { describe, it, expect } from "vitest";
import { Settings, normalizeOptionName } from "./settings";

describe("normalizeOptionName", () => {
  it("lower-cases, trims and treats underscores as hyphens", () => {
    expect(normalizeOptionName("  Report_Level ")).toBe("report-level");
  });
});

describe("Settings", () => {
  const settings = new Settings([
    ["strip_comments", true],
    ["tab-width", 4],
    ["title", null],
    ["tags", ["a", "b"]],
  ]);

  it("looks up values by normalized name", () => {
    expect(settings.has("STRIP-COMMENTS")).toBe(true);
    expect(settings.boolean("strip-comments")).toBe(true);
    expect(settings.integer("tab_width")).toBe(4);
    expect(settings.optionalString("title")).toBeNull();
    expect(settings.list("tags")).toEqual(["a", "b"]);
  });

  it("throws on unknown names and mismatched types", () => {
    expect(() => settings.boolean("missing")).toThrow(/Unknown setting/);
    expect(() => settings.string("tab-width")).toThrow(TypeError);
  });

  it("is frozen; with() returns a new mapping", () => {
    expect(Object.isFrozen(settings)).toBe(true);
    const changed = settings.with({ "tab-width": 2 });
    expect(changed.integer("tab-width")).toBe(2);
    expect(settings.integer("tab-width")).toBe(4);
  });
});
