import { describe, it, expect } from "vitest";
import { ConfigError, HaltError, VisitorCondition } from "./conditions";
import { Tracker } from "./tracker";

describe("Tracker", () => {
  it("counts sources and conditions", () => {
    const tracker = new Tracker();
    tracker.setTotalSources(3);
    tracker.incrementPublished();
    tracker.trackConditions([
      { severity: 5, message: "a" },
      { severity: 4, message: "b" },
      { severity: 2, message: "c" },
    ]);

    const stats = tracker.getStats();
    expect(stats.totalSources).toBe(3);
    expect(stats.publishedSources).toBe(1);
    expect(stats.conditions).toEqual({ WARNING: 2, INFO: 1 });
    expect(tracker.hasFailures()).toBe(false);
  });

  it("records halts with their transform", () => {
    const tracker = new Tracker();
    tracker.trackError("/docs/a.txt", new HaltError({ severity: 8, message: "Stop" }, "SectionContent"), "read");

    expect(tracker.getIssues("halt")).toEqual([
      { type: "halt", path: "/docs/a.txt", severity: 8, transform: "SectionContent", details: "Stop" },
    ]);
    expect(tracker.getStats().haltedSources).toBe(1);
    expect(tracker.hasFailures()).toBe(true);
  });

  it("maps errors to issue types", () => {
    const tracker = new Tracker();
    const missing = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
    tracker.trackError("/docs/missing.txt", missing, "read");
    tracker.trackError("/out/a.html", new Error("disk full"), "write");
    tracker.trackError("/docs/b.txt", new VisitorCondition(3, "title", new Error("x")), "read");
    tracker.trackError("/docs/c.txt", new ConfigError("Invalid", { path: "/docs/docpress.conf" }), "read");

    expect(tracker.getIssues().map((issue) => issue.type)).toEqual(["read", "write", "write", "config"]);
    expect(tracker.getIssues("read")[0].reason).toBe("not-found");
    expect(tracker.getIssues("write").map((issue) => issue.reason)).toEqual(["write-error", "visitor-error"]);
    expect(tracker.getIssues("config")[0].path).toBe("/docs/docpress.conf");
    expect(tracker.getStats().failedSources).toBe(4);
  });

  it("records structural warnings as configuration issues", () => {
    const tracker = new Tracker();
    tracker.trackWarnings([
      { type: "structural", path: "/etc/docpress.conf", line: 3, message: "Malformed line ignored" },
      { type: "structural", path: "/etc/other.conf", message: "Cannot read configuration file" },
    ]);

    expect(tracker.getIssues("config").map((issue) => [issue.reason, issue.details])).toEqual([
      ["malformed-line", "line 3: Malformed line ignored"],
      ["read-error", "Cannot read configuration file"],
    ]);
    expect(tracker.hasFailures()).toBe(false);
  });
});
