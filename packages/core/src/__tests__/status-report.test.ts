import { describe, expect, it } from "vitest";
import { StatusReport, isOk, maxLevel } from "../status-report.js";

describe("maxLevel", () => {
  it("orders ok < warn < error < stale", () => {
    expect(maxLevel("ok", "warn")).toBe("warn");
    expect(maxLevel("error", "warn")).toBe("error");
    expect(maxLevel("error", "stale")).toBe("stale");
    expect(maxLevel("ok", "ok")).toBe("ok");
  });

  it("treats only ok as ok", () => {
    expect(isOk("ok")).toBe(true);
    expect(isOk("stale")).toBe(false);
  });
});

describe("StatusReport", () => {
  it("starts as a blank ok report", () => {
    const report = new StatusReport();
    expect(report.snapshot()).toEqual({
      name: "",
      level: "ok",
      message: "",
      hardwareId: "",
      fields: [],
    });
  });

  it("sets and copies summaries without touching fields", () => {
    const source = new StatusReport();
    source.summary("warn", "low battery");

    const report = new StatusReport();
    report.add("voltage", 11.2);
    report.summaryFrom(source);

    expect(report.level).toBe("warn");
    expect(report.message).toBe("low battery");
    expect(report.fields).toEqual([{ key: "voltage", value: "11.2" }]);
  });

  it("renders booleans and numbers, keeping duplicates in order", () => {
    const report = new StatusReport();
    report.add("calibrated", true);
    report.add("calibrated", false);
    report.add("count", 3);
    report.addf("temperature", "%d C (%s)", 41, "nominal");

    expect(report.fields).toEqual([
      { key: "calibrated", value: "True" },
      { key: "calibrated", value: "False" },
      { key: "count", value: "3" },
      { key: "temperature", value: "41 C (nominal)" },
    ]);
  });

  describe("mergeSummary", () => {
    it("ignores ok summaries", () => {
      const report = new StatusReport();
      report.mergeSummary("ok", "all good");
      expect(report.level).toBe("ok");
      expect(report.message).toBe("");
    });

    it("takes the first non-ok message and joins later ones", () => {
      const report = new StatusReport();
      report.mergeSummary("warn", "low battery");
      report.mergeSummary("ok", "fine");
      report.mergeSummary("error", "overheat");

      expect(report.level).toBe("error");
      expect(report.message).toBe("low battery; overheat");
    });

    it("formats printf-style summaries", () => {
      const report = new StatusReport();
      report.summaryf("warn", "battery at %d%%", 12);
      report.mergeSummaryf("error", "%s overheat", "motor");

      expect(report.level).toBe("error");
      expect(report.message).toBe("battery at 12%; motor overheat");
    });

    it("never lowers the level", () => {
      const report = new StatusReport();
      report.mergeSummary("stale", "no data");
      report.mergeSummary("warn", "drift");

      expect(report.level).toBe("stale");
      expect(report.message).toBe("no data; drift");
    });
  });

  it("clears summary and fields", () => {
    const report = new StatusReport();
    report.summary("error", "broken");
    report.add("k", "v");
    report.clear();

    expect(report.level).toBe("ok");
    expect(report.message).toBe("");
    expect(report.fields).toEqual([]);
  });

  it("snapshots are detached from later edits", () => {
    const report = new StatusReport();
    report.name = "imu";
    report.add("a", "1");
    const snap = report.snapshot();

    report.add("b", "2");
    report.summary("warn", "changed");

    expect(snap.fields).toEqual([{ key: "a", value: "1" }]);
    expect(snap.level).toBe("ok");
    expect(snap.name).toBe("imu");
  });
});
