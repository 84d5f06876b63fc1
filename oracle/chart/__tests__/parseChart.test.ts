import { describe, it, expect } from "vitest";
import { InvalidChartError } from "../errors.js";
import { parseChart, parseChartFromGanZhi, pillarsOf } from "../parseChart.js";

const VALID = {
  year: { stem: "壬", branch: "午" },
  month: { stem: "庚", branch: "寅" },
  day: { stem: "甲", branch: "辰" },
  hour: { stem: "辛", branch: "酉" },
  gender: "female",
};

function issuesOf(input: unknown): readonly string[] {
  try {
    parseChart(input);
  } catch (err) {
    if (err instanceof InvalidChartError) return err.issues;
    throw err;
  }
  throw new Error("expected parseChart to fail");
}

describe("parseChart", () => {
  it("yields four pillars with the day stem as day master", () => {
    const chart = parseChart(VALID);
    expect(pillarsOf(chart)).toHaveLength(4);
    expect(pillarsOf(chart).map((p) => p.role)).toEqual(["year", "month", "day", "hour"]);
    expect(chart.day).toEqual({ role: "day", stem: "甲", branch: "辰" });
    expect(chart.gender).toBe("female");
  });

  it("rejects a pair whose polarities differ", () => {
    expect(issuesOf({ ...VALID, year: { stem: "甲", branch: "丑" } })).toEqual([
      "year: stem and branch do not form a sexagenary pair",
    ]);
  });

  it("rejects symbols outside the canonical sets", () => {
    const issues = issuesOf({ ...VALID, day: { stem: "X", branch: "辰" } });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("day.stem: ")).toBe(true);
  });

  it("rejects a missing pillar and an unknown gender together", () => {
    const { hour: _hour, ...withoutHour } = VALID;
    const issues = issuesOf({ ...withoutHour, gender: "other" });
    expect(issues.map((i) => i.split(":")[0])).toEqual(["hour", "gender"]);
  });

  it("names the error", () => {
    expect(() => parseChart(null)).toThrow(InvalidChartError);
    expect(() => parseChart(null)).toThrow(/^Invalid chart: /);
  });
});

describe("parseChartFromGanZhi", () => {
  it("splits two-character pillars", () => {
    const chart = parseChartFromGanZhi(["壬午", "庚寅", "甲辰", "辛酉"], "male");
    expect(chart.hour).toEqual({ role: "hour", stem: "辛", branch: "酉" });
    expect(chart.gender).toBe("male");
  });

  it("requires exactly four pillars", () => {
    expect(() => parseChartFromGanZhi(["壬午", "庚寅", "甲辰"], "male")).toThrow(
      "Invalid chart: chart: expected 4 pillars, got 3"
    );
  });

  it("reports malformed pillar strings", () => {
    expect(() => parseChartFromGanZhi(["壬午", "庚", "甲辰", "辛酉"], "male")).toThrow(
      InvalidChartError
    );
  });
});
