import { describe, it, expect } from "vitest";
import { analyzeCompatibility } from "../analyzeCompatibility.js";
import { parseChartFromGanZhi } from "../parseChart.js";

const person = (day: string, gender: "male" | "female") =>
  parseChartFromGanZhi(["庚午", "戊寅", day, "丙寅"], gender);

describe("analyzeCompatibility", () => {
  it("rewards combining day stems and harmonising day branches, capped at 100", () => {
    const result = analyzeCompatibility(person("甲子", "male"), person("己丑", "female"));
    expect(result.findings).toEqual([
      { kind: "day_stem_combination", label: "甲己合土", delta: 30 },
      { kind: "day_branch_harmony", label: "子丑六合", delta: 20 },
    ]);
    expect(result.score).toBe(100);
    expect(result.same_gender).toBe(false);
  });

  it("marks a day-branch clash down from the base score", () => {
    const result = analyzeCompatibility(person("甲子", "female"), person("庚午", "female"));
    expect(result.findings).toEqual([{ kind: "day_branch_clash", label: "子午相冲", delta: -10 }]);
    expect(result.score).toBe(50);
    expect(result.same_gender).toBe(true);
  });

  it("starts from 60 when the day pillars do not interact", () => {
    expect(analyzeCompatibility(person("甲子", "male"), person("甲辰", "female")).score).toBe(60);
  });
});
