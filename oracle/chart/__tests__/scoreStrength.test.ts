import { describe, it, expect } from "vitest";
import { parseChartFromGanZhi } from "../parseChart.js";
import { STRENGTH_POLICY_V1 } from "../policy/strengthPolicy.v1.js";
import { resolveTenGods } from "../resolveTenGods.js";
import { scoreStrength } from "../scoreStrength.js";

function score(pillars: string[], includeHidden = true) {
  const chart = parseChartFromGanZhi(pillars, "male");
  return scoreStrength(chart, resolveTenGods(chart, { includeHidden }));
}

describe("scoreStrength", () => {
  // 寅 month: 甲 friend 40 × 6/10 = 24; 壬 year stem 10; 辰 day branch 乙 3 + 癸 1
  const AT_THRESHOLD = ["壬午", "庚寅", "甲辰", "辛酉"];
  // 申 day branch instead: only 壬 3
  const BELOW_THRESHOLD = ["壬午", "庚寅", "甲申", "辛酉"];

  it("is strong exactly at the in-season threshold", () => {
    const result = score(AT_THRESHOLD);
    expect(result.score).toBe(38);
    expect(result.threshold).toBe(38);
    expect(result.in_season).toBe(true);
    expect(result.label).toBe("strong");
    expect(result.favorable_elements).toEqual(["metal", "fire"]);
    expect(result.policy_version).toBe("strength_v1");
  });

  it("is weak one point below it", () => {
    const result = score(BELOW_THRESHOLD);
    expect(result.score).toBe(37);
    expect(result.label).toBe("weak");
    expect(result.favorable_elements).toEqual(["wood", "water"]);
  });

  it("lists each scoring position", () => {
    expect(score(AT_THRESHOLD).contributions).toEqual([
      { role: "year", position: "stem", stem: "壬", ten_god: "indirect_resource", points: 10 },
      { role: "month", position: "branch", stem: "甲", ten_god: "friend", points: 24 },
      { role: "day", position: "branch", stem: "乙", ten_god: "rob_wealth", points: 3 },
      { role: "day", position: "branch", stem: "癸", ten_god: "direct_resource", points: 1 },
    ]);
  });

  it("raises the bar out of season", () => {
    // 酉 month is metal: neither wood nor water
    const result = score(["庚午", "乙酉", "甲戌", "丁卯"]);
    expect(result.in_season).toBe(false);
    expect(result.threshold).toBe(48);
    expect(result.score).toBe(20);
    expect(result.label).toBe("weak");
  });

  it("scores the same when the mapping omits hidden stems", () => {
    expect(score(AT_THRESHOLD, false).score).toBe(38);
  });

  it("honours a caller's policy", () => {
    const chart = parseChartFromGanZhi(AT_THRESHOLD, "male");
    const result = scoreStrength(chart, resolveTenGods(chart), {
      ...STRENGTH_POLICY_V1,
      strength_policy_version: "strength_test",
      thresholds: { in_season: 39, out_of_season: 48 },
    });
    expect(result.label).toBe("weak");
    expect(result.policy_version).toBe("strength_test");
  });
});
