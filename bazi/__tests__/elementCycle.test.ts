import { describe, it, expect } from "vitest";
import {
  BRANCHES,
  HIDDEN_STEM_SCALE,
  STEMS,
  branchPolarity,
  controlledBy,
  controls,
  elementRelation,
  generatedBy,
  generates,
  hiddenStems,
  primaryHiddenStem,
  stemCombination,
  stemElement,
  stemPolarity,
} from "../elementCycle.js";
import { cycleIndex, decadeVoid, isSexagenaryPair, nayinOf, pillarAt } from "../sexagenary.js";

describe("elementCycle", () => {
  it("weights every branch's hidden stems to the fixed scale", () => {
    for (const branch of BRANCHES) {
      const total = hiddenStems(branch).reduce((sum, h) => sum + h.weight, 0);
      expect(total).toBe(HIDDEN_STEM_SCALE);
    }
  });

  it("orders hidden stems primary first", () => {
    expect(hiddenStems("寅").map((h) => [h.stem, h.rank])).toEqual([
      ["甲", "primary"],
      ["丙", "secondary"],
      ["戊", "tertiary"],
    ]);
    expect(primaryHiddenStem("申")).toBe("庚");
    expect(primaryHiddenStem("子")).toBe("癸");
  });

  it("assigns yang to odd-numbered symbols", () => {
    expect(stemPolarity("甲")).toBe("yang");
    expect(stemPolarity("癸")).toBe("yin");
    expect(branchPolarity("子")).toBe("yang");
    expect(branchPolarity("亥")).toBe("yin");
  });

  it("walks both cycles", () => {
    expect(generates("wood")).toBe("fire");
    expect(generatedBy("wood")).toBe("water");
    expect(controls("wood")).toBe("earth");
    expect(controlledBy("wood")).toBe("metal");
    expect(elementRelation("metal", "fire")).toBe("controlled_by");
    expect(elementRelation("water", "wood")).toBe("generates");
  });

  it("combines stems five apart", () => {
    expect(stemCombination("甲", "己")).toBe("earth");
    expect(stemCombination("庚", "乙")).toBe("metal");
    expect(stemCombination("戊", "癸")).toBe("fire");
    expect(stemCombination("甲", "庚")).toBeNull();
  });

  it("keeps stem elements in pairs", () => {
    expect(STEMS.map(stemElement)).toEqual([
      "wood", "wood", "fire", "fire", "earth", "earth", "metal", "metal", "water", "water",
    ]);
  });
});

describe("sexagenary", () => {
  it("accepts only same-polarity pairs", () => {
    expect(isSexagenaryPair("甲", "子")).toBe(true);
    expect(isSexagenaryPair("甲", "丑")).toBe(false);
  });

  it("places pillars in the sixty cycle", () => {
    expect(cycleIndex("甲", "子")).toBe(0);
    expect(cycleIndex("丙", "寅")).toBe(2);
    expect(cycleIndex("癸", "亥")).toBe(59);
    expect(pillarAt(59)).toEqual({ stem: "癸", branch: "亥" });
    expect(pillarAt(-1)).toEqual({ stem: "癸", branch: "亥" });
  });

  it("finds the two void branches of a decade", () => {
    expect(decadeVoid("甲", "子")).toEqual(["戌", "亥"]);
    expect(decadeVoid("甲", "戌")).toEqual(["申", "酉"]);
    expect(decadeVoid("壬", "戌")).toEqual(["子", "丑"]);
  });

  it("looks up nayin by pair", () => {
    expect(nayinOf("甲", "子")).toEqual({ label: "海中金", element: "metal" });
    expect(nayinOf("丙", "寅")).toEqual({ label: "炉中火", element: "fire" });
    expect(nayinOf("壬", "戌")).toEqual({ label: "大海水", element: "water" });
  });
});
