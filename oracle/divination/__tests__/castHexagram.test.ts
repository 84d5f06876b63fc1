import { describe, it, expect, vi, afterEach } from "vitest";
import {
  castHexagram,
  figureOf,
  hexagramFromLineValues,
  lineValueFromFaces,
  mirrorCode,
  tossLine,
  type LineValue,
} from "../castHexagram.js";
import {
  randomCoinSource,
  scriptedCoinSource,
  seededCoinSource,
  type CoinFace,
} from "../coinSource.js";
import { HEXAGRAM_COUNT } from "../hexagramTable.js";

const FACES: CoinFace[] = ["heads", "tails"];

describe("line values", () => {
  it("sums heads as 3 and tails as 2", () => {
    expect(lineValueFromFaces(["tails", "tails", "tails"])).toBe(6);
    expect(lineValueFromFaces(["heads", "tails", "tails"])).toBe(7);
    expect(lineValueFromFaces(["heads", "heads", "tails"])).toBe(8);
    expect(lineValueFromFaces(["heads", "heads", "heads"])).toBe(9);
  });

  it("yields 6/7/8/9 in the ratio 1:3:3:1 over all toss outcomes", () => {
    const counts: Record<LineValue, number> = { 6: 0, 7: 0, 8: 0, 9: 0 };
    for (const a of FACES) {
      for (const b of FACES) {
        for (const c of FACES) {
          counts[lineValueFromFaces([a, b, c])]++;
        }
      }
    }
    expect(counts).toEqual({ 6: 1, 7: 3, 8: 3, 9: 1 });
  });

  it("approaches 1/8, 3/8, 3/8, 1/8 over a large seeded sample", () => {
    const coins = seededCoinSource(20240601);
    const samples = 40_000;
    const counts: Record<LineValue, number> = { 6: 0, 7: 0, 8: 0, 9: 0 };
    for (let i = 0; i < samples; i++) counts[tossLine(coins)]++;

    expect(counts[6] / samples).toBeCloseTo(1 / 8, 1);
    expect(counts[7] / samples).toBeCloseTo(3 / 8, 1);
    expect(counts[8] / samples).toBeCloseTo(3 / 8, 1);
    expect(counts[9] / samples).toBeCloseTo(1 / 8, 1);
  });

  it("rejects the wrong number of coins", () => {
    expect(() => lineValueFromFaces(["heads", "heads"])).toThrow(RangeError);
  });
});

describe("hexagramFromLineValues", () => {
  it("builds the code bottom line first", () => {
    const hexagram = hexagramFromLineValues([7, 8, 8, 8, 7, 8]);
    expect(hexagram.code).toBe(17);
    expect(hexagram.hexagram.name).toBe("水雷屯");
    expect(hexagram.hexagram.number).toBe(3);
    expect(hexagram.lower_trigram.name).toBe("震");
    expect(hexagram.upper_trigram.name).toBe("坎");
    expect(hexagram.moving_lines).toEqual([]);
    expect(hexagram.future).toBeNull();
  });

  it("flips only the moving lines for the future hexagram", () => {
    const hexagram = hexagramFromLineValues([9, 8, 8, 8, 7, 8]);
    expect(hexagram.code).toBe(17);
    expect(hexagram.moving_lines).toEqual([1]);
    expect(hexagram.lines[0]).toEqual({ position: 1, value: 9, yang: true, moving: true, label: "老阳" });
    expect(hexagram.future?.code).toBe(16);
    expect(hexagram.future?.hexagram.name).toBe("水地比");
  });

  it("derives the nuclear, shadow and mirror figures", () => {
    const { derived } = hexagramFromLineValues([7, 8, 8, 8, 7, 8]);
    expect(derived.nuclear.hexagram.name).toBe("山地剥");
    expect(derived.shadow.hexagram.name).toBe("火风鼎");
    expect(derived.mirror.hexagram.name).toBe("山水蒙");
  });

  it("requires six lines", () => {
    expect(() => hexagramFromLineValues([7, 7, 7])).toThrow(RangeError);
  });

  it("returns a frozen record", () => {
    const hexagram = hexagramFromLineValues([6, 6, 6, 6, 6, 6]);
    expect(Object.isFrozen(hexagram)).toBe(true);
    expect(Object.isFrozen(hexagram.lines)).toBe(true);
  });
});

describe("hexagram table", () => {
  it("resolves every 6-bit code to a distinct name", () => {
    const names = new Set<string>();
    for (let code = 0; code < HEXAGRAM_COUNT; code++) {
      const figure = figureOf(code);
      expect(figure.hexagram.code).toBe(code);
      expect(figure.hexagram.name.length).toBeGreaterThan(0);
      names.add(figure.hexagram.name);
    }
    expect(names.size).toBe(HEXAGRAM_COUNT);
  });

  it("mirrors a code back to itself when applied twice", () => {
    for (let code = 0; code < HEXAGRAM_COUNT; code++) {
      expect(mirrorCode(mirrorCode(code))).toBe(code);
    }
  });
});

describe("castHexagram", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("casts and logs at info under an unrecognised log level setting", () => {
    vi.stubEnv("BAZI_ORACLE_LOG_LEVEL", "loud");
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    const hexagram = castHexagram({ coins: scriptedCoinSource(Array<CoinFace>(18).fill("heads")) });

    expect(hexagram.hexagram.number).toBe(1);
    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect([entry.event, entry.hexagram, entry.future_hexagram, entry.moving_lines]).toEqual([
      "hexagram.cast.succeeded",
      1,
      2,
      6,
    ]);
  });

  it("turns six rounds of three heads into 乾 moving to 坤", () => {
    const coins = scriptedCoinSource(Array<CoinFace>(18).fill("heads"));
    const hexagram = castHexagram({ coins, logLevel: "silent" });
    expect(hexagram.hexagram.name).toBe("乾为天");
    expect(hexagram.moving_lines).toEqual([1, 2, 3, 4, 5, 6]);
    expect(hexagram.future?.hexagram.name).toBe("坤为地");
  });

  it("emits no future hexagram when nothing moves", () => {
    // heads-tails-tails = 7 on every line
    const faces: CoinFace[] = [];
    for (let i = 0; i < 6; i++) faces.push("heads", "tails", "tails");
    const hexagram = castHexagram({ coins: scriptedCoinSource(faces) });
    expect(hexagram.code).toBe(63);
    expect(hexagram.future).toBeNull();
  });

  it("repeats itself for the same seed", () => {
    const a = castHexagram({ coins: seededCoinSource(7) });
    const b = castHexagram({ coins: seededCoinSource(7) });
    expect(a.lines.map((l) => l.value)).toEqual(b.lines.map((l) => l.value));
  });

  it("casts from a fresh random source by default", () => {
    const hexagram = castHexagram();
    expect(hexagram.lines).toHaveLength(6);
    for (const line of hexagram.lines) {
      expect([6, 7, 8, 9]).toContain(line.value);
    }
  });

  it("stops when a scripted source runs out", () => {
    expect(() => castHexagram({ coins: scriptedCoinSource(["heads"]) })).toThrow(/exhausted/);
  });

  it("draws from crypto when asked directly", () => {
    const coins = randomCoinSource();
    expect(FACES).toContain(coins.flip());
  });
});
