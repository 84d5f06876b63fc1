import { describe, it, expect } from "vitest";
import { EngineConfigError, loadEngineConfig } from "../engineConfig.js";

describe("loadEngineConfig", () => {
  it("defaults to info logging with hidden ten gods", () => {
    expect(loadEngineConfig({})).toEqual({ log_level: "info", include_hidden_ten_gods: true });
  });

  it("treats empty values as unset", () => {
    expect(loadEngineConfig({ BAZI_ORACLE_LOG_LEVEL: "" }).log_level).toBe("info");
  });

  it("reads overrides", () => {
    expect(
      loadEngineConfig({ BAZI_ORACLE_LOG_LEVEL: "debug", BAZI_ORACLE_HIDDEN_TEN_GODS: "off" })
    ).toEqual({ log_level: "debug", include_hidden_ten_gods: false });
  });

  it("rejects unknown values", () => {
    let caught: unknown;
    try {
      loadEngineConfig({ BAZI_ORACLE_LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EngineConfigError);
    if (caught instanceof EngineConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith("BAZI_ORACLE_LOG_LEVEL: ")).toBe(true);
    }
  });

  it("reads the suite's own environment", () => {
    expect(loadEngineConfig().log_level).toBe("silent");
  });
});
