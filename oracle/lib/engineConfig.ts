import { z } from "zod";

export const LOG_LEVELS = ["silent", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LogLevelSchema = z.enum(LOG_LEVELS);

const EngineEnvSchema = z.object({
  BAZI_ORACLE_LOG_LEVEL: LogLevelSchema.default("info"),
  BAZI_ORACLE_HIDDEN_TEN_GODS: z.enum(["on", "off"]).default("on"),
});

export interface EngineConfig {
  log_level: LogLevel;
  include_hidden_ten_gods: boolean;
}

export class EngineConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid engine configuration: ${issues.join("; ")}`);
    this.name = "EngineConfigError";
  }
}

/**
 * Read engine settings from the environment. Unset variables take their
 * defaults; empty strings count as unset.
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const result = EngineEnvSchema.safeParse({
    BAZI_ORACLE_LOG_LEVEL: env.BAZI_ORACLE_LOG_LEVEL || undefined,
    BAZI_ORACLE_HIDDEN_TEN_GODS: env.BAZI_ORACLE_HIDDEN_TEN_GODS || undefined,
  });

  if (!result.success) {
    throw new EngineConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    log_level: result.data.BAZI_ORACLE_LOG_LEVEL,
    include_hidden_ten_gods: result.data.BAZI_ORACLE_HIDDEN_TEN_GODS === "on",
  };
}
