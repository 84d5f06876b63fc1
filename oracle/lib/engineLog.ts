/**
 * Structured logging for engine events.
 *
 * Emits one JSON object per line on stdout. The level comes from
 * BAZI_ORACLE_LOG_LEVEL unless a caller passes its own; an unset or
 * unrecognised value means info.
 */

import { LogLevelSchema, type LogLevel } from "./engineConfig.js";

export type EngineLogEvent =
  | "chart.analyze.started"
  | "chart.analyze.stage"
  | "chart.analyze.succeeded"
  | "chart.analyze.failed"
  | "hexagram.cast.succeeded";

export type EngineLogData = {
  event: EngineLogEvent;
  day_master?: string;
  pattern_id?: string;
  strength?: string;
  stage?: string;
  detail?: string;
  hexagram?: number;
  future_hexagram?: number | null;
  moving_lines?: number;
  duration_ms?: number;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = { silent: 0, info: 1, debug: 2 };

/** `started` and per-stage events are debug detail; outcomes are info. */
function levelOf(event: EngineLogEvent): LogLevel {
  return event.endsWith(".started") || event.endsWith(".stage") ? "debug" : "info";
}

function configuredLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.BAZI_ORACLE_LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}

export function engineLog(data: EngineLogData, level: LogLevel = configuredLevel()): void {
  if (LEVEL_ORDER[levelOf(data.event)] > LEVEL_ORDER[level]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const engineLogHelpers = {
  analyzeStarted(params: { day_master: string }, level?: LogLevel): void {
    engineLog({ event: "chart.analyze.started", day_master: params.day_master }, level);
  },

  stageCompleted(params: { stage: string; detail: string }, level?: LogLevel): void {
    engineLog({ event: "chart.analyze.stage", stage: params.stage, detail: params.detail }, level);
  },

  analyzeSucceeded(
    params: { day_master: string; pattern_id: string; strength: string; duration_ms: number },
    level?: LogLevel
  ): void {
    engineLog(
      {
        event: "chart.analyze.succeeded",
        day_master: params.day_master,
        pattern_id: params.pattern_id,
        strength: params.strength,
        duration_ms: params.duration_ms,
      },
      level
    );
  },

  analyzeFailed(params: { error_code: string; error_message: string }, level?: LogLevel): void {
    engineLog(
      {
        event: "chart.analyze.failed",
        error_code: params.error_code,
        error_message: params.error_message,
      },
      level
    );
  },

  castSucceeded(
    params: { hexagram: number; future_hexagram: number | null; moving_lines: number },
    level?: LogLevel
  ): void {
    engineLog(
      {
        event: "hexagram.cast.succeeded",
        hexagram: params.hexagram,
        future_hexagram: params.future_hexagram,
        moving_lines: params.moving_lines,
      },
      level
    );
  },
};
