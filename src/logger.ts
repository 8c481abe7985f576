import { appendJsonl, RUNS_FILE } from "./data.js";
import type { RunRecord } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return LEVELS[level];
  }
  return LEVELS.info;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold();
}

export function logDebug(msg: string): void {
  if (enabled("debug")) console.log(`[debug] ${msg}`);
}

export function logInfo(msg: string): void {
  if (enabled("info")) console.log(`[info] ${msg}`);
}

export function logWarn(msg: string): void {
  if (enabled("warn")) console.warn(`[warn] ${msg}`);
}

export function logError(msg: string): void {
  if (enabled("error")) console.error(`[error] ${msg}`);
}

export function logRun(run: RunRecord, file: string = RUNS_FILE): void {
  appendJsonl(file, run);

  const symbol = run.status === "success" ? ">>>" : "!!!";
  logInfo(
    `${symbol} run ${run.runId.slice(0, 8)} ${run.status}: ${run.measurements} measurements${
      run.outputPath ? ` → ${run.outputPath}` : ""
    }`
  );
}
