import pino from "pino";
import { createLogger, type Logger, type LogLevel } from "@agent-escrow/core";
import { ensureHomeDir, getCurrentLogFile, rotateLogs } from "./home.js";

/**
 * File logger for CLI runs: one file per day under the agent home directory,
 * older files rotated away.
 */
export function createFileLogger(level: LogLevel = "info"): Logger {
  ensureHomeDir();
  rotateLogs();

  const destination = pino.destination({ dest: getCurrentLogFile(), append: true, sync: true });
  return createLogger(level, destination).child({ component: "cli" });
}
