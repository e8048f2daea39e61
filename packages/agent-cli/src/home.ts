import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "fs";
import { join } from "path";
import { homedir } from "os";

export const MAX_LOG_FILES = 10;

export function getHomeDir(): string {
  return process.env.AGENT_ESCROW_HOME || join(homedir(), ".agent-escrow");
}

export function getLogsDir(): string {
  return join(getHomeDir(), "logs");
}

export function getConfigFilePath(): string {
  return join(getHomeDir(), "config.json");
}

export function ensureHomeDir(): void {
  const dir = getHomeDir();
  const logsDir = getLogsDir();

  if (!existsSync(dir)) {
    mkdirSync(dir, { mode: 0o700, recursive: true });
  }
  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { mode: 0o700, recursive: true });
  }
}

/** Keeps the `maxFiles` most recently modified log files. */
export function rotateLogs(maxFiles: number = MAX_LOG_FILES): void {
  ensureHomeDir();

  const logsDir = getLogsDir();

  const files = readdirSync(logsDir)
    .filter((f) => f.endsWith(".log"))
    .map((f) => ({
      path: join(logsDir, f),
      mtime: statSync(join(logsDir, f)).mtime.getTime()
    }))
    .sort((a, b) => b.mtime - a.mtime);

  for (const file of files.slice(maxFiles)) {
    unlinkSync(file.path);
  }
}

export function getCurrentLogFile(now: Date = new Date()): string {
  const date = now.toISOString().split("T")[0];
  return join(getLogsDir(), `agent-${date}.log`);
}
