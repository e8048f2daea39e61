import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export function createLogger(
  level: LogLevel = "info",
  destination?: pino.DestinationStream
): Logger {
  const options: pino.LoggerOptions = {
    level,
    base: { service: "agent-escrow" },
    timestamp: pino.stdTimeFunctions.isoTime
  };
  return destination ? pino(options, destination) : pino(options);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
