import { Layer, Logger, LogLevel } from "effect";
import pc from "picocolors";
import type { FaultlineLogLevel } from "./config.js";

const LEVELS: Record<FaultlineLogLevel, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

function colorFor(level: LogLevel.LogLevel): (text: string) => string {
  if (LogLevel.greaterThanEqual(level, LogLevel.Error)) return pc.red;
  if (LogLevel.greaterThanEqual(level, LogLevel.Warning)) return pc.yellow;
  if (LogLevel.greaterThanEqual(level, LogLevel.Info)) return pc.cyan;
  return pc.gray;
}

/**
 * Format one log line; messages logged as arrays are joined with spaces
 */
export function formatLogLine(level: LogLevel.LogLevel, message: unknown): string {
  const text = Array.isArray(message) ? message.map(String).join(" ") : String(message);
  return `[faultline:${level.label}] ${text}`;
}

/**
 * Logger layer writing to stderr, so stdout stays clean for command output
 * and the stdio protocol transport
 */
export const createLoggerLayer = (level: FaultlineLogLevel): Layer.Layer<never> => {
  const logger = Logger.make(({ logLevel, message }) => {
    process.stderr.write(`${colorFor(logLevel)(formatLogLine(logLevel, message))}\n`);
  });

  return Layer.merge(
    Logger.replace(Logger.defaultLogger, logger),
    Logger.minimumLogLevel(LEVELS[level]),
  );
};
