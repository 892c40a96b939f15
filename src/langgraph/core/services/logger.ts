import pino, { type Logger } from "pino";

export type { Logger };

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: info, or silent under the test runner.
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) return level;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      level: getLogLevel(),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    });
  }
  return rootLogger;
}

export function createLogger(component: string): Logger {
  return getRootLogger().child({ component });
}
