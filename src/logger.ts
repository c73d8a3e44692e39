/**
 * Structured logging for the persistence core.
 *
 * One pino root logger per process; components take a child carrying their
 * name. Nothing here ever receives credentials: callers log backend kinds and
 * redacted connection strings only.
 */
import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Write to this stream instead of stdout (tests capture output this way). */
  destination?: pino.DestinationStream;
}

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export type Logger = pino.Logger;

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? defaultLevel(),
    name: options.name ?? "taskorbit",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ["password", "*.password", "connectionString", "*.connectionString"],
      censor: "[redacted]",
    },
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

let rootLogger: Logger | null = null;

/** Process-wide root logger, created on first use. */
export function getLogger(): Logger {
  if (!rootLogger) rootLogger = createLogger();
  return rootLogger;
}

/** Child logger tagged with the component that writes through it. */
export function componentLogger(component: string, parent: Logger = getLogger()): Logger {
  return parent.child({ component });
}
