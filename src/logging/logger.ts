import { join } from "node:path";
import { nanoid } from "nanoid";
import pino, { type DestinationStream, type Logger } from "pino";

export type LogLevel = "info" | "warn" | "error";

/**
 * Where records go:
 * - `prod`: appended to `logs/<appName>.log`
 * - `dev`: written to stdout
 * - `agentic`: not written, returned as a JSON string
 */
export type LogMode = "prod" | "dev" | "agentic";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

export interface LoggerConfig {
  /** Overrides the MODE environment variable */
  mode?: LogMode;
  /** Directory for prod log files (default: ./logs) */
  logDir?: string;
  /** Receives every record instead of the file or stdout */
  destination?: DestinationStream;
}

const LOG_MODES: readonly LogMode[] = ["prod", "dev", "agentic"];

function isLogMode(value: string): value is LogMode {
  return LOG_MODES.some((mode) => mode === value);
}

// Lazy evaluation of MODE - only check when logging is actually used
export function resolveMode(config?: LoggerConfig): LogMode {
  if (config?.mode) {
    return config.mode;
  }
  const mode = process.env.MODE;
  if (!mode) {
    throw new Error("Missing MODE environment variable");
  }
  if (!isLogMode(mode)) {
    throw new Error(`Unknown MODE "${mode}", expected prod, dev or agentic`);
  }
  return mode;
}

export function resolveLogPath(appName: string, config?: LoggerConfig): string {
  return join(config?.logDir ?? join(process.cwd(), "logs"), `${appName}.log`);
}

function resolveDestination(
  appName: string,
  mode: LogMode,
  config?: LoggerConfig
): DestinationStream {
  if (config?.destination) {
    return config.destination;
  }
  if (mode === "prod") {
    return pino.destination({
      dest: resolveLogPath(appName, config),
      mkdir: true,
      sync: true,
    });
  }
  return pino.destination(1);
}

/**
 * Creates a pino instance for one app. Each call opens a fresh destination;
 * callers that log repeatedly should keep the instance.
 */
export function createPinoForApp(
  appName: string,
  config?: LoggerConfig
): Logger {
  const mode = resolveMode(config);
  return pino(
    {
      base: null,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    resolveDestination(appName, mode, config)
  );
}

/**
 * Writes one log record.
 * @param log - The log details; `level` defaults to info
 * @param config - Mode and destination overrides
 * @param instance - A pino instance to reuse instead of opening a new one
 * @returns The log id, or the whole record as JSON in agentic mode
 * @throws {Error} If appName is missing or no mode can be resolved
 */
export const createLog = (
  log: Log,
  config?: LoggerConfig,
  instance?: Logger
): string => {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  const level = log.level ?? "info";
  const log_id = log.log_id ?? nanoid(6);

  const logRecord = {
    log_id,
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
  };

  const mode = resolveMode(config);
  if (mode === "agentic") {
    return JSON.stringify({
      ...logRecord,
      level,
      time: new Date().toISOString(),
    });
  }

  const appLogger = instance ?? createPinoForApp(log.appName, config);
  appLogger[level](logRecord);
  return log_id;
};
