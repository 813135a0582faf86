import type { Logger } from "pino";
import {
  createLog as newLog,
  createPinoForApp,
  type Log,
  type LoggerConfig,
  resolveMode,
} from "./logger";

export type LogInput = Omit<Log, "appName" | "level">;

/** Structured logger every toolkit component accepts */
export interface IntakeLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger bound to an app name. The pino instance is opened on the
 * first write and reused after that.
 * @param appName - The application name (determines the log file)
 * @param config - Mode and destination overrides
 */
export const createLogger = (
  appName: string,
  config?: LoggerConfig
): IntakeLogger => {
  let instance: Logger | undefined;

  const write = (input: LogInput, level: "info" | "warn" | "error") => {
    if (!instance && resolveMode(config) !== "agentic") {
      instance = createPinoForApp(appName, config);
    }
    return newLog({ ...input, appName, level }, config, instance);
  };

  return {
    info: (input) => write(input, "info"),
    warn: (input) => write(input, "warn"),
    error: (input) => write(input, "error"),
  };
};
