// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export { createLogger, type IntakeLogger, type LogInput } from "./create-log";
export {
  createLog,
  createPinoForApp,
  type Log,
  type LoggerConfig,
  type LogLevel,
  type LogMode,
  resolveLogPath,
  resolveMode,
} from "./logger";
