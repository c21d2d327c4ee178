export { ConsoleLogger, createLogger, isLogLevel, logger, resolveLogLevel } from "./logger";
export type { LogLevel, Logger } from "./logger";
