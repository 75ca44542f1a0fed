export * from "./telegram/types.js";
export * from "./telegram/client.js";
export * from "./telegram/update.js";
export * from "./classify/index.js";
export * from "./dispatch/index.js";
export * from "./format/index.js";
export { loadConfig, type Config, type WireParseMode } from "./config.js";
export { rootLogger, createLogger, type Logger, type LogContext } from "./logger.js";
