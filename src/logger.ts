import { hostname } from "node:os";
import pino from "pino";

const env = process.env.NODE_ENV ?? "development";
const isDev = env === "development";
const logLevel = process.env.LOG_LEVEL ?? (env === "test" ? "silent" : isDev ? "debug" : "info");

const transport = isDev
  ? {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "yyyy-mm-dd HH:MM:ss.l",
        ignore: "pid,hostname",
        messageFormat: "{component} | {msg}",
      },
    }
  : undefined;

export const rootLogger = pino({
  level: logLevel,
  base: {
    pid: process.pid,
    hostname: hostname(),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(transport ? { transport } : {}),
});

export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  handler?: string;
  updateId?: number;
  updateType?: string;
  parseMode?: string;
}

export function createLogger(context: LogContext): Logger {
  return rootLogger.child(context);
}

export default rootLogger;
