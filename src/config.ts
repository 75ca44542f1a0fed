import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const ConfigSchema = Type.Object({
  logLevel: Type.Union(LOG_LEVELS.map((level) => Type.Literal(level))),
  parseMode: Type.Union([Type.Literal("HTML"), Type.Literal("Markdown")]),
  logUpdates: Type.Boolean(),
});

export type Config = Static<typeof ConfigSchema>;

export type WireParseMode = Config["parseMode"];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const candidate = {
    logLevel: env.LOG_LEVEL ?? "info",
    parseMode: env.DISPATCH_PARSE_MODE ?? "HTML",
    logUpdates: env.DISPATCH_LOG_UPDATES === "1" || env.DISPATCH_LOG_UPDATES === "true",
  };

  if (!Value.Check(ConfigSchema, candidate)) {
    const first = Value.Errors(ConfigSchema, candidate).First();
    throw new Error(`Invalid configuration: ${first ? `${first.path} ${first.message}` : "unknown error"}`);
  }
  return candidate;
}
