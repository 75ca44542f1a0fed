import type { WireParseMode } from "../config.js";
import type { Formatter } from "./formatter.js";
import { HtmlFormatter } from "./html.js";
import { MarkdownFormatter } from "./markdown.js";

export * from "./formatter.js";
export * from "./entities.js";
export * from "./html.js";
export * from "./markdown.js";
export * from "./builder.js";
export * from "./parse.js";

export function createFormatter(parseMode: WireParseMode): Formatter {
  return parseMode === "HTML" ? new HtmlFormatter() : new MarkdownFormatter();
}
