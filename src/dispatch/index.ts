export * from "./context.js";
export * from "./errors.js";
export * from "./extractor.js";
export * from "./shapes.js";
export * from "./handler.js";
export * from "./adapter.js";
