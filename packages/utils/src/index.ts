export * from "./bytes.js";
export * from "./errors.js";
export * from "./json.js";
export * from "./logger.js";
export * from "./objects.js";
export * from "./retry.js";
export * from "./sleep.js";
export * from "./timeout.js";
