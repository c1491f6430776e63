export * from "./types.js";
export * from "./errors.js";
export * from "./pagination.js";
export * from "./pipeline.js";
export * from "./rules/event-classifier.js";
export * from "./rules/time-window.js";
