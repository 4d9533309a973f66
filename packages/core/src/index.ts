export * from "./types.js";
export * from "./errors.js";
export * from "./item.js";
export * from "./pipeline.js";
export * from "./rules/glob.js";
export * from "./rules/matcher.js";
export * from "./rules/section-classifier.js";
export * from "./rules/week-splitter.js";
export * from "./rules/label-counter.js";
