export * from "./classify.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./expansion.js";
export * from "./integrity.js";
export * from "./mutator.js";
export * from "./naming.js";
export * from "./renumber.js";
export * from "./resolver.js";
export * from "./tree.js";
export * from "./watcher.js";
