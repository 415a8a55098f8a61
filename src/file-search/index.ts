export * from "./model.js";
export * from "./names.js";
export * from "./metadata.js";
export * from "./formats.js";
export * from "./stores.js";
export * from "./documents.js";
export * from "./search.js";
export * from "./statistics.js";
export * from "./operations.js";
