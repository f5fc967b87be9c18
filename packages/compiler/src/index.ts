export * from "./diagnostics/index.js";
export * from "./framework/index.js";
export * from "./resolution/index.js";
export * from "./scopes/index.js";
export * from "./syntax/index.js";
export * from "./types/index.js";
