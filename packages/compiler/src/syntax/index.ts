export * from "./builder.js";
export * from "./fingerprint.js";
export * from "./id.js";
export * from "./nodes.js";
export * from "./numbering.js";
export * from "./parsing-queries.js";
export * from "./traverse.js";
