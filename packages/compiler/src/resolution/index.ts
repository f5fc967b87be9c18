export * from "./builtins.js";
export * from "./call-info.js";
export * from "./call-resolution.js";
export * from "./can-pass.js";
export * from "./config.js";
export * from "./default-functions.js";
export * from "./disambiguation.js";
export * from "./function-queries.js";
export * from "./genericity.js";
export * from "./init-resolver.js";
export * from "./instantiation.js";
export * from "./module-queries.js";
export * from "./poi.js";
export * from "./resolved.js";
export * from "./resolver.js";
export * from "./signature-queries.js";
export * from "./signatures.js";
