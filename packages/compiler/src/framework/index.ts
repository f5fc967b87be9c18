export * from "./context.js";
export * from "./keys.js";
export * from "./query.js";
export * from "./trace.js";
