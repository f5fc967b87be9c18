export * from "./scope.js";
export * from "./scope-queries.js";
