export * from "./arena-slot.js";
export * from "./format.js";
export * from "./params.js";
export * from "./qualified-type.js";
export * from "./type-arena.js";
