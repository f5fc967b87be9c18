export * from "./murmur-hash.js";
