export * from "./paths.js";
export * from "./store.js";
