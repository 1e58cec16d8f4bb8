export * from "./value.js";
export * from "./config.js";
