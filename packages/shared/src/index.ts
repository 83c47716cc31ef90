export * from "./config.js";
export * from "./reasonCodes.js";
export * from "./records.js";
