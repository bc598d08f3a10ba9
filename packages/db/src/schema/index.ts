export * from "./enums.js";
export * from "./documents.js";
export * from "./chunks.js";
export * from "./notifications.js";
