export * from "./document.js";
export * from "./quality.js";
export * from "./extraction.js";
export * from "./chunk.js";
export * from "./embedding.js";
export * from "./notification.js";
export * from "./job.js";
export * from "./pipeline.js";
export * from "./config.js";
export * from "./ports.js";
