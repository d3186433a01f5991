// Single import point for project types

export * from "./data-model.js";
export * from "./config.js";
