// Core re-exports for the survey-load type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
export * from "../lib/fetcher/types.js";
export * from "../lib/store/types.js";
export * from "../lib/reporter/types.js";
