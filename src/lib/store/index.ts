/**
 * Store module - relational store access
 */

export * from "./types.js";
export * from "./pg-store.js";
