/**
 * shadow-alter - Type Exports
 */

export * from "./errors.js";
export * from "./session.js";
export * from "./migration.js";
