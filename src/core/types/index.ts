/**
 * Core types for the ledboard display
 *
 * This barrel file exports all type definitions used throughout the application.
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./DisplayTypes";
export * from "./ModuleTypes";
export * from "./ScrollTypes";
export * from "./SourceTypes";
