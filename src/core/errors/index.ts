/**
 * Core error classes for the ledboard display
 *
 * All custom errors extend BaseError and include:
 * - Error codes for categorization
 * - Timestamps
 * - Context data
 * - Recoverable flag
 * - User-facing messages from ErrorMessages.ts
 */

export * from "./BaseError";
export * from "./FetchError";
export * from "./RenderError";
export * from "./DisplayError";
export * from "./ConfigError";
export * from "./OrchestratorError";
export * from "./WebError";
export * from "./ErrorMessages";
