/**
 * Type guards and utilities for safe type narrowing
 *
 * These utilities replace unsafe `as` type assertions with runtime checks
 * that provide proper type narrowing.
 */

import { BaseError, ErrorResponse } from "@core/errors/BaseError";

/**
 * Convert an unknown caught error to an Error instance.
 *
 * In TypeScript, caught errors are typed as `unknown`. This function
 * safely converts any value to an Error instance for consistent handling.
 *
 * @example
 * ```ts
 * try {
 *   await module.refresh();
 * } catch (err) {
 *   const error = toError(err);
 *   logger.warn(error.message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Type guard for Node.js ErrnoException.
 *
 * @example
 * ```ts
 * try {
 *   await fs.readFile(path);
 * } catch (err) {
 *   if (isNodeJSErrnoException(err) && err.code === "ENOENT") {
 *     // Handle file not found
 *   }
 * }
 * ```
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

/**
 * Type guard for AbortSignal.timeout() rejections from fetch
 */
export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Type guard for BaseError instances.
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Extract error code and user message for API responses.
 *
 * Works with BaseError subclasses, plain Error instances and any other
 * thrown value.
 */
export function extractErrorInfo(error: unknown): ErrorResponse {
  if (isBaseError(error)) {
    return error.toResponse();
  }
  if (error instanceof Error) {
    return {
      code: "UNKNOWN_ERROR",
      message: error.message,
    };
  }
  return {
    code: "UNKNOWN_ERROR",
    message: String(error),
  };
}

/**
 * Type guard for plain string-keyed objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
