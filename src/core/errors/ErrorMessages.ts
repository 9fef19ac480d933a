/**
 * Centralized user-facing messages for all error codes.
 *
 * NOTE: Error codes are string literals here to avoid circular
 * dependencies with the error class files. They match the enum
 * values defined in each error class.
 *
 * @example
 * ```typescript
 * import { getUserMessage } from "@errors/ErrorMessages";
 *
 * getUserMessage("FETCH_TIMEOUT");
 * // "Data source did not answer in time."
 * ```
 */

/**
 * Fetch error user messages
 */
export const FETCH_ERROR_MESSAGES: Record<string, string> = {
  FETCH_NETWORK_ERROR: "Could not reach the data source.",
  FETCH_HTTP_ERROR: "Data source returned an error response.",
  FETCH_TIMEOUT: "Data source did not answer in time.",
  FETCH_PARSE_ERROR: "Data source returned data in an unexpected format.",
  FETCH_NO_DATA: "Data source returned no usable data.",
  FETCH_UNKNOWN_ERROR: "Data refresh failed.",
};

/**
 * Render error user messages
 */
export const RENDER_ERROR_MESSAGES: Record<string, string> = {
  RENDER_DRAW_FAILED: "A module failed to draw its frame.",
  RENDER_UNKNOWN_ERROR: "Rendering error occurred.",
};

/**
 * Display error user messages
 */
export const DISPLAY_ERROR_MESSAGES: Record<string, string> = {
  DISPLAY_UNKNOWN_DRIVER: "Unknown matrix driver. Check the display settings.",
  DISPLAY_INVALID_DIMENSIONS: "Invalid matrix size. Check the display settings.",
  DISPLAY_ENCODE_FAILED: "Could not encode the current frame.",
  DISPLAY_NO_FRAME: "No frame has been presented yet.",
  DISPLAY_UNKNOWN_ERROR: "Display error occurred.",
};

/**
 * Orchestrator error user messages
 */
export const ORCHESTRATOR_ERROR_MESSAGES: Record<string, string> = {
  ORCHESTRATOR_ALREADY_RUNNING: "The display loop is already running.",
  ORCHESTRATOR_NOT_RUNNING: "The display loop is not running.",
  ORCHESTRATOR_NO_MODULES: "No modules are registered.",
  ORCHESTRATOR_INVALID_TICK_RATE: "Tick rate must be greater than zero.",
  ORCHESTRATOR_UNKNOWN_ERROR: "Display loop error occurred.",
};

/**
 * Config error user messages
 */
export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_FILE_READ_ERROR: "Failed to read configuration file.",
  CONFIG_INVALID_JSON: "Configuration file is not valid JSON.",
  CONFIG_VALIDATION_FAILED: "Configuration file has invalid settings.",
  CONFIG_DUPLICATE_MODULE: "Two modules share the same name.",
  CONFIG_UNKNOWN_MODULE_TYPE: "Configuration names an unknown module type.",
  CONFIG_UNKNOWN_ERROR: "Configuration error occurred.",
};

/**
 * Web error user messages
 */
export const WEB_ERROR_MESSAGES: Record<string, string> = {
  WEB_SERVER_START_FAILED: "Preview server failed to start.",
  WEB_PORT_IN_USE: "Preview port is already in use.",
  WEB_UNKNOWN_ERROR: "Preview server error occurred.",
};

/**
 * Combined error messages from all categories.
 */
export const ERROR_MESSAGES: Record<string, string> = {
  ...FETCH_ERROR_MESSAGES,
  ...RENDER_ERROR_MESSAGES,
  ...DISPLAY_ERROR_MESSAGES,
  ...ORCHESTRATOR_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
  ...WEB_ERROR_MESSAGES,
};

/**
 * Fallback messages by error family (prefix before the first underscore).
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  FETCH: "Data refresh failed.",
  RENDER: "Rendering error occurred.",
  DISPLAY: "Display error occurred.",
  ORCHESTRATOR: "Display loop error occurred.",
  CONFIG: "Configuration error occurred.",
  WEB: "Preview server error occurred.",
};

/**
 * Get the user-facing message for an error code.
 *
 * @example
 * ```typescript
 * getUserMessage("CONFIG_DUPLICATE_MODULE"); // "Two modules share the same name."
 * getUserMessage("FETCH_SOMETHING_NEW");     // "Data refresh failed."
 * getUserMessage("NOPE");                    // "An error occurred."
 * ```
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return "An error occurred.";
}
