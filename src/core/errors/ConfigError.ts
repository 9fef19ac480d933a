import { BaseError } from "./BaseError";

/**
 * Config-related error codes
 */
export enum ConfigErrorCode {
  // Loading errors
  FILE_READ_ERROR = "CONFIG_FILE_READ_ERROR",
  INVALID_JSON = "CONFIG_INVALID_JSON",
  VALIDATION_FAILED = "CONFIG_VALIDATION_FAILED",

  // Registration errors
  DUPLICATE_MODULE = "CONFIG_DUPLICATE_MODULE",
  UNKNOWN_MODULE_TYPE = "CONFIG_UNKNOWN_MODULE_TYPE",

  // Generic
  UNKNOWN = "CONFIG_UNKNOWN_ERROR",
}

/**
 * Invalid configuration or module registration. Fatal at startup.
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * Create error for file read failure
   */
  static readError(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Failed to read configuration file: ${error.message}`,
      ConfigErrorCode.FILE_READ_ERROR,
      false,
      { filePath, originalError: error.message },
    );
  }

  /**
   * Create error for invalid JSON
   */
  static invalidJSON(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Invalid JSON in configuration file: ${error.message}`,
      ConfigErrorCode.INVALID_JSON,
      false,
      { filePath, originalError: error.message },
    );
  }

  /**
   * Create error for schema validation failure
   * @param issues One "path: message" line per problem
   */
  static validationFailed(issues: string[]): ConfigError {
    return new ConfigError(
      `Invalid configuration: ${issues.join("; ")}`,
      ConfigErrorCode.VALIDATION_FAILED,
      false,
      { issues },
    );
  }

  /**
   * Create error for a module name registered twice
   */
  static duplicateModule(name: string): ConfigError {
    return new ConfigError(
      `A module named "${name}" is already registered`,
      ConfigErrorCode.DUPLICATE_MODULE,
      false,
      { name },
    );
  }

  /**
   * Create error for a module type with no factory
   */
  static unknownModuleType(type: string): ConfigError {
    return new ConfigError(
      `Unknown module type: ${type}`,
      ConfigErrorCode.UNKNOWN_MODULE_TYPE,
      false,
      { type },
    );
  }
}
