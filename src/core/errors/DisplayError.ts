import { BaseError } from "./BaseError";

/**
 * Display-related error codes
 */
export enum DisplayErrorCode {
  UNKNOWN_DRIVER = "DISPLAY_UNKNOWN_DRIVER",
  INVALID_DIMENSIONS = "DISPLAY_INVALID_DIMENSIONS",
  ENCODE_FAILED = "DISPLAY_ENCODE_FAILED",
  NO_FRAME = "DISPLAY_NO_FRAME",
  UNKNOWN = "DISPLAY_UNKNOWN_ERROR",
}

/**
 * Frame buffer and matrix driver errors
 */
export class DisplayError extends BaseError {
  constructor(
    message: string,
    code: DisplayErrorCode = DisplayErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * Create error for a driver name with no registered factory
   */
  static unknownDriver(name: string, available: string[]): DisplayError {
    return new DisplayError(
      `Unknown matrix driver "${name}" (available: ${available.join(", ")})`,
      DisplayErrorCode.UNKNOWN_DRIVER,
      false,
      { name, available },
    );
  }

  /**
   * Create error for invalid dimensions
   */
  static invalidDimensions(width: number, height: number): DisplayError {
    return new DisplayError(
      `Invalid matrix dimensions: ${width}x${height}`,
      DisplayErrorCode.INVALID_DIMENSIONS,
      false,
      { width, height },
    );
  }

  /**
   * Create error for PNG encoding failure
   */
  static encodeFailed(error: Error): DisplayError {
    return new DisplayError(
      `Failed to encode frame: ${error.message}`,
      DisplayErrorCode.ENCODE_FAILED,
      true,
      { originalError: error.message },
    );
  }

  /**
   * Create error for a request made before the first present()
   */
  static noFrame(): DisplayError {
    return new DisplayError(
      "No frame has been presented yet",
      DisplayErrorCode.NO_FRAME,
      true,
    );
  }
}
