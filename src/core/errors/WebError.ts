import { BaseError } from "./BaseError";

export enum WebErrorCode {
  SERVER_START_FAILED = "WEB_SERVER_START_FAILED",
  PORT_IN_USE = "WEB_PORT_IN_USE",
  UNKNOWN = "WEB_UNKNOWN_ERROR",
}

/**
 * Preview server could not come up. The display loop runs without it, so
 * every WebError is recoverable.
 */
export class WebError extends BaseError {
  constructor(
    message: string,
    code: WebErrorCode = WebErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static serverStartFailed(port: number, error: Error): WebError {
    return new WebError(
      `Failed to start preview server on port ${port}: ${error.message}`,
      WebErrorCode.SERVER_START_FAILED,
      { port, originalError: error.message },
    );
  }

  static portInUse(port: number): WebError {
    return new WebError(
      `Port ${port} is already in use`,
      WebErrorCode.PORT_IN_USE,
      { port },
    );
  }
}
