import { BaseError } from "./BaseError";

export enum RenderErrorCode {
  DRAW_FAILED = "RENDER_DRAW_FAILED",
  UNKNOWN = "RENDER_UNKNOWN_ERROR",
}

/**
 * Drawing fault inside a module's render(); costs one frame.
 */
export class RenderError extends BaseError {
  constructor(
    message: string,
    code: RenderErrorCode = RenderErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static drawFailed(moduleName: string, error: Error): RenderError {
    return new RenderError(
      `${moduleName} failed to render: ${error.message}`,
      RenderErrorCode.DRAW_FAILED,
      { moduleName, originalError: error.message },
    );
  }
}
