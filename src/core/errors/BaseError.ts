import { getUserMessage as getErrorUserMessage } from "./ErrorMessages";

/**
 * Body of a failed API response
 */
export interface ErrorResponse {
  code: string;
  message: string;
}

/**
 * Base class for every error the display raises or returns in a Result.
 *
 * Codes are SCREAMING_SNAKE with the family as the first segment
 * (FETCH_TIMEOUT, RENDER_FONT_GLYPH, CONFIG_DUPLICATE_MODULE).
 */
export abstract class BaseError extends Error {
  public readonly code: string;

  public readonly timestamp: Date;

  /** Values that identify the failing source, module or setting */
  public readonly context?: Record<string, unknown>;

  /**
   * Whether the display keeps running after this error
   */
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message);
    Error.captureStackTrace(this, this.constructor);
    // instanceof breaks for subclasses of Error under ES5 output otherwise
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.recoverable = recoverable;
    this.context = context;
  }

  /**
   * Short message for the preview page and status endpoint.
   * Falls back to the family default when the code has no entry.
   */
  getUserMessage(): string {
    return getErrorUserMessage(this.code);
  }

  toResponse(): ErrorResponse {
    return { code: this.code, message: this.getUserMessage() };
  }
}
