import { BaseError } from "./BaseError";

/**
 * Data-source error codes
 */
export enum FetchErrorCode {
  NETWORK_ERROR = "FETCH_NETWORK_ERROR",
  HTTP_ERROR = "FETCH_HTTP_ERROR",
  TIMEOUT = "FETCH_TIMEOUT",
  PARSE_ERROR = "FETCH_PARSE_ERROR",
  NO_DATA = "FETCH_NO_DATA",
  UNKNOWN = "FETCH_UNKNOWN_ERROR",
}

/**
 * Network or parse failure inside a module's refresh().
 * Always recoverable: the module keeps its previous cache.
 */
export class FetchError extends BaseError {
  constructor(
    message: string,
    code: FetchErrorCode = FetchErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  static networkError(source: string, url: string, error: Error): FetchError {
    return new FetchError(
      `${source}: request to ${url} failed: ${error.message}`,
      FetchErrorCode.NETWORK_ERROR,
      { source, url, originalError: error.message },
    );
  }

  static httpError(
    source: string,
    url: string,
    status: number,
    statusText: string,
  ): FetchError {
    return new FetchError(
      `${source}: HTTP ${status} ${statusText} from ${url}`,
      FetchErrorCode.HTTP_ERROR,
      { source, url, status },
    );
  }

  static timeout(source: string, url: string, timeoutMs: number): FetchError {
    return new FetchError(
      `${source}: request to ${url} timed out after ${timeoutMs}ms`,
      FetchErrorCode.TIMEOUT,
      { source, url, timeoutMs },
    );
  }

  static parseError(source: string, detail: string): FetchError {
    return new FetchError(
      `${source}: unexpected response: ${detail}`,
      FetchErrorCode.PARSE_ERROR,
      { source, detail },
    );
  }

  static noData(source: string, reason: string): FetchError {
    return new FetchError(
      `${source}: ${reason}`,
      FetchErrorCode.NO_DATA,
      { source },
    );
  }

  /**
   * Wrap an exception thrown by a refresh() that broke its contract
   */
  static fromUnknown(source: string, error: Error): FetchError {
    return new FetchError(
      `${source}: refresh threw: ${error.message}`,
      FetchErrorCode.UNKNOWN,
      { source, originalError: error.message },
    );
  }
}
