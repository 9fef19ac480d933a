import { Result } from "@core/types";
import { WebError } from "@core/errors";

/**
 * Read-only HTTP preview of the matrix
 */
export interface IPreviewServer {
  start(): Promise<Result<void, WebError>>;
  stop(): Promise<void>;
  isRunning(): boolean;

  /**
   * Address the server listens on, e.g. http://0.0.0.0:8080
   */
  getServerUrl(): string;
}
