import express, { Express, NextFunction, Request, Response } from "express";
import http from "http";
import { IPreviewServer } from "@core/interfaces/IPreviewServer";
import { IDisplayOrchestrator } from "@core/interfaces/IDisplayOrchestrator";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { PreviewConfig, Result, success, failure } from "@core/types";
import { WebError } from "@core/errors/WebError";
import { getLogger } from "@utils/logger";
import {
  extractErrorInfo,
  isNodeJSErrnoException,
  toError,
} from "@utils/typeGuards";
import { PreviewController } from "./controllers/PreviewController";

const logger = getLogger("PreviewServer");

/**
 * Preview Server
 *
 * express app serving the current frame and orchestrator status.
 * Read-only: nothing here changes what the matrix shows.
 */
export class PreviewServer implements IPreviewServer {
  private readonly app: Express;
  private readonly controller: PreviewController;
  private server: http.Server | null = null;

  constructor(
    private readonly config: PreviewConfig,
    orchestrator: IDisplayOrchestrator,
    frameBuffer: IFrameBuffer,
  ) {
    this.app = express();
    this.controller = new PreviewController(orchestrator, frameBuffer);
    this.setupRoutes();
  }

  async start(): Promise<Result<void, WebError>> {
    if (this.server) {
      return success(undefined);
    }

    const server = http.createServer(this.app);
    try {
      await new Promise<void>((resolve, reject) => {
        server
          .listen(this.config.port, this.config.host, () => resolve())
          .on("error", (err: Error) => {
            if (isNodeJSErrnoException(err) && err.code === "EADDRINUSE") {
              reject(WebError.portInUse(this.config.port));
            } else {
              reject(err);
            }
          });
      });
    } catch (error) {
      if (error instanceof WebError) {
        return failure(error);
      }
      return failure(WebError.serverStartFailed(this.config.port, toError(error)));
    }

    this.server = server;
    logger.info(`✓ Preview server started on ${this.getServerUrl()}`);
    return success(undefined);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          logger.warn(`Preview server did not close cleanly: ${err.message}`);
        }
        resolve();
      });
    });
    logger.info("✓ Preview server stopped");
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getServerUrl(): string {
    return `http://${this.config.host}:${this.config.port}`;
  }

  /**
   * The express app, for tests and for mounting elsewhere
   */
  getApp(): Express {
    return this.app;
  }

  private setupRoutes(): void {
    this.app.use((req, _res, next) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });

    this.app.get("/", (req, res) => this.controller.getIndex(req, res));
    this.app.get("/api/status", (req, res) => this.controller.getStatus(req, res));
    this.app.get("/api/frame.png", (req, res) =>
      this.controller.getFramePng(req, res),
    );

    // 404 handler
    this.app.use((req, res) => {
      res.status(404).json({
        success: false,
        error: {
          code: "NOT_FOUND",
          message: "Endpoint not found",
          path: req.path,
        },
      });
    });

    // Error handler
    this.app.use(
      (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        logger.error("Express error:", err);
        res.status(500).json({
          success: false,
          error: extractErrorInfo(err),
        });
      },
    );
  }
}
