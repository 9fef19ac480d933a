import { Request, Response } from "express";
import { IDisplayOrchestrator } from "@core/interfaces/IDisplayOrchestrator";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { DisplayError } from "@core/errors/DisplayError";
import { PREVIEW_PNG_SCALE } from "@core/constants/defaults";
import { encodeFramePng } from "@services/matrix/FrameEncoder";
import { getLogger } from "@utils/logger";

const logger = getLogger("PreviewController");

const INDEX_PAGE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Matrix preview</title>
  <style>
    body { background: #111; color: #ccc; font-family: monospace; }
    img { image-rendering: pixelated; border: 1px solid #333; }
  </style>
</head>
<body>
  <img id="frame" src="/api/frame.png" alt="matrix">
  <pre id="status"></pre>
  <script>
    setInterval(async () => {
      document.getElementById("frame").src = "/api/frame.png?t=" + Date.now();
      const res = await fetch("/api/status");
      const body = await res.json();
      document.getElementById("status").textContent =
        "active: " + body.data.activeModule;
    }, 500);
  </script>
</body>
</html>
`;

/**
 * Preview Controller
 *
 * Read-only view of the orchestrator and the last presented frame.
 *
 * @example
 * ```typescript
 * const controller = new PreviewController(orchestrator, frameBuffer);
 * app.get('/api/status', (req, res) => controller.getStatus(req, res));
 * ```
 */
export class PreviewController {
  constructor(
    private readonly orchestrator: IDisplayOrchestrator,
    private readonly frameBuffer: IFrameBuffer,
    private readonly scale: number = PREVIEW_PNG_SCALE,
  ) {}

  /**
   * @route GET /api/status
   */
  async getStatus(_req: Request, res: Response): Promise<void> {
    const status = this.orchestrator.getStatus();
    res.json({
      success: true,
      data: status,
    });
  }

  /**
   * Front buffer as an enlarged PNG
   *
   * @route GET /api/frame.png
   */
  async getFramePng(_req: Request, res: Response): Promise<void> {
    const frame = this.frameBuffer.frontFrame();
    if (!frame) {
      const error = DisplayError.noFrame();
      res.status(503).json({
        success: false,
        error: error.toResponse(),
      });
      return;
    }

    const png = await encodeFramePng(frame, this.scale);
    if (!png.success) {
      logger.error("Failed to encode preview frame:", png.error);
      res.status(500).json({
        success: false,
        error: png.error.toResponse(),
      });
      return;
    }

    res.set("Cache-Control", "no-store");
    res.contentType("image/png");
    res.send(png.data);
  }

  /**
   * @route GET /
   */
  async getIndex(_req: Request, res: Response): Promise<void> {
    res.contentType("text/html");
    res.send(INDEX_PAGE);
  }
}
