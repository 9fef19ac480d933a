import { Request, Response } from "express";
import { PreviewController } from "../PreviewController";
import { encodeFramePng } from "@services/matrix/FrameEncoder";
import { FrameBuffer } from "@services/matrix/FrameBuffer";
import { IDisplayOrchestrator } from "@core/interfaces/IDisplayOrchestrator";
import { OrchestratorStatus, success, failure } from "@core/types";
import { DisplayError } from "@core/errors";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

jest.mock("@services/matrix/FrameEncoder", () => ({
  encodeFramePng: jest.fn(),
}));

const mockEncode = jest.mocked(encodeFramePng);

const mockRequest = () => ({}) as Request;

const mockResponse = () => {
  const res: Partial<Response> = {
    json: jest.fn().mockReturnThis(),
    status: jest.fn().mockReturnThis(),
    contentType: jest.fn().mockReturnThis(),
    set: jest.fn().mockReturnThis(),
    send: jest.fn().mockReturnThis(),
  };
  return res as Response;
};

const status: OrchestratorStatus = {
  running: true,
  activeModule: "weather",
  elapsedInSlot: 2.5,
  frames: 75,
  modules: [],
};

const createMockOrchestrator = (): IDisplayOrchestrator => ({
  register: jest.fn(),
  run: jest.fn(),
  stop: jest.fn(),
  tick: jest.fn(),
  currentModule: jest.fn(() => "weather"),
  isRunning: jest.fn(() => true),
  getStatus: jest.fn(() => status),
  onPresent: jest.fn(() => () => undefined),
});

describe("PreviewController", () => {
  let frameBuffer: FrameBuffer;
  let controller: PreviewController;

  beforeEach(() => {
    jest.clearAllMocks();
    frameBuffer = new FrameBuffer(4, 2);
    controller = new PreviewController(createMockOrchestrator(), frameBuffer, 8);
  });

  describe("getStatus", () => {
    it("should return the orchestrator status", async () => {
      const res = mockResponse();

      await controller.getStatus(mockRequest(), res);

      expect(res.json).toHaveBeenCalledWith({ success: true, data: status });
    });
  });

  describe("getFramePng", () => {
    it("should answer 503 before the first frame", async () => {
      const res = mockResponse();

      await controller.getFramePng(mockRequest(), res);

      expect(res.status).toHaveBeenCalledWith(503);
      expect(res.json).toHaveBeenCalledWith({
        success: false,
        error: {
          code: "DISPLAY_NO_FRAME",
          message: "No frame has been presented yet.",
        },
      });
      expect(mockEncode).not.toHaveBeenCalled();
    });

    it("should send the front frame as PNG", async () => {
      const png = Buffer.from("png");
      mockEncode.mockResolvedValue(success(png));
      const frame = frameBuffer.present();
      const res = mockResponse();

      await controller.getFramePng(mockRequest(), res);

      expect(mockEncode).toHaveBeenCalledWith(frame, 8);
      expect(res.contentType).toHaveBeenCalledWith("image/png");
      expect(res.set).toHaveBeenCalledWith("Cache-Control", "no-store");
      expect(res.send).toHaveBeenCalledWith(png);
    });

    it("should answer 500 when encoding fails", async () => {
      mockEncode.mockResolvedValue(
        failure(DisplayError.encodeFailed(new Error("bad input"))),
      );
      frameBuffer.present();
      const res = mockResponse();

      await controller.getFramePng(mockRequest(), res);

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.send).not.toHaveBeenCalled();
    });
  });

  describe("getIndex", () => {
    it("should serve the preview page", async () => {
      const res = mockResponse();

      await controller.getIndex(mockRequest(), res);

      expect(res.contentType).toHaveBeenCalledWith("text/html");
      expect(res.send).toHaveBeenCalledWith(
        expect.stringContaining('<img id="frame" src="/api/frame.png"'),
      );
    });
  });
});
