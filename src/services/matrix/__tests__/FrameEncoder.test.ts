import sharp from "sharp";
import { encodeFramePng, dimChannel } from "../FrameEncoder";
import { DisplayErrorCode } from "@core/errors/DisplayError";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

describe("FrameEncoder", () => {
  describe("encodeFramePng", () => {
    it("should encode an enlarged PNG", async () => {
      const frame = {
        width: 2,
        height: 1,
        data: new Uint8Array([255, 0, 0, 0, 0, 255]),
      };

      const result = await encodeFramePng(frame, 4);

      expect(result.success).toBe(true);
      if (result.success) {
        const meta = await sharp(result.data).metadata();
        expect(meta.format).toBe("png");
        expect(meta.width).toBe(8);
        expect(meta.height).toBe(4);
      }
    });

    it("should return encodeFailed when the data does not match the size", async () => {
      const frame = { width: 4, height: 4, data: new Uint8Array(3) };

      const result = await encodeFramePng(frame);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(DisplayErrorCode.ENCODE_FAILED);
      }
    });
  });

  describe("dimChannel", () => {
    it("should scale by percent and clamp the percentage", () => {
      expect(dimChannel(200, 50)).toBe(100);
      expect(dimChannel(255, 100)).toBe(255);
      expect(dimChannel(255, 150)).toBe(255);
      expect(dimChannel(255, -5)).toBe(0);
    });
  });
});
