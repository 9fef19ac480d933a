import { FrameBuffer } from "../FrameBuffer";
import { Colors, RawImage } from "@core/types";
import { DisplayError } from "@core/errors/DisplayError";

describe("FrameBuffer", () => {
  let frame: FrameBuffer;

  beforeEach(() => {
    frame = new FrameBuffer(4, 3, () => 1000);
  });

  describe("constructor", () => {
    it("should report its dimensions", () => {
      expect(frame.dimensions()).toEqual({ width: 4, height: 3 });
    });

    it("should reject invalid dimensions", () => {
      expect(() => new FrameBuffer(0, 32)).toThrow(DisplayError);
      expect(() => new FrameBuffer(64, 2.5)).toThrow(
        "Invalid matrix dimensions: 64x2.5",
      );
    });
  });

  describe("setPixel", () => {
    it("should write one pixel into the back buffer", () => {
      frame.setPixel(1, 2, Colors.RED);
      expect(frame.getPixel(1, 2)).toEqual({ r: 255, g: 0, b: 0 });
      expect(frame.getPixel(0, 0)).toEqual({ r: 0, g: 0, b: 0 });
    });

    it("should ignore pixels outside the surface", () => {
      expect(() => {
        frame.setPixel(-1, 0, Colors.RED);
        frame.setPixel(4, 0, Colors.RED);
        frame.setPixel(0, 3, Colors.RED);
      }).not.toThrow();
      expect(frame.getPixel(4, 0)).toBeNull();
    });
  });

  describe("fillRect", () => {
    it("should clip to the surface", () => {
      frame.fillRect(2, 1, 10, 10, Colors.GREEN);
      expect(frame.getPixel(1, 1)).toEqual(Colors.BLACK);
      expect(frame.getPixel(2, 1)).toEqual(Colors.GREEN);
      expect(frame.getPixel(3, 2)).toEqual(Colors.GREEN);
    });
  });

  describe("fill and clear", () => {
    it("should paint and then blank every pixel", () => {
      frame.fill(Colors.BLUE);
      expect(frame.getPixel(3, 2)).toEqual(Colors.BLUE);
      frame.clear();
      expect(frame.getPixel(3, 2)).toEqual(Colors.BLACK);
    });
  });

  describe("blit", () => {
    it("should copy non-black pixels at an offset", () => {
      const image: RawImage = {
        width: 2,
        height: 1,
        data: new Uint8Array([10, 20, 30, 0, 0, 0]),
      };
      frame.fill(Colors.WHITE);
      frame.blit(image, 2, 0);
      expect(frame.getPixel(2, 0)).toEqual({ r: 10, g: 20, b: 30 });
      // black is transparent
      expect(frame.getPixel(3, 0)).toEqual(Colors.WHITE);
    });
  });

  describe("present", () => {
    it("should return null before the first present", () => {
      expect(frame.frontFrame()).toBeNull();
    });

    it("should expose the drawn frame and number it", () => {
      frame.setPixel(0, 0, Colors.YELLOW);
      const first = frame.present();

      expect(first.sequence).toBe(1);
      expect(first.presentedAt).toBe(1000);
      expect(Array.from(first.data.slice(0, 3))).toEqual([255, 255, 0]);
      expect(frame.frontFrame()).toBe(first);
    });

    it("should keep the front frame unchanged while the back buffer is drawn", () => {
      frame.setPixel(0, 0, Colors.YELLOW);
      const shown = frame.present();

      frame.clear();
      frame.setPixel(0, 0, Colors.CYAN);

      expect(Array.from(shown.data.slice(0, 3))).toEqual([255, 255, 0]);
      const next = frame.present();
      expect(next.sequence).toBe(2);
      expect(Array.from(next.data.slice(0, 3))).toEqual([0, 200, 255]);
    });

    it("should never reuse a presented frame's pixels for later draws", () => {
      frame.fill(Colors.WHITE);
      const kept = frame.present();

      for (let i = 0; i < 2; i++) {
        frame.clear();
        frame.fill(Colors.RED);
        frame.present();
      }

      expect(kept.sequence).toBe(1);
      expect(Array.from(kept.data.slice(0, 3))).toEqual([255, 255, 255]);
      const latest = frame.frontFrame();
      expect(latest?.sequence).toBe(3);
      expect(Array.from(latest?.data.slice(0, 3) ?? new Uint8Array())).toEqual([
        255, 0, 0,
      ]);
    });
  });
});
