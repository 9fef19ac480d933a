import { FrameSize, PresentedFrame, RawImage, RGB } from "@core/types";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { DisplayError } from "@core/errors/DisplayError";

const BYTES_PER_PIXEL = 3;

/**
 * Double-buffered RGB surface.
 *
 * Modules draw into the back buffer during a tick. present() freezes the
 * back buffer into a new front frame that is never written again, so a
 * driver or subscriber holding on to a frame never sees it change.
 */
export class FrameBuffer implements IFrameBuffer {
  private readonly back: Uint8Array;
  private sequence = 0;
  private presented: PresentedFrame | null = null;

  constructor(
    private readonly width: number,
    private readonly height: number,
    private readonly clock: () => number = Date.now,
  ) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw DisplayError.invalidDimensions(width, height);
    }
    this.back = new Uint8Array(width * height * BYTES_PER_PIXEL);
  }

  dimensions(): FrameSize {
    return { width: this.width, height: this.height };
  }

  setPixel(x: number, y: number, color: RGB): void {
    const px = Math.round(x);
    const py = Math.round(y);
    if (px < 0 || py < 0 || px >= this.width || py >= this.height) {
      return;
    }
    const offset = (py * this.width + px) * BYTES_PER_PIXEL;
    this.back[offset] = color.r;
    this.back[offset + 1] = color.g;
    this.back[offset + 2] = color.b;
  }

  getPixel(x: number, y: number): RGB | null {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return null;
    }
    const offset = (y * this.width + x) * BYTES_PER_PIXEL;
    return {
      r: this.back[offset],
      g: this.back[offset + 1],
      b: this.back[offset + 2],
    };
  }

  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    color: RGB,
  ): void {
    const x0 = Math.max(0, Math.round(x));
    const y0 = Math.max(0, Math.round(y));
    const x1 = Math.min(this.width, Math.round(x + width));
    const y1 = Math.min(this.height, Math.round(y + height));
    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) {
        const offset = (py * this.width + px) * BYTES_PER_PIXEL;
        this.back[offset] = color.r;
        this.back[offset + 1] = color.g;
        this.back[offset + 2] = color.b;
      }
    }
  }

  fill(color: RGB): void {
    this.fillRect(0, 0, this.width, this.height, color);
  }

  clear(): void {
    this.back.fill(0);
  }

  blit(image: RawImage, x: number, y: number): void {
    for (let iy = 0; iy < image.height; iy++) {
      for (let ix = 0; ix < image.width; ix++) {
        const src = (iy * image.width + ix) * BYTES_PER_PIXEL;
        const r = image.data[src];
        const g = image.data[src + 1];
        const b = image.data[src + 2];
        if (r === 0 && g === 0 && b === 0) continue;
        this.setPixel(x + ix, y + iy, { r, g, b });
      }
    }
  }

  present(): PresentedFrame {
    this.sequence++;
    this.presented = {
      width: this.width,
      height: this.height,
      data: this.back.slice(),
      sequence: this.sequence,
      presentedAt: this.clock(),
    };
    return this.presented;
  }

  frontFrame(): PresentedFrame | null {
    return this.presented;
  }
}
