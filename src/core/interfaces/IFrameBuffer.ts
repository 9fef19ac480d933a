import { FrameSize, PresentedFrame, RawImage, RGB } from "@core/types";

/**
 * Frame Buffer Interface
 *
 * Fixed-resolution RGB surface with a back buffer that modules draw into
 * and a front buffer that drivers and the preview read. Drawing outside
 * the surface is clipped, so tickers can draw partially visible text.
 */
export interface IFrameBuffer {
  /**
   * Surface size, fixed for the lifetime of the buffer
   */
  dimensions(): FrameSize;

  /**
   * Set one back-buffer pixel. Out-of-range coordinates are ignored.
   */
  setPixel(x: number, y: number, color: RGB): void;

  /**
   * Read one back-buffer pixel, or null outside the surface
   */
  getPixel(x: number, y: number): RGB | null;

  /**
   * Fill a rectangle, clipped to the surface
   */
  fillRect(x: number, y: number, width: number, height: number, color: RGB): void;

  /**
   * Fill the whole back buffer
   */
  fill(color: RGB): void;

  /**
   * Set the whole back buffer to black
   */
  clear(): void;

  /**
   * Copy a packed RGB image into the back buffer with its top-left corner
   * at (x, y). Pure black source pixels are treated as transparent.
   */
  blit(image: RawImage, x: number, y: number): void;

  /**
   * Atomically swap back and front buffers and return the new front frame
   */
  present(): PresentedFrame;

  /**
   * Most recently presented frame, or null before the first present()
   */
  frontFrame(): PresentedFrame | null;
}
