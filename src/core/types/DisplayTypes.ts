/**
 * 24-bit colour as drawn on the LED matrix
 */
export type RGB = {
  r: number;
  g: number;
  b: number;
};

/**
 * Width and height of a pixel surface
 */
export type FrameSize = {
  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;
};

/**
 * Packed RGB image, 3 bytes per pixel, row-major.
 * Used for presented frames and for decoded logos.
 */
export type RawImage = FrameSize & {
  /** Pixel data, length = width * height * 3 */
  data: Uint8Array;
};

/**
 * A frame handed to a driver after present()
 */
export type PresentedFrame = RawImage & {
  /** Monotonic frame counter, starts at 1 for the first presented frame */
  sequence: number;

  /** Wall-clock time the frame was presented (ms since epoch) */
  presentedAt: number;
};

/**
 * Which placeholder a module shows instead of real content
 * - loading: no successful refresh yet
 * - stale: last successful refresh is older than the stale window
 */
export type PlaceholderKind = "loading" | "stale";

/**
 * Matrix drivers known to the service container
 */
export enum MatrixDriverType {
  EMULATOR = "emulator",
  TERMINAL = "terminal",
}

/**
 * Named colours used by the modules
 */
export const Colors = {
  BLACK: { r: 0, g: 0, b: 0 },
  WHITE: { r: 255, g: 255, b: 255 },
  GRAY: { r: 200, g: 200, b: 200 },
  DIM: { r: 90, g: 90, b: 90 },
  RED: { r: 255, g: 0, b: 0 },
  GREEN: { r: 0, g: 255, b: 0 },
  BLUE: { r: 0, g: 100, b: 255 },
  YELLOW: { r: 255, g: 255, b: 0 },
  ORANGE: { r: 255, g: 140, b: 0 },
  CYAN: { r: 0, g: 200, b: 255 },
} as const satisfies Record<string, RGB>;
